import { CalcError } from "../../src/calculator/types.js";

/** Runs `fn` and returns the CalcError it throws. */
export function catchCalcError(fn: () => unknown): CalcError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CalcError) return err;
    throw err;
  }
  throw new Error("expected a CalcError to be thrown");
}

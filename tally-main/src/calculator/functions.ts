import { Decimal } from "decimal.js";
import { CalcError, type Dec } from "./types.js";

// 78 significant digits carry the same precision as a 256-bit binary mantissa.
export const PRECISION_DIGITS = 78;

export const CalcDecimal = Decimal.clone({
  precision: PRECISION_DIGITS,
  rounding: Decimal.ROUND_HALF_EVEN,
});

export type BuiltinFn = (args: Dec[], pos: number) => Dec;

// --- Helpers ---

function requireArgs(name: string, args: Dec[], pos: number): [Dec, ...Dec[]] {
  const [first, ...rest] = args;
  if (first === undefined) {
    throw new CalcError(
      `Function '${name}' needs at least 1 argument`,
      pos,
      "EMPTY_ARGUMENTS",
    );
  }
  return [first, ...rest];
}

function sum(args: Dec[]): Dec {
  return args.reduce<Dec>((acc, x) => acc.plus(x), new CalcDecimal(0));
}

// Total order with NaN above every other value.
function rank(a: Dec, b: Dec): number {
  if (a.isNaN()) return b.isNaN() ? 0 : 1;
  if (b.isNaN()) return -1;
  return a.comparedTo(b);
}

// Strict comparison keeps the first of equal values.
function pick(args: Dec[], name: string, pos: number, better: (a: Dec, b: Dec) => boolean): Dec {
  const [first, ...rest] = requireArgs(name, args, pos);
  let best = first;
  for (const x of rest) {
    if (better(x, best)) best = x;
  }
  return best;
}

// decimal.js reduces the argument against its stored digits of pi and gives
// up once the argument's magnitude outgrows them.
function sin(arg: Dec, pos: number): Dec {
  try {
    return CalcDecimal.sin(arg);
  } catch (err) {
    if (err instanceof Error && err.message.includes("Precision limit exceeded")) {
      throw new CalcError("Argument of 'sin' is too large", pos, "PRECISION_LIMIT");
    }
    throw err;
  }
}

// --- Function table ---

export const BUILTINS: Readonly<Record<string, BuiltinFn>> = {
  sum: (args) => sum(args),
  avg: (args, pos) => {
    requireArgs("avg", args, pos);
    return sum(args).dividedBy(args.length);
  },
  min: (args, pos) => pick(args, "min", pos, (a, b) => rank(a, b) < 0),
  max: (args, pos) => pick(args, "max", pos, (a, b) => rank(a, b) > 0),
  sqrt: (args, pos) => requireArgs("sqrt", args, pos)[0].sqrt(),
  sin: (args, pos) => sin(requireArgs("sin", args, pos)[0], pos),
};

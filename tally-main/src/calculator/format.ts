import { Decimal } from "decimal.js";
import type { Dec } from "./types.js";

export const DISPLAY_DIGITS = 32;

/** Places a point after `index` digits, dropping trailing fractional zeros. */
function insertPoint(digits: string, index: number): string {
  const whole = digits.slice(0, index);
  const fraction = digits.slice(index).replace(/0+$/, "");
  return fraction ? `${whole}.${fraction}` : whole;
}

/**
 * Splits `value` into its sign, exactly `significantDigits` digits rounded
 * half-even, and the exponent `exp` such that |value| = 0.<digits> × 10^exp.
 */
function decompose(value: Dec, significantDigits: number): { negative: boolean; digits: string; exp: number } {
  // toExponential yields "d.ddde±x" with significantDigits digits in total.
  const [mantissa = "", exponent = "0"] = value.abs().toExponential(significantDigits - 1, Decimal.ROUND_HALF_EVEN).split("e");
  return {
    negative: value.isNegative(),
    digits: mantissa.replace(".", ""),
    exp: Number.parseInt(exponent, 10) + 1,
  };
}

/**
 * Renders `value` with at most `significantDigits` significant digits.
 *
 * Values whose exponent fits within the digit count print positionally
 * (`12.34`, `0.0123`), others in scientific form (`1.2e4`, `1.23e-6`).
 */
export function formatNumber(value: Dec, significantDigits: number = DISPLAY_DIGITS): string {
  if (value.isNaN()) return "NaN";
  if (!value.isFinite()) return value.isNegative() ? "-inf" : "inf";
  if (value.isZero()) return "0";

  const precision = Math.max(1, Math.trunc(significantDigits));
  const { negative, digits, exp } = decompose(value, precision);

  let body: string;
  if (exp > 0 && exp < precision) {
    body = insertPoint(digits, exp);
  } else if (exp === precision) {
    body = digits;
  } else if (exp > -precision && exp <= 0) {
    body = `0.${"0".repeat(-exp)}${digits.replace(/0+$/, "")}`;
  } else {
    body = `${insertPoint(digits, 1)}e${exp - 1}`;
  }

  return negative ? `-${body}` : body;
}

import { Decimal } from "decimal.js";

const EXPONENTIAL_THRESHOLD = 1e21;

/**
 * Renders a result rounded half-up to `precision` decimal places, without
 * trailing zeros. Non-finite values print as `inf`, `-inf` and `nan`.
 */
export function formatResult(value: number, precision: number): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";

  const d = new Decimal(value);
  if (d.abs().gte(EXPONENTIAL_THRESHOLD)) {
    return d.toSignificantDigits(Math.max(1, precision + 1), Decimal.ROUND_HALF_UP).toExponential();
  }

  const rounded = d.toDecimalPlaces(precision, Decimal.ROUND_HALF_UP);
  return rounded.isZero() ? "0" : rounded.toFixed();
}

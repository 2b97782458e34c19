import JSBI from "jsbi";
import { formatInTimeZone } from "date-fns-tz";
import { ZERO } from "./internal_constants";

// Helper that logs failure context and throws to stop the current operation (and test runners like mocha)
export function ensure(condition: boolean, message: string, context?: Record<string, unknown>): asserts condition {
  if (condition) return;
  const safeCtx: Record<string, string> = {};
  if (context) {
    for (const k of Object.keys(context)) {
      safeCtx[k] = String(context[k]);
    }
  }
  // Print to stderr so mocha captures it prominently.
  // eslint-disable-next-line no-console
  console.error("ENSURE FAILED:", message);
  // eslint-disable-next-line no-console
  console.error("Context:", JSON.stringify(safeCtx, null, 2));
  throw new Error(message);
}

/** ---------- Signed helpers ---------- */
export { ZERO };

// Re-creates a value in this package's JSBI, whatever produced it
export const toBig = (x: { toString(): string } | string | number) => JSBI.BigInt(x.toString());

export const add = (a: JSBI, b: JSBI) => JSBI.add(a, b);
export const sub = (a: JSBI, b: JSBI) => JSBI.subtract(a, b);
export const neg = (a: JSBI) => JSBI.unaryMinus(a);
export const lt = (a: JSBI, b: JSBI) => JSBI.lessThan(a, b);
export const lte = (a: JSBI, b: JSBI) => JSBI.lessThanOrEqual(a, b);
export const gt = (a: JSBI, b: JSBI) => JSBI.greaterThan(a, b);
export const gte = (a: JSBI, b: JSBI) => JSBI.greaterThanOrEqual(a, b);
export const eq = (a: JSBI, b: JSBI) => JSBI.equal(a, b);
export const isNegative = (a: JSBI) => lt(a, ZERO);
export const isPositive = (a: JSBI) => gt(a, ZERO);
export const abs = (a: JSBI) => (isNegative(a) ? neg(a) : a);

export const fmtUTC = (d: Date) => formatInTimeZone(d, "UTC", "yyyy-MM-dd HH:mm:ss");

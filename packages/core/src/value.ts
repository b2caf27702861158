/* =======================================================================================
 * Span values (offset widths)
 * ---------------------------------------------------------------------------------------
 * - Closed set of offset widths a span algebra can be instantiated with
 * - Checked arithmetic per width (no wraparound, no silent precision loss)
 * - Lossless widening to host-native numbers
 * ======================================================================================= */

export type SpanWidth = "u8" | "u16" | "u32" | "u64" | "u128" | "usize";

/** Runtime representation of an offset for a width. */
export type SpanValueOf<W extends SpanWidth> = W extends "u64" | "u128" ? bigint : number;

export type SpanValue = number | bigint;

export type Ordering = -1 | 0 | 1;

/**
 * Capability set every width provides. The algebra only ever talks to offsets
 * through this interface.
 */
export interface SpanNumeric<V extends SpanValue> {
  readonly width: SpanWidth;
  readonly bits: number;
  readonly zero: V;
  /** Largest representable offset. */
  readonly max: V;
  isInteger(value: V): boolean;
  isNegative(value: V): boolean;
  negate(value: V): V;
  compare(a: V, b: V): Ordering;
  lesser(a: V, b: V): V;
  greater(a: V, b: V): V;
  /** `a + b`, or null past `max`. */
  checkedAdd(a: V, b: V): V | null;
  /** `a - b`, or null below zero. */
  checkedSub(a: V, b: V): V | null;
  /** Widen to a safe integer `number`; null when the value has no exact `number` form. */
  toSafeNumber(value: V): number | null;
  /** Narrow a host integer into this width's representation; null for non-integers. No range check. */
  fromNumber(value: number): V | null;
}

function numberNumeric(width: SpanWidth, bits: number, max: number): SpanNumeric<number> {
  return {
    width,
    bits,
    zero: 0,
    max,
    isInteger: (value) => Number.isInteger(value),
    isNegative: (value) => value < 0,
    negate: (value) => 0 - value,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
    lesser: (a, b) => (b < a ? b : a),
    greater: (a, b) => (b > a ? b : a),
    checkedAdd: (a, b) => {
      const sum = a + b;
      return sum > max ? null : sum;
    },
    checkedSub: (a, b) => {
      const diff = a - b;
      return diff < 0 ? null : diff;
    },
    toSafeNumber: (value) => (Number.isSafeInteger(value) ? value : null),
    fromNumber: (value) => (Number.isInteger(value) ? value : null),
  };
}

function bigintNumeric(width: SpanWidth, bits: number): SpanNumeric<bigint> {
  const max = (1n << BigInt(bits)) - 1n;
  const maxSafe = BigInt(Number.MAX_SAFE_INTEGER);
  return {
    width,
    bits,
    zero: 0n,
    max,
    isInteger: (value) => typeof value === "bigint",
    isNegative: (value) => value < 0n,
    negate: (value) => -value,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
    lesser: (a, b) => (b < a ? b : a),
    greater: (a, b) => (b > a ? b : a),
    checkedAdd: (a, b) => {
      const sum = a + b;
      return sum > max ? null : sum;
    },
    checkedSub: (a, b) => {
      const diff = a - b;
      return diff < 0n ? null : diff;
    },
    toSafeNumber: (value) => (value >= 0n && value <= maxSafe ? Number(value) : null),
    fromNumber: (value) => (Number.isInteger(value) ? BigInt(value) : null),
  };
}

type SpanNumerics = { [K in SpanWidth]: SpanNumeric<SpanValueOf<K>> };

const SPAN_NUMERICS: SpanNumerics = {
  u8: numberNumeric("u8", 8, 0xff),
  u16: numberNumeric("u16", 16, 0xffff),
  u32: numberNumeric("u32", 32, 0xffff_ffff),
  u64: bigintNumeric("u64", 64),
  u128: bigintNumeric("u128", 128),
  // Host index type: string and array offsets stay exact up to 2^53 - 1.
  usize: numberNumeric("usize", 53, Number.MAX_SAFE_INTEGER),
};

export const SPAN_WIDTHS: readonly SpanWidth[] = ["u8", "u16", "u32", "u64", "u128", "usize"];

export function spanNumeric<W extends SpanWidth>(width: W): SpanNumeric<SpanValueOf<W>> {
  return SPAN_NUMERICS[width];
}

export function isSpanWidth(value: string): value is SpanWidth {
  return SPAN_WIDTHS.some((width) => width === value);
}

/** Widen any offset to a safe integer `number` (null when not exactly representable). */
export function widenSpanValue(value: SpanValue): number | null {
  if (typeof value === "bigint") {
    return value >= 0n && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : null;
  }
  return Number.isSafeInteger(value) && value >= 0 ? value : null;
}

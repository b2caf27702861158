/* =======================================================================================
 * Span algebra
 * ---------------------------------------------------------------------------------------
 * - Construction (bounds, offset+length, tuple) with atomic validation
 * - Queries: length/emptiness/containment/overlap
 * - Combinators: union/intersection/translation/growth/shrinking/cover
 * - Ordering/equality/keys for callers that sort or index spans
 * ======================================================================================= */

import { debug } from "./debug.js";
import {
  SpanError,
  SpanErrorCode,
  spanErr,
  spanOk,
  type SpanErrorCodeType,
  type SpanErrorDetails,
  type SpanResult,
} from "./errors.js";
import { brandSpan, type Span, type SpanTuple } from "./span.js";
import { spanNumeric, type Ordering, type SpanNumeric, type SpanValueOf, type SpanWidth } from "./value.js";

export interface SpanAlgebra<W extends SpanWidth> {
  readonly width: W;
  readonly numeric: SpanNumeric<SpanValueOf<W>>;

  /* ---- construction ---- */
  /** Zero-width span at offset 0. */
  empty(): Span<W>;
  /** Zero-width span at `offset`. */
  point(offset: SpanValueOf<W>): SpanResult<Span<W>>;
  fromBounds(start: SpanValueOf<W>, end: SpanValueOf<W>): SpanResult<Span<W>>;
  fromOffsetLen(start: SpanValueOf<W>, len: SpanValueOf<W>): SpanResult<Span<W>>;
  fromRange(range: SpanTuple<W>): SpanResult<Span<W>>;

  /* ---- queries ---- */
  len(span: Span<W>): SpanValueOf<W>;
  isEmpty(span: Span<W>): boolean;
  containsOffset(span: Span<W>, offset: SpanValueOf<W>): boolean;
  containsSpan(outer: Span<W>, inner: Span<W>): boolean;
  overlaps(a: Span<W>, b: Span<W>): boolean;

  /* ---- combinators ---- */
  union(a: Span<W>, b: Span<W>): Span<W>;
  intersect(a: Span<W>, b: Span<W>): Span<W> | null;
  translate(span: Span<W>, delta: SpanValueOf<W>): SpanResult<Span<W>>;
  cover(spans: Iterable<Span<W> | null | undefined>): Span<W> | null;
  growFront(span: Span<W>, amount: SpanValueOf<W>): SpanResult<Span<W>>;
  growBack(span: Span<W>, amount: SpanValueOf<W>): SpanResult<Span<W>>;
  shrinkFront(span: Span<W>, amount: SpanValueOf<W>): SpanResult<Span<W>>;
  shrinkBack(span: Span<W>, amount: SpanValueOf<W>): SpanResult<Span<W>>;
  collapseToEnd(span: Span<W>): Span<W>;

  /* ---- comparison ---- */
  equals(a: Span<W>, b: Span<W>): boolean;
  /**
   * Partial order over spans: defined when both bounds move the same way
   * (or one of them is equal), null when they move in opposite directions.
   */
  compare(a: Span<W>, b: Span<W>): Ordering | null;
  key(span: Span<W>): string;
  toRange(span: Span<W>): SpanTuple<W>;
  narrowestContaining(spans: Iterable<Span<W> | null | undefined>, offset: SpanValueOf<W>): Span<W> | null;
}

/**
 * Instantiate the span algebra for one offset width. Every operation goes through
 * the width's checked arithmetic; nothing branches on the width afterwards.
 */
export function createSpanAlgebra<W extends SpanWidth>(width: W): SpanAlgebra<W> {
  type V = SpanValueOf<W>;
  const num: SpanNumeric<V> = spanNumeric(width);

  function fail<T>(code: SpanErrorCodeType, message: string, details: SpanErrorDetails): SpanResult<T> {
    debug.algebra(code, { width, ...details });
    return spanErr(new SpanError(message, code, { width, ...details }));
  }

  /** Range check for a caller-supplied offset; null when it is a valid SpanValue. */
  function checkValue<T>(value: V, name: string): SpanResult<T> | null {
    if (!num.isInteger(value)) {
      return fail(SpanErrorCode.INVALID_VALUE, `${name} must be an integer offset`, { [name]: value });
    }
    if (num.isNegative(value)) {
      return fail(SpanErrorCode.UNDERFLOW, `${name} is below offset 0`, { [name]: value });
    }
    if (num.compare(value, num.max) > 0) {
      return fail(SpanErrorCode.OVERFLOW, `${name} exceeds the ${width} maximum`, { [name]: value, max: num.max });
    }
    return null;
  }

  function checkDelta<T>(value: V, name: string): SpanResult<T> | null {
    if (!num.isInteger(value)) {
      return fail(SpanErrorCode.INVALID_VALUE, `${name} must be an integer`, { [name]: value });
    }
    return null;
  }

  const len = (span: Span<W>): V => {
    // start <= end holds for every minted span
    return num.checkedSub(span.end, span.start) ?? num.zero;
  };

  const fromBounds = (start: V, end: V): SpanResult<Span<W>> => {
    const invalid = checkValue<Span<W>>(start, "start") ?? checkValue<Span<W>>(end, "end");
    if (invalid) return invalid;
    if (num.compare(start, end) > 0) {
      return fail(SpanErrorCode.INVALID_SPAN, "cannot create negative-size span", { start, end });
    }
    return spanOk(brandSpan<W>(start, end));
  };

  const union = (a: Span<W>, b: Span<W>): Span<W> =>
    brandSpan<W>(num.lesser(a.start, b.start), num.greater(a.end, b.end));

  const containsOffset = (span: Span<W>, offset: V): boolean =>
    num.compare(span.start, offset) <= 0 && num.compare(offset, span.end) < 0;

  return {
    width,
    numeric: num,

    empty: () => brandSpan<W>(num.zero, num.zero),

    point: (offset) => fromBounds(offset, offset),

    fromBounds,

    fromOffsetLen: (start, length) => {
      const invalid = checkValue<Span<W>>(start, "start") ?? checkValue<Span<W>>(length, "len");
      if (invalid) return invalid;
      const end = num.checkedAdd(start, length);
      if (end === null) {
        return fail(SpanErrorCode.OVERFLOW, `start + len exceeds the ${width} maximum`, {
          start,
          len: length,
          max: num.max,
        });
      }
      return spanOk(brandSpan<W>(start, end));
    },

    fromRange: (range) => fromBounds(range[0], range[1]),

    len,

    isEmpty: (span) => num.compare(span.start, span.end) === 0,

    containsOffset,

    containsSpan: (outer, inner) =>
      num.compare(outer.start, inner.start) <= 0 && num.compare(inner.end, outer.end) <= 0,

    // Empty spans share no offset with anything, even when they sit strictly inside another span.
    overlaps: (a, b) =>
      num.compare(a.start, b.end) < 0 &&
      num.compare(b.start, a.end) < 0 &&
      num.compare(a.start, a.end) < 0 &&
      num.compare(b.start, b.end) < 0,

    union,

    intersect: (a, b) => {
      const start = num.greater(a.start, b.start);
      const end = num.lesser(a.end, b.end);
      if (num.compare(start, end) > 0) return null;
      return brandSpan<W>(start, end);
    },

    translate: (span, delta) => {
      const invalid = checkDelta<Span<W>>(delta, "delta");
      if (invalid) return invalid;
      if (num.isNegative(delta)) {
        const magnitude = num.negate(delta);
        const start = num.checkedSub(span.start, magnitude);
        const end = num.checkedSub(span.end, magnitude);
        if (start === null || end === null) {
          return fail(SpanErrorCode.UNDERFLOW, "translation moves the span below offset 0", {
            start: span.start,
            end: span.end,
            delta,
          });
        }
        return spanOk(brandSpan<W>(start, end));
      }
      const start = num.checkedAdd(span.start, delta);
      const end = num.checkedAdd(span.end, delta);
      if (start === null || end === null) {
        return fail(SpanErrorCode.OVERFLOW, `translation moves the span past the ${width} maximum`, {
          start: span.start,
          end: span.end,
          delta,
        });
      }
      return spanOk(brandSpan<W>(start, end));
    },

    cover: (spans) => {
      let merged: Span<W> | null = null;
      for (const span of spans) {
        if (!span) continue;
        merged = merged ? union(merged, span) : span;
      }
      return merged;
    },

    growFront: (span, amount) => {
      const invalid = checkValue<Span<W>>(amount, "amount");
      if (invalid) return invalid;
      const end = num.checkedAdd(span.end, amount);
      if (end === null) {
        return fail(SpanErrorCode.OVERFLOW, `growing the end exceeds the ${width} maximum`, {
          end: span.end,
          amount,
        });
      }
      return spanOk(brandSpan<W>(span.start, end));
    },

    growBack: (span, amount) => {
      const invalid = checkValue<Span<W>>(amount, "amount");
      if (invalid) return invalid;
      const start = num.checkedSub(span.start, amount);
      if (start === null) {
        return fail(SpanErrorCode.UNDERFLOW, "cannot create a span with a negative start value", {
          start: span.start,
          amount,
        });
      }
      return spanOk(brandSpan<W>(start, span.end));
    },

    shrinkFront: (span, amount) => {
      const invalid = checkValue<Span<W>>(amount, "amount");
      if (invalid) return invalid;
      if (num.compare(len(span), amount) < 0) {
        return fail(SpanErrorCode.INVALID_SPAN, "cannot create negative-size span", {
          start: span.start,
          end: span.end,
          amount,
        });
      }
      return spanOk(brandSpan<W>(span.start, num.checkedSub(span.end, amount) ?? span.start));
    },

    shrinkBack: (span, amount) => {
      const invalid = checkValue<Span<W>>(amount, "amount");
      if (invalid) return invalid;
      if (num.compare(len(span), amount) < 0) {
        return fail(SpanErrorCode.INVALID_SPAN, "cannot create negative-size span", {
          start: span.start,
          end: span.end,
          amount,
        });
      }
      return spanOk(brandSpan<W>(num.checkedAdd(span.start, amount) ?? span.end, span.end));
    },

    collapseToEnd: (span) => brandSpan<W>(span.end, span.end),

    equals: (a, b) => num.compare(a.start, b.start) === 0 && num.compare(a.end, b.end) === 0,

    compare: (a, b) => {
      const byStart = num.compare(a.start, b.start);
      const byEnd = num.compare(a.end, b.end);
      if (byStart === byEnd) return byStart;
      if (byStart === 0) return byEnd;
      if (byEnd === 0) return byStart;
      return null;
    },

    key: (span) => `${span.start}:${span.end}`,

    toRange: (span) => [span.start, span.end],

    narrowestContaining: (spans, offset) => {
      let best: Span<W> | null = null;
      for (const span of spans) {
        if (!span || !containsOffset(span, offset)) continue;
        if (!best || num.compare(len(span), len(best)) < 0) best = span;
      }
      return best;
    },
  };
}

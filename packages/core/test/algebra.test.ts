import { describe, test, expect } from "vitest";

import { createSpanAlgebra } from "../src/algebra.js";
import { SpanError, SpanErrorCode, unwrapSpan, type SpanResult } from "../src/errors.js";
import type { Span } from "../src/span.js";

// =============================================================================
// Test Helpers
// =============================================================================

const u8 = createSpanAlgebra("u8");

function span(start: number, end: number): Span<"u8"> {
  return unwrapSpan(u8.fromBounds(start, end));
}

function errorCode<T>(result: SpanResult<T>): string | null {
  return result.ok ? null : result.error.code;
}

/** Every span with bounds in [0, limit]. */
function allSpans(limit: number): Span<"u8">[] {
  const out: Span<"u8">[] = [];
  for (let start = 0; start <= limit; start++) {
    for (let end = start; end <= limit; end++) out.push(span(start, end));
  }
  return out;
}

// =============================================================================
// Scenarios (8-bit offsets)
// =============================================================================

describe("u8 scenarios", () => {
  test("fromBounds builds a non-empty span", () => {
    const s = span(2, 5);
    expect(s).toEqual({ start: 2, end: 5 });
    expect(u8.len(s)).toBe(3);
    expect(u8.isEmpty(s)).toBe(false);
  });

  test("zero-width span contains nothing, not even its own start", () => {
    const s = span(5, 5);
    expect(u8.isEmpty(s)).toBe(true);
    expect(u8.containsOffset(s, 5)).toBe(false);
  });

  test("touching spans do not overlap but intersect at the touch point", () => {
    expect(u8.overlaps(span(0, 3), span(3, 6))).toBe(false);
    expect(u8.intersect(span(0, 3), span(3, 6))).toEqual({ start: 3, end: 3 });
  });

  test("union of disjoint spans is the enclosing span", () => {
    expect(u8.union(span(0, 2), span(5, 7))).toEqual({ start: 0, end: 7 });
  });

  test("fromOffsetLen past 255 overflows", () => {
    const result = u8.fromOffsetLen(250, 10);
    expect(errorCode(result)).toBe(SpanErrorCode.OVERFLOW);
    expect(result.ok ? null : result.error.details).toEqual({ width: "u8", start: 250, len: 10, max: 255 });
  });

  test("fromBounds with start > end is an invalid span", () => {
    const result = u8.fromBounds(5, 2);
    expect(errorCode(result)).toBe(SpanErrorCode.INVALID_SPAN);
    expect(() => unwrapSpan(result)).toThrow(SpanError);
    expect(() => unwrapSpan(result)).toThrow("cannot create negative-size span");
  });
});

// =============================================================================
// Construction
// =============================================================================

describe("construction", () => {
  test("empty and point build zero-width spans", () => {
    expect(u8.empty()).toEqual({ start: 0, end: 0 });
    expect(u8.point(7)).toEqual({ ok: true, value: { start: 7, end: 7 } });
  });

  test("fromOffsetLen reaches the maximum exactly", () => {
    expect(u8.fromOffsetLen(250, 5)).toEqual({ ok: true, value: { start: 250, end: 255 } });
  });

  test("fromRange takes a [start, end] tuple", () => {
    expect(u8.fromRange([1, 4])).toEqual({ ok: true, value: { start: 1, end: 4 } });
    expect(errorCode(u8.fromRange([4, 1]))).toBe(SpanErrorCode.INVALID_SPAN);
  });

  test("offsets outside the width are rejected", () => {
    expect(errorCode(u8.fromBounds(-1, 3))).toBe(SpanErrorCode.UNDERFLOW);
    expect(errorCode(u8.fromBounds(0, 256))).toBe(SpanErrorCode.OVERFLOW);
    expect(errorCode(u8.fromBounds(1.5, 3))).toBe(SpanErrorCode.INVALID_VALUE);
    expect(errorCode(u8.fromBounds(Number.NaN, 3))).toBe(SpanErrorCode.INVALID_VALUE);
    expect(errorCode(u8.fromOffsetLen(0, -1))).toBe(SpanErrorCode.UNDERFLOW);
  });

  test("spans are frozen values", () => {
    expect(Object.isFrozen(span(1, 2))).toBe(true);
  });

  test("u32 accepts its full range", () => {
    const u32 = createSpanAlgebra("u32");
    expect(u32.fromBounds(0, 0xffff_ffff).ok).toBe(true);
    expect(errorCode(u32.fromBounds(0, 0x1_0000_0000))).toBe(SpanErrorCode.OVERFLOW);
  });

  test("u64 uses bigint offsets", () => {
    const u64 = createSpanAlgebra("u64");
    const max = 2n ** 64n - 1n;
    expect(u64.fromOffsetLen(max - 1n, 1n)).toEqual({ ok: true, value: { start: max - 1n, end: max } });
    expect(errorCode(u64.fromOffsetLen(max - 1n, 2n))).toBe(SpanErrorCode.OVERFLOW);
    expect(u64.len(unwrapSpan(u64.fromBounds(2n, 9n)))).toBe(7n);
  });

  test("usize stops at the largest safe integer", () => {
    const usize = createSpanAlgebra("usize");
    expect(errorCode(usize.fromOffsetLen(Number.MAX_SAFE_INTEGER, 1))).toBe(SpanErrorCode.OVERFLOW);
    expect(usize.fromOffsetLen(Number.MAX_SAFE_INTEGER - 1, 1).ok).toBe(true);
  });
});

// =============================================================================
// Queries and combinators
// =============================================================================

describe("queries", () => {
  test("containsOffset is half-open", () => {
    const s = span(2, 5);
    expect(u8.containsOffset(s, 1)).toBe(false);
    expect(u8.containsOffset(s, 2)).toBe(true);
    expect(u8.containsOffset(s, 4)).toBe(true);
    expect(u8.containsOffset(s, 5)).toBe(false);
  });

  test("containsSpan follows the bracket inequality for empty spans", () => {
    expect(u8.containsSpan(span(2, 5), span(5, 5))).toBe(true);
    expect(u8.containsSpan(span(2, 5), span(6, 6))).toBe(false);
    expect(u8.containsSpan(span(3, 3), span(3, 3))).toBe(true);
    expect(u8.containsSpan(span(3, 3), span(2, 4))).toBe(false);
  });

  test("empty spans never overlap", () => {
    expect(u8.overlaps(span(3, 3), span(3, 3))).toBe(false);
    expect(u8.overlaps(span(3, 3), span(3, 6))).toBe(false);
    expect(u8.overlaps(span(4, 4), span(3, 6))).toBe(false);
    expect(u8.overlaps(span(2, 5), span(4, 8))).toBe(true);
  });

  test("intersect returns null for separated spans", () => {
    expect(u8.intersect(span(0, 2), span(3, 5))).toBeNull();
    expect(u8.intersect(span(0, 5), span(3, 6))).toEqual({ start: 3, end: 5 });
  });
});

describe("translate", () => {
  test("shifts both bounds", () => {
    expect(u8.translate(span(2, 5), 250)).toEqual({ ok: true, value: { start: 252, end: 255 } });
    expect(u8.translate(span(2, 5), -2)).toEqual({ ok: true, value: { start: 0, end: 3 } });
  });

  test("reports underflow and overflow", () => {
    expect(errorCode(u8.translate(span(2, 5), -3))).toBe(SpanErrorCode.UNDERFLOW);
    expect(errorCode(u8.translate(span(250, 255), 1))).toBe(SpanErrorCode.OVERFLOW);
    expect(errorCode(u8.translate(span(2, 5), 0.5))).toBe(SpanErrorCode.INVALID_VALUE);
  });

  test("bigint deltas can be negative", () => {
    const u128 = createSpanAlgebra("u128");
    const s = unwrapSpan(u128.fromBounds(10n, 20n));
    expect(u128.translate(s, -10n)).toEqual({ ok: true, value: { start: 0n, end: 10n } });
    expect(errorCode(u128.translate(s, -11n))).toBe(SpanErrorCode.UNDERFLOW);
  });
});

describe("growing and shrinking", () => {
  test("growFront moves the end forward", () => {
    expect(u8.growFront(span(2, 5), 3)).toEqual({ ok: true, value: { start: 2, end: 8 } });
    expect(errorCode(u8.growFront(span(250, 255), 1))).toBe(SpanErrorCode.OVERFLOW);
  });

  test("growBack moves the start backward", () => {
    expect(u8.growBack(span(2, 5), 2)).toEqual({ ok: true, value: { start: 0, end: 5 } });
    const result = u8.growBack(span(2, 5), 3);
    expect(errorCode(result)).toBe(SpanErrorCode.UNDERFLOW);
    expect(result.ok ? null : result.error.message).toBe("cannot create a span with a negative start value");
  });

  test("shrinkFront and shrinkBack stop at zero length", () => {
    expect(u8.shrinkFront(span(2, 5), 3)).toEqual({ ok: true, value: { start: 2, end: 2 } });
    expect(errorCode(u8.shrinkFront(span(2, 5), 4))).toBe(SpanErrorCode.INVALID_SPAN);
    expect(u8.shrinkBack(span(2, 5), 1)).toEqual({ ok: true, value: { start: 3, end: 5 } });
    expect(errorCode(u8.shrinkBack(span(2, 5), 4))).toBe(SpanErrorCode.INVALID_SPAN);
  });

  test("collapseToEnd leaves an empty span at the old end", () => {
    expect(u8.collapseToEnd(span(2, 5))).toEqual({ start: 5, end: 5 });
  });
});

describe("cover and narrowestContaining", () => {
  test("cover merges every present span", () => {
    expect(u8.cover([span(4, 6), null, span(1, 2), undefined])).toEqual({ start: 1, end: 6 });
    expect(u8.cover([])).toBeNull();
  });

  test("narrowestContaining picks the shortest span holding the offset", () => {
    const spans = [span(0, 10), span(2, 6), span(3, 4)];
    expect(u8.narrowestContaining(spans, 3)).toEqual({ start: 3, end: 4 });
    expect(u8.narrowestContaining(spans, 4)).toEqual({ start: 2, end: 6 });
    expect(u8.narrowestContaining(spans, 20)).toBeNull();
  });
});

describe("comparison", () => {
  test("compare is a partial order over both bounds", () => {
    expect(u8.compare(span(0, 5), span(0, 5))).toBe(0);
    expect(u8.compare(span(0, 3), span(1, 4))).toBe(-1);
    expect(u8.compare(span(0, 5), span(0, 6))).toBe(-1);
    expect(u8.compare(span(1, 5), span(0, 5))).toBe(1);
    expect(u8.compare(span(0, 5), span(1, 4))).toBeNull();
  });

  test("equals, key and toRange", () => {
    expect(u8.equals(span(2, 5), span(2, 5))).toBe(true);
    expect(u8.equals(span(2, 5), span(2, 6))).toBe(false);
    expect(u8.key(span(2, 5))).toBe("2:5");
    expect(u8.toRange(span(2, 5))).toEqual([2, 5]);
  });
});

// =============================================================================
// Properties over every span in [0, 6]
// =============================================================================

describe("algebraic properties", () => {
  const spans = allSpans(6);

  test("every minted span satisfies start <= end", () => {
    for (const s of spans) expect(s.start).toBeLessThanOrEqual(s.end);
  });

  test("length is consistent with fromOffsetLen", () => {
    for (const s of spans) {
      expect(u8.len(s)).toBe(s.end - s.start);
      expect(unwrapSpan(u8.fromOffsetLen(s.start, u8.len(s))).end).toBe(s.end);
    }
  });

  test("containment is reflexive", () => {
    for (const s of spans) expect(u8.containsSpan(s, s)).toBe(true);
  });

  test("union absorbs both operands", () => {
    for (const a of spans) {
      for (const b of spans) {
        const u = u8.union(a, b);
        expect(u8.containsSpan(u, a)).toBe(true);
        expect(u8.containsSpan(u, b)).toBe(true);
      }
    }
  });

  test("overlap holds exactly when the intersection is non-empty", () => {
    for (const a of spans) {
      for (const b of spans) {
        const i = u8.intersect(a, b);
        expect(u8.overlaps(a, b)).toBe(i !== null && !u8.isEmpty(i));
        if (a.end === b.start) expect(i).toEqual({ start: b.start, end: b.start });
      }
    }
  });

  test("translate by d then -d restores the span", () => {
    for (const s of spans) {
      for (let d = -3; d <= 3; d++) {
        const moved = u8.translate(s, d);
        if (!moved.ok) continue;
        expect(u8.translate(moved.value, -d)).toEqual({ ok: true, value: s });
      }
    }
  });
});

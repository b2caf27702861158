/* =======================================================================================
 * Span shape
 * ---------------------------------------------------------------------------------------
 * - Half-open [start, end) over a caller-owned text sequence
 * - Branded with its width so spans of different widths never mix
 * - Only the algebra mints spans; holders can rely on start <= end
 * ======================================================================================= */

import type { SpanValueOf, SpanWidth } from "./value.js";

declare const spanWidth: unique symbol;

export interface Span<W extends SpanWidth = SpanWidth> {
  /** Inclusive. */
  readonly start: SpanValueOf<W>;
  /** Exclusive. */
  readonly end: SpanValueOf<W>;
  /** Type-level width brand; absent at runtime. */
  readonly [spanWidth]: W;
}

/** Mint a span. Callers must already have checked `start <= end` against the width. */
export function brandSpan<W extends SpanWidth>(start: SpanValueOf<W>, end: SpanValueOf<W>): Span<W> {
  return Object.freeze({ start, end }) as Span<W>;
}

export type SpanTuple<W extends SpanWidth = SpanWidth> = readonly [SpanValueOf<W>, SpanValueOf<W>];

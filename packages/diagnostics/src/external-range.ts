import {
  debug,
  SpanError,
  SpanErrorCode,
  spanErr,
  spanOk,
  widenSpanValue,
  type Span,
  type SpanAlgebra,
  type SpanResult,
  type SpanWidth,
} from "@text-span/core";

/** Plain `[start, end)` offsets as diagnostic renderers take them. */
export interface ExternalRange {
  readonly start: number;
  readonly end: number;
}

/** Renderer span that also names the source it points into. */
export interface DiagnosticSpan<TSource> extends ExternalRange {
  readonly source: TSource;
}

/**
 * Widen a span to host numbers. Always succeeds for number-backed widths;
 * bigint-backed widths fail with an overflow once an offset is no longer a safe integer.
 */
export function toExternalRange(span: Span): SpanResult<ExternalRange> {
  const start = widenSpanValue(span.start);
  const end = widenSpanValue(span.end);
  if (start === null || end === null) {
    debug.interop("widen.overflow", { start: span.start, end: span.end });
    return spanErr(
      new SpanError("span offsets exceed the host's safe integer range", SpanErrorCode.OVERFLOW, {
        start: span.start,
        end: span.end,
        max: Number.MAX_SAFE_INTEGER,
      }),
    );
  }
  return spanOk({ start, end });
}

export function toRangeTuple(span: Span): SpanResult<readonly [number, number]> {
  const range = toExternalRange(span);
  if (!range.ok) return range;
  return spanOk<readonly [number, number]>([range.value.start, range.value.end]);
}

export function toDiagnosticSpan<TSource>(span: Span, source: TSource): SpanResult<DiagnosticSpan<TSource>> {
  const range = toExternalRange(span);
  if (!range.ok) return range;
  return spanOk({ source, ...range.value });
}

/** Bring a renderer range back into `algebra`'s width, with the algebra's validation. */
export function fromExternalRange<W extends SpanWidth>(
  algebra: SpanAlgebra<W>,
  range: ExternalRange,
): SpanResult<Span<W>> {
  const start = algebra.numeric.fromNumber(range.start);
  const end = algebra.numeric.fromNumber(range.end);
  if (start === null || end === null) {
    return spanErr(
      new SpanError("external range offsets must be integers", SpanErrorCode.INVALID_VALUE, {
        start: range.start,
        end: range.end,
      }),
    );
  }
  return algebra.fromBounds(start, end);
}

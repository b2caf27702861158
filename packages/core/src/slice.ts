import { SpanError, SpanErrorCode, spanErr, spanOk, type SpanResult } from "./errors.js";
import type { Span } from "./span.js";
import { widenSpanValue } from "./value.js";

/*
 * Apply a span to a caller-owned string. The span says nothing about which unit
 * its offsets count, so each helper names the unit it assumes.
 */

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

type Unit = "code unit" | "code point" | "byte";

function bounds(span: Span, size: number, unit: Unit): SpanResult<readonly [number, number]> {
  const start = widenSpanValue(span.start);
  const end = widenSpanValue(span.end);
  if (start === null || end === null || end > size) {
    return spanErr(
      new SpanError(`string is too short to have the span applied (${size} ${unit}s)`, SpanErrorCode.OUT_OF_BOUNDS, {
        start: span.start,
        end: span.end,
        size,
      }),
    );
  }
  return spanOk<readonly [number, number]>([start, end]);
}

/** Offsets are UTF-16 code units (JavaScript string indices). */
export function sliceByCodeUnits(text: string, span: Span): SpanResult<string> {
  const range = bounds(span, text.length, "code unit");
  if (!range.ok) return range;
  return spanOk(text.slice(range.value[0], range.value[1]));
}

/** Offsets are Unicode code points. */
export function sliceByCodePoints(text: string, span: Span): SpanResult<string> {
  const chars = Array.from(text);
  const range = bounds(span, chars.length, "code point");
  if (!range.ok) return range;
  return spanOk(chars.slice(range.value[0], range.value[1]).join(""));
}

/** Offsets are UTF-8 bytes; both bounds must sit on a character boundary. */
export function sliceByUtf8Bytes(text: string, span: Span): SpanResult<string> {
  const bytes = utf8Encoder.encode(text);
  const range = bounds(span, bytes.length, "byte");
  if (!range.ok) return range;
  const [start, end] = range.value;
  if (!isCharBoundary(bytes, start) || !isCharBoundary(bytes, end)) {
    return spanErr(
      new SpanError("span bound is not on a UTF-8 character boundary", SpanErrorCode.OUT_OF_BOUNDS, { start, end }),
    );
  }
  return spanOk(utf8Decoder.decode(bytes.subarray(start, end)));
}

function isCharBoundary(bytes: Uint8Array, index: number): boolean {
  const byte = bytes[index];
  // Continuation bytes are 0b10xxxxxx.
  return byte === undefined || (byte & 0xc0) !== 0x80;
}

import { widenSpanValue, type Span, type SpanAlgebra, type SpanResult, type SpanWidth } from "@text-span/core";
import type { Range, TextDocument } from "vscode-languageserver-textdocument";
import { fromExternalRange } from "./external-range.js";

/*
 * LSP positions are line/character pairs in UTF-16 code units, so spans handed
 * to these helpers are expected to count code units as well.
 */

function documentOffset(value: Span["start"]): number {
  // Offsets past the safe range are past any document; positionAt clamps them to its end.
  return widenSpanValue(value) ?? Number.MAX_SAFE_INTEGER;
}

export function spanToRange(doc: TextDocument, span: Span): Range {
  return { start: doc.positionAt(documentOffset(span.start)), end: doc.positionAt(documentOffset(span.end)) };
}

export function spanToRangeOrNull(doc: TextDocument, span: Span | null | undefined): Range | null {
  if (!span) return null;
  return spanToRange(doc, span);
}

export function rangeToSpan<W extends SpanWidth>(
  doc: TextDocument,
  range: Range,
  algebra: SpanAlgebra<W>,
): SpanResult<Span<W>> {
  return fromExternalRange(algebra, { start: doc.offsetAt(range.start), end: doc.offsetAt(range.end) });
}

// Diagnostic interop adapter
//
// The only package that knows about external diagnostic shapes. The core never imports it.

export { toExternalRange, toRangeTuple, toDiagnosticSpan, fromExternalRange } from "./external-range.js";
export type { ExternalRange, DiagnosticSpan } from "./external-range.js";
export { spanToRange, spanToRangeOrNull, rangeToSpan } from "./lsp.js";

// Core package public API
//
// Span values, the span algebra, width selection, errors and debug channels.
// Import from here rather than deep paths for stability.

// === Values ===
export { SPAN_WIDTHS, spanNumeric, isSpanWidth, widenSpanValue } from "./value.js";
export type { SpanWidth, SpanValue, SpanValueOf, SpanNumeric, Ordering } from "./value.js";

// === Spans ===
export type { Span, SpanTuple } from "./span.js";
export { createSpanAlgebra } from "./algebra.js";
export type { SpanAlgebra } from "./algebra.js";
export { sliceByCodeUnits, sliceByCodePoints, sliceByUtf8Bytes } from "./slice.js";

// === Configuration ===
export {
  SPAN_WIDTH_FEATURES,
  SPAN_FEATURES_ENV_VAR,
  DEFAULT_SPAN_FEATURE,
  DEFAULT_SPAN_WIDTH,
  defaultSpans,
  defineSpanWidth,
  selectSpanWidth,
  loadSpanConfig,
} from "./config.js";
export type { SpanConfig, SpanWidthFeature, DefaultSpanWidth } from "./config.js";

// === Errors ===
export {
  SpanError,
  SpanErrorCode,
  SpanConfigError,
  SpanConfigErrorCode,
  spanOk,
  spanErr,
  unwrapSpan,
} from "./errors.js";
export type {
  SpanErrorCodeType,
  SpanErrorDetails,
  SpanConfigErrorCodeType,
  SpanResult,
} from "./errors.js";

// === Debug ===
export {
  debug,
  configureDebug,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
  DEBUG_ENV_VAR,
} from "./debug.js";
export type { Debug, DebugChannel, DebugConfig, DebugData } from "./debug.js";

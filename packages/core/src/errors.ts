/* =============================================================================
 * SPAN ERRORS
 * ============================================================================= */

/** Error codes reported by span operations */
export const SpanErrorCode = {
  /** Construction with `start > end`, or a shrink past the span's length. */
  INVALID_SPAN: "SPAN_INVALID_SPAN",
  /** Arithmetic past the width's maximum offset. */
  OVERFLOW: "SPAN_OVERFLOW",
  /** Arithmetic below offset zero. */
  UNDERFLOW: "SPAN_UNDERFLOW",
  /** Offset that is not an integer (fractional, NaN, infinite). */
  INVALID_VALUE: "SPAN_INVALID_VALUE",
  /** Span applied to a text it does not fit in. */
  OUT_OF_BOUNDS: "SPAN_OUT_OF_BOUNDS",
} as const;

export type SpanErrorCodeType = (typeof SpanErrorCode)[keyof typeof SpanErrorCode];

export type SpanErrorDetails = Readonly<Record<string, unknown>>;

/**
 * Error reported by a span operation.
 */
export class SpanError extends Error {
  constructor(
    message: string,
    public readonly code: SpanErrorCodeType,
    public readonly details?: SpanErrorDetails,
  ) {
    super(message);
    this.name = "SpanError";
  }
}

/** Error codes for width selection */
export const SpanConfigErrorCode = {
  NO_WIDTH: "SPAN_CONFIG_NO_WIDTH",
  MULTIPLE_WIDTHS: "SPAN_CONFIG_MULTIPLE_WIDTHS",
  UNKNOWN_FEATURE: "SPAN_CONFIG_UNKNOWN_FEATURE",
} as const;

export type SpanConfigErrorCodeType = (typeof SpanConfigErrorCode)[keyof typeof SpanConfigErrorCode];

/**
 * Error during width selection.
 */
export class SpanConfigError extends Error {
  constructor(
    message: string,
    public readonly code: SpanConfigErrorCodeType,
  ) {
    super(message);
    this.name = "SpanConfigError";
  }
}

export type SpanResult<T> = { ok: true; value: T } | { ok: false; error: SpanError };

export function spanOk<T>(value: T): SpanResult<T> {
  return { ok: true, value };
}

export function spanErr<T>(error: SpanError): SpanResult<T> {
  return { ok: false, error };
}

/** Return the carried value, or throw the carried error. */
export function unwrapSpan<T>(result: SpanResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

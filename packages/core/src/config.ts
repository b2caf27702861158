import { createSpanAlgebra, type SpanAlgebra } from "./algebra.js";
import { debug } from "./debug.js";
import { SpanConfigError, SpanConfigErrorCode } from "./errors.js";
import type { SpanWidth } from "./value.js";

export const SPAN_WIDTH_FEATURES = {
  "span-value-usize": "usize",
  "span-value-u128": "u128",
  "span-value-u64": "u64",
  "span-value-u32": "u32",
  "span-value-u16": "u16",
  "span-value-u8": "u8",
} as const satisfies Record<string, SpanWidth>;

export type SpanWidthFeature = keyof typeof SPAN_WIDTH_FEATURES;

export const SPAN_FEATURES_ENV_VAR = "TEXT_SPAN_FEATURES";

export const DEFAULT_SPAN_FEATURE = "span-value-u32" satisfies SpanWidthFeature;

export interface SpanConfig {
  readonly feature: SpanWidthFeature;
  readonly width: SpanWidth;
}

function isSpanWidthFeature(name: string): name is SpanWidthFeature {
  return Object.prototype.hasOwnProperty.call(SPAN_WIDTH_FEATURES, name);
}

/**
 * Pick a width in source. The tuple type admits exactly one feature, so picking
 * none or several does not compile.
 */
export function defineSpanWidth<F extends SpanWidthFeature>(
  features: readonly [F],
): (typeof SPAN_WIDTH_FEATURES)[F] {
  return SPAN_WIDTH_FEATURES[features[0]];
}

/**
 * Resolve the width from a list of enabled feature names (tooling, env, CLI flags).
 * Exactly one width feature must be enabled.
 */
export function selectSpanWidth(enabled: Iterable<string>): SpanConfig {
  const selected: SpanWidthFeature[] = [];
  for (const raw of enabled) {
    const name = raw.trim();
    if (!name) continue;
    if (!isSpanWidthFeature(name)) {
      throw new SpanConfigError(`Error: Unknown span value feature "${name}".`, SpanConfigErrorCode.UNKNOWN_FEATURE);
    }
    if (!selected.includes(name)) selected.push(name);
  }

  const [feature] = selected;
  if (feature === undefined) {
    throw new SpanConfigError(
      "Error: You must choose a span value type; enable a feature.",
      SpanConfigErrorCode.NO_WIDTH,
    );
  }
  if (selected.length > 1) {
    throw new SpanConfigError(
      `Error: You can only pick one span value type; please disable ${selected.length - 1} of your ${selected.length} features.`,
      SpanConfigErrorCode.MULTIPLE_WIDTHS,
    );
  }

  const width = SPAN_WIDTH_FEATURES[feature];
  debug.config("width.selected", { feature, width });
  return { feature, width };
}

/** Read TEXT_SPAN_FEATURES (comma separated); unset or blank means the default feature. */
export function loadSpanConfig(env: Readonly<Record<string, string | undefined>> = process.env): SpanConfig {
  const raw = env[SPAN_FEATURES_ENV_VAR]?.trim();
  if (!raw) {
    debug.config("width.default", { feature: DEFAULT_SPAN_FEATURE });
    return { feature: DEFAULT_SPAN_FEATURE, width: SPAN_WIDTH_FEATURES[DEFAULT_SPAN_FEATURE] };
  }
  return selectSpanWidth(raw.split(","));
}

export const DEFAULT_SPAN_WIDTH = defineSpanWidth([DEFAULT_SPAN_FEATURE]);

export type DefaultSpanWidth = typeof DEFAULT_SPAN_WIDTH;

/** Algebra for the default width. */
export const defaultSpans: SpanAlgebra<DefaultSpanWidth> = createSpanAlgebra(DEFAULT_SPAN_WIDTH);

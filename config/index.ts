/**
 * Library defaults
 *
 * Single source of truth for the limits applied while parsing and resolving.
 * Callers override them per call through `HumanTimeOptions`.
 */

export const humanTimeDefaults = {
  // Normalized inputs longer than this are rejected before matching
  maxInputLength: 256,
  // How many "<duration> ago at <expression>" anchors may be nested
  maxNestingDepth: 16,
} as const;

export type HumanTimeDefaults = typeof humanTimeDefaults;

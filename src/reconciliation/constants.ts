/**
 * Constants for the Software Credits Reconciliation Engine
 *
 * These are defaults only. Every run receives its thresholds explicitly
 * through `ReconcileOptions`, so tests and callers can tune them per call.
 */

import type { MatchMethod } from './types';

// ============================================
// MATCH THRESHOLDS
// ============================================

/**
 * Minimum score for a candidate pair to be considered a match.
 * Also the cut-off for the fuzzy strategy: a fuzzy ratio below this
 * value scores 0.
 *
 * Examples (normalized edit similarity):
 * - "requests" vs "requets"  → 0.875 → match
 * - "six" vs "sax"           → 0.667 → no match
 * - "yaml" vs "pyyaml"       → 0.667 → no match
 */
export const DEFAULT_MATCH_THRESHOLD = 0.8;

/**
 * Shortest key allowed to win a substring match.
 * Short keys ("io", "six", "yaml") occur inside many unrelated names,
 * so they fall through to fuzzy scoring instead.
 */
export const DEFAULT_MIN_SUBSTRING_LENGTH = 5;

// ============================================
// SCORES
// ============================================

export const EXACT_MATCH_SCORE = 1.0;

/**
 * Fixed score for substring matches. Ranked above most fuzzy ratios since
 * nested package names ("ruamel yaml" / "ruamel yaml clib") align poorly
 * character by character.
 */
export const SUBSTRING_MATCH_SCORE = 0.85;

/**
 * Tie-break priority when two candidates share the same score.
 * Higher wins.
 */
export const METHOD_PRIORITY: Readonly<Record<MatchMethod, number>> = {
  exact: 3,
  substring: 2,
  fuzzy: 1,
};

// ============================================
// VERSIONS
// ============================================

/** Sentinel used by parsers when no version could be read */
export const UNKNOWN_VERSION = 'unknown';

/**
 * Comparison operators stripped from the front of a version spec.
 * Longest first so "===" is not read as "==" followed by "=".
 */
export const VERSION_OPERATORS: readonly string[] = [
  '===',
  '==',
  '>=',
  '<=',
  '~=',
  '!=',
  '>',
  '<',
  '=',
  '^',
  '~',
];

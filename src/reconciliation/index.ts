/**
 * Software Credits Reconciliation Engine
 *
 * Pure, deterministic functions that pair components detected in a
 * repository with entries documented in its software_credits file:
 * - Name normalization
 * - Similarity scoring (exact, substring, fuzzy)
 * - Greedy exclusive assignment
 * - Version comparison
 *
 * Usage:
 * ```typescript
 * import { reconcile } from './reconciliation';
 *
 * const result = reconcile(detected, documented, 0.8);
 * console.log(result.summary); // { correct, versionMismatches, missingInDocs, missingInRepo, skipped }
 * ```
 */

// Main function
export { reconcile, resolveOptions } from './reconcile';

// Individual stages (for testing/debugging)
export { normalizeName } from './normalizeName';
export { scoreSimilarity, calculateEditSimilarity, buildScoreMatrix } from './nameSimilarity';
export { resolveMatches, compareStrings } from './resolveMatches';
export { compareVersions, normalizeVersion } from './compareVersions';
export { buildReconciliationResult } from './buildReconciliationResult';

// Constants
export {
  DEFAULT_MATCH_THRESHOLD,
  DEFAULT_MIN_SUBSTRING_LENGTH,
  EXACT_MATCH_SCORE,
  SUBSTRING_MATCH_SCORE,
  METHOD_PRIORITY,
  UNKNOWN_VERSION,
} from './constants';

// Types
export type {
  DetectedComponent,
  DocumentedComponentRecord,
  MatchMethod,
  MatchCandidate,
  MatchedComponent,
  ReconcileOptions,
  ReconciliationResult,
  ReconciliationSummary,
  ResolvedMatches,
  SimilarityOptions,
  SimilarityResult,
  SkippedComponents,
  VersionComparison,
  VersionStatus,
} from './types';

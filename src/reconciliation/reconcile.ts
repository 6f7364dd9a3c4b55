/**
 * Main Reconciliation Function
 *
 * Entry point for the engine. Pure and deterministic: the same two
 * collections always produce the same result, in the same order.
 *
 * Flow:
 * 1. Validate configuration (before any matching)
 * 2. Normalize names; set aside inputs with an empty key
 * 3. Score every remaining detected × documented pair
 * 4. Resolve exclusive pairs greedily
 * 5. Compare versions of each committed pair
 * 6. Assemble the categorized result
 */

import { ReconciliationConfigError } from '../utils/AppError';
import { buildReconciliationResult } from './buildReconciliationResult';
import { compareVersions } from './compareVersions';
import { DEFAULT_MATCH_THRESHOLD, DEFAULT_MIN_SUBSTRING_LENGTH } from './constants';
import { buildScoreMatrix } from './nameSimilarity';
import { normalizeName } from './normalizeName';
import { resolveMatches } from './resolveMatches';
import type {
  DetectedComponent,
  DocumentedComponentRecord,
  ReconcileOptions,
  ReconciliationResult,
  SimilarityOptions,
} from './types';

/**
 * Validates and completes matching options.
 *
 * @throws ReconciliationConfigError when a value is out of range
 */
export function resolveOptions(
  threshold: number,
  options: ReconcileOptions = {}
): SimilarityOptions {
  const minSubstringLength = options.minSubstringLength ?? DEFAULT_MIN_SUBSTRING_LENGTH;

  if (
    typeof threshold !== 'number' ||
    Number.isNaN(threshold) ||
    threshold < 0 ||
    threshold > 1
  ) {
    throw new ReconciliationConfigError(
      'threshold',
      `Match threshold must be a number between 0 and 1, got ${String(threshold)}`
    );
  }

  if (!Number.isInteger(minSubstringLength) || minSubstringLength < 1) {
    throw new ReconciliationConfigError(
      'minSubstringLength',
      `Minimum substring length must be a positive integer, got ${String(minSubstringLength)}`
    );
  }

  return { threshold, minSubstringLength };
}

/**
 * Splits indices into those with a usable key and those to skip.
 */
function partitionByKey(keys: readonly string[]): { eligible: number[]; skipped: number[] } {
  const eligible: number[] = [];
  const skipped: number[] = [];

  keys.forEach((key, index) => {
    (key ? eligible : skipped).push(index);
  });

  return { eligible, skipped };
}

/**
 * Reconciles detected components against documented credits records.
 *
 * @param detected - Components found in the repository
 * @param documented - Records parsed from the credits file
 * @param threshold - Minimum match score, in [0, 1]
 * @param options - Per-call overrides (substring length)
 *
 * @example
 * const result = reconcile(
 *   [{ name: 'PyYAML', versionSpec: '==5.4.1', origin: 'requirements.txt:3' }],
 *   [{ name: 'pyyaml', version: '5.4.1', rawText: '=== pyyaml ===' }]
 * );
 * // result.correct[0].method === 'exact'
 * // result.summary => { correct: 1, versionMismatches: 0, missingInDocs: 0, missingInRepo: 0, skipped: 0 }
 */
export function reconcile(
  detected: readonly DetectedComponent[],
  documented: readonly DocumentedComponentRecord[],
  threshold: number = DEFAULT_MATCH_THRESHOLD,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const similarityOptions = resolveOptions(threshold, options);

  const detectedKeys = detected.map((component) => normalizeName(component.name));
  const documentedKeys = documented.map((record) => normalizeName(record.name));

  // Empty keys are excluded from matching but still reported
  const detectedPartition = partitionByKey(detectedKeys);
  const documentedPartition = partitionByKey(documentedKeys);

  const candidates = buildScoreMatrix(detectedKeys, documentedKeys, similarityOptions);

  const resolved = resolveMatches(
    candidates,
    detectedKeys,
    documentedKeys,
    similarityOptions.threshold,
    detectedPartition.eligible,
    documentedPartition.eligible
  );

  const versions = resolved.pairs.map((pair) =>
    compareVersions(detected[pair.detectedIndex].versionSpec, documented[pair.documentedIndex].version)
  );

  return buildReconciliationResult({
    detected,
    documented,
    resolved,
    versions,
    skippedDetected: detectedPartition.skipped,
    skippedDocumented: documentedPartition.skipped,
  });
}

export default reconcile;

/**
 * Name Similarity Scoring for Software Credits Reconciliation
 *
 * Three escalating strategies, first applicable wins:
 * 1. exact     - identical keys                           → 1.0
 * 2. substring - one key nested in the other (long enough) → 0.85
 * 3. fuzzy     - normalized Levenshtein similarity        → ratio, if ≥ threshold
 *
 * All functions take keys already passed through normalizeName.
 */

import natural from 'natural';
import { EXACT_MATCH_SCORE, SUBSTRING_MATCH_SCORE } from './constants';
import type { MatchCandidate, SimilarityOptions, SimilarityResult } from './types';

const NO_MATCH: SimilarityResult = { score: 0, method: null };

/**
 * Normalized edit similarity: 1 - levenshtein(a, b) / max(|a|, |b|).
 *
 * @returns Similarity in [0, 1]
 *
 * @example
 * calculateEditSimilarity("requests", "requets") // 0.875
 * calculateEditSimilarity("yaml", "pyyaml") // ~0.667
 */
export function calculateEditSimilarity(a: string, b: string): number {
  if (!a || !b) {
    return 0;
  }

  if (a === b) {
    return 1;
  }

  const distance = natural.LevenshteinDistance(a, b);
  return 1 - distance / Math.max(a.length, b.length);
}

/**
 * Checks whether one key contains the other and the shorter one is long
 * enough to be meaningful.
 */
function isSubstringMatch(a: string, b: string, minLength: number): boolean {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];

  if (shorter.length < minLength) {
    return false;
  }

  return longer.includes(shorter);
}

/**
 * Scores two normalized keys.
 *
 * @example
 * scoreSimilarity("pyyaml", "pyyaml", opts) // { score: 1, method: 'exact' }
 * scoreSimilarity("ruamel yaml", "ruamel yaml clib", opts) // { score: 0.85, method: 'substring' }
 * scoreSimilarity("requests", "requets", opts) // { score: 0.875, method: 'fuzzy' }
 * scoreSimilarity("yaml", "pyyaml", opts) // { score: 0, method: null }
 */
export function scoreSimilarity(
  a: string,
  b: string,
  options: SimilarityOptions
): SimilarityResult {
  // Empty keys never match anything, not even each other
  if (!a || !b) {
    return NO_MATCH;
  }

  if (a === b) {
    return { score: EXACT_MATCH_SCORE, method: 'exact' };
  }

  if (isSubstringMatch(a, b, options.minSubstringLength)) {
    return { score: SUBSTRING_MATCH_SCORE, method: 'substring' };
  }

  const ratio = calculateEditSimilarity(a, b);
  if (ratio >= options.threshold && ratio > 0) {
    return { score: ratio, method: 'fuzzy' };
  }

  return NO_MATCH;
}

/**
 * Scores every detected × documented pair and keeps those with score > 0.
 * Candidates come out in row-major order (detected index, then documented).
 */
export function buildScoreMatrix(
  detectedKeys: readonly string[],
  documentedKeys: readonly string[],
  options: SimilarityOptions
): MatchCandidate[] {
  const candidates: MatchCandidate[] = [];

  detectedKeys.forEach((detectedKey, detectedIndex) => {
    documentedKeys.forEach((documentedKey, documentedIndex) => {
      const { score, method } = scoreSimilarity(detectedKey, documentedKey, options);
      if (method !== null && score > 0) {
        candidates.push({ detectedIndex, documentedIndex, score, method });
      }
    });
  });

  return candidates;
}

export default scoreSimilarity;

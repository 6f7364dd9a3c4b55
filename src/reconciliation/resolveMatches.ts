/**
 * Greedy Exclusive Assignment
 *
 * Turns the dense list of scored pairs into a 1:1 assignment between
 * detected components and documented records.
 *
 * Flow:
 * 1. Drop candidates below the threshold
 * 2. Sort by score, method priority, then names (fully deterministic)
 * 3. Walk the list, committing a pair when both sides are still free
 * 4. Everything left unconsumed becomes a leftover on its side
 *
 * This approximates maximum-weight bipartite matching without
 * backtracking: O(n·m log(n·m)) for n detected and m documented.
 */

import { METHOD_PRIORITY } from './constants';
import type { MatchCandidate, ResolvedMatches } from './types';

/**
 * Plain code-unit comparison. localeCompare depends on the runtime's ICU
 * data, which would make ordering host-dependent.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Builds the sort comparator for candidates.
 * Score and method priority descend; names and indices ascend.
 */
function byConfidence(detectedKeys: readonly string[], documentedKeys: readonly string[]) {
  return (a: MatchCandidate, b: MatchCandidate): number =>
    b.score - a.score ||
    METHOD_PRIORITY[b.method] - METHOD_PRIORITY[a.method] ||
    compareStrings(detectedKeys[a.detectedIndex], detectedKeys[b.detectedIndex]) ||
    compareStrings(documentedKeys[a.documentedIndex], documentedKeys[b.documentedIndex]) ||
    a.detectedIndex - b.detectedIndex ||
    a.documentedIndex - b.documentedIndex;
}

/**
 * Resolves competing candidates into exclusive pairs.
 *
 * @param candidates - Scored pairs, any order
 * @param detectedKeys - Normalized detected names, indexed like the input
 * @param documentedKeys - Normalized documented names, indexed like the input
 * @param threshold - Minimum score for a pair to be committed
 * @param eligibleDetected - Detected indices taking part (defaults to all)
 * @param eligibleDocumented - Documented indices taking part (defaults to all)
 *
 * @example
 * // Two detected names tie for one documented record; the detected key
 * // breaks the tie ("reqests" sorts before "requets"):
 * resolveMatches(
 *   [
 *     { detectedIndex: 0, documentedIndex: 0, score: 0.875, method: 'fuzzy' },
 *     { detectedIndex: 1, documentedIndex: 0, score: 0.875, method: 'fuzzy' },
 *   ],
 *   ['requets', 'reqests'],
 *   ['requests'],
 *   0.8
 * );
 * // Returns: { pairs: [{ detectedIndex: 1, ... }], unmatchedDetected: [0], unmatchedDocumented: [] }
 */
export function resolveMatches(
  candidates: readonly MatchCandidate[],
  detectedKeys: readonly string[],
  documentedKeys: readonly string[],
  threshold: number,
  eligibleDetected: readonly number[] = detectedKeys.map((_key, index) => index),
  eligibleDocumented: readonly number[] = documentedKeys.map((_key, index) => index)
): ResolvedMatches {
  const sorted = candidates
    .filter((candidate) => candidate.score >= threshold)
    .sort(byConfidence(detectedKeys, documentedKeys));

  const consumedDetected = new Set<number>();
  const consumedDocumented = new Set<number>();
  const pairs: MatchCandidate[] = [];

  for (const candidate of sorted) {
    if (
      consumedDetected.has(candidate.detectedIndex) ||
      consumedDocumented.has(candidate.documentedIndex)
    ) {
      continue;
    }

    consumedDetected.add(candidate.detectedIndex);
    consumedDocumented.add(candidate.documentedIndex);
    pairs.push(candidate);
  }

  return {
    pairs,
    unmatchedDetected: eligibleDetected
      .filter((index) => !consumedDetected.has(index))
      .sort((a, b) => a - b),
    unmatchedDocumented: eligibleDocumented
      .filter((index) => !consumedDocumented.has(index))
      .sort((a, b) => a - b),
  };
}

export default resolveMatches;

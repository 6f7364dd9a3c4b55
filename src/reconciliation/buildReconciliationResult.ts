/**
 * Diff Report Builder
 *
 * Pure aggregation: merges resolver and version comparator output into
 * the four-list result. Makes no decisions of its own beyond ordering.
 */

import { compareStrings } from './resolveMatches';
import type {
  DetectedComponent,
  DocumentedComponentRecord,
  MatchCandidate,
  MatchedComponent,
  ReconciliationResult,
  ResolvedMatches,
  VersionComparison,
} from './types';

export interface BuildResultParams {
  detected: readonly DetectedComponent[];
  documented: readonly DocumentedComponentRecord[];
  resolved: ResolvedMatches;
  /** Version outcome for each committed pair, same order as resolved.pairs */
  versions: readonly VersionComparison[];
  skippedDetected: readonly number[];
  skippedDocumented: readonly number[];
}

/**
 * Case-insensitive name first, raw name second, then the given fallback key.
 */
function byName<T>(name: (item: T) => string, fallback: (item: T) => string) {
  return (a: T, b: T): number =>
    compareStrings(name(a).toLowerCase(), name(b).toLowerCase()) ||
    compareStrings(name(a), name(b)) ||
    compareStrings(fallback(a), fallback(b));
}

const byDetectedName = byName<MatchedComponent>(
  (match) => match.detected.name,
  (match) => `${match.documented.name}\u0000${match.detected.origin}`
);

const byComponentName = byName<DetectedComponent>(
  (component) => component.name,
  (component) => component.origin
);

const byRecordName = byName<DocumentedComponentRecord>(
  (record) => record.name,
  (record) => record.rawText
);

function toMatchedComponent(
  pair: MatchCandidate,
  version: VersionComparison,
  detected: readonly DetectedComponent[],
  documented: readonly DocumentedComponentRecord[]
): MatchedComponent {
  return {
    detected: detected[pair.detectedIndex],
    documented: documented[pair.documentedIndex],
    score: pair.score,
    method: pair.method,
    detectedVersion: version.detectedVersion,
    documentedVersion: version.documentedVersion,
  };
}

/**
 * Assembles the final result with every list sorted for stable,
 * diffable output.
 */
export function buildReconciliationResult({
  detected,
  documented,
  resolved,
  versions,
  skippedDetected,
  skippedDocumented,
}: BuildResultParams): ReconciliationResult {
  const correct: MatchedComponent[] = [];
  const versionMismatches: MatchedComponent[] = [];

  resolved.pairs.forEach((pair, index) => {
    const version = versions[index];
    const match = toMatchedComponent(pair, version, detected, documented);

    if (version.status === 'version_mismatch') {
      versionMismatches.push(match);
    } else {
      correct.push(match);
    }
  });

  const missingInDocs = resolved.unmatchedDetected.map((index) => detected[index]);
  const missingInRepo = resolved.unmatchedDocumented.map((index) => documented[index]);
  const skipped = {
    detected: skippedDetected.map((index) => detected[index]),
    documented: skippedDocumented.map((index) => documented[index]),
  };

  correct.sort(byDetectedName);
  versionMismatches.sort(byDetectedName);
  missingInDocs.sort(byComponentName);
  missingInRepo.sort(byRecordName);
  skipped.detected.sort(byComponentName);
  skipped.documented.sort(byRecordName);

  return {
    correct,
    versionMismatches,
    missingInDocs,
    missingInRepo,
    skipped,
    summary: {
      correct: correct.length,
      versionMismatches: versionMismatches.length,
      missingInDocs: missingInDocs.length,
      missingInRepo: missingInRepo.length,
      skipped: skipped.detected.length + skipped.documented.length,
    },
  };
}

export default buildReconciliationResult;

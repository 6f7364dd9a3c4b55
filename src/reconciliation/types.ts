/**
 * Type Definitions for the Software Credits Reconciliation Engine
 *
 * These types define the input/output contracts for the engine.
 * The engine is pure and deterministic - no I/O, no shared state.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * A component found by scanning a repository (dependency manifest,
 * inventory export, ...).
 */
export interface DetectedComponent {
  readonly name: string;
  /** Version constraint as written, e.g. "==5.4.1" or ">=1.0,<2.0" */
  readonly versionSpec?: string;
  /** Where it was found, e.g. "requirements.txt:12" */
  readonly origin: string;
}

/**
 * An entry parsed from a free-text software_credits file.
 */
export interface DocumentedComponentRecord {
  readonly name: string;
  /** Version as documented, or the "unknown" sentinel */
  readonly version: string;
  readonly url?: string;
  /** Original text block, kept for traceability */
  readonly rawText: string;
}

// ============================================
// MATCHING TYPES
// ============================================

export type MatchMethod = 'exact' | 'substring' | 'fuzzy';

/**
 * Result of comparing two normalized keys.
 * `method` is null when the keys do not match at all.
 */
export interface SimilarityResult {
  score: number;
  method: MatchMethod | null;
}

/**
 * One scored detected × documented pair. Internal to the engine.
 */
export interface MatchCandidate {
  detectedIndex: number;
  documentedIndex: number;
  score: number;
  method: MatchMethod;
}

export interface SimilarityOptions {
  /** Minimum fuzzy ratio, in [0, 1] */
  threshold: number;
  /** Shortest key allowed to win a substring match */
  minSubstringLength: number;
}

export type ReconcileOptions = Partial<Pick<SimilarityOptions, 'minSubstringLength'>>;

/**
 * Output of the greedy exclusive assignment.
 */
export interface ResolvedMatches {
  pairs: MatchCandidate[];
  unmatchedDetected: number[];
  unmatchedDocumented: number[];
}

export type VersionStatus = 'correct' | 'version_mismatch';

export interface VersionComparison {
  status: VersionStatus;
  /** Bare version tokens, null when absent or unknown */
  detectedVersion: string | null;
  documentedVersion: string | null;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * A committed detected ↔ documented pair.
 */
export interface MatchedComponent {
  detected: DetectedComponent;
  documented: DocumentedComponentRecord;
  score: number;
  method: MatchMethod;
  detectedVersion: string | null;
  documentedVersion: string | null;
}

export interface SkippedComponents {
  detected: DetectedComponent[];
  documented: DocumentedComponentRecord[];
}

export interface ReconciliationSummary {
  correct: number;
  versionMismatches: number;
  missingInDocs: number;
  missingInRepo: number;
  skipped: number;
}

/**
 * The sole output of the engine.
 *
 * Every detected component appears in exactly one of correct,
 * versionMismatches, missingInDocs or skipped.detected; every documented
 * record in exactly one of correct, versionMismatches, missingInRepo or
 * skipped.documented.
 */
export interface ReconciliationResult {
  correct: MatchedComponent[];
  versionMismatches: MatchedComponent[];
  missingInDocs: DetectedComponent[];
  missingInRepo: DocumentedComponentRecord[];
  /** Inputs whose name normalizes to the empty string */
  skipped: SkippedComponents;
  summary: ReconciliationSummary;
}

/**
 * Reconciliation Service for Software Credits
 *
 * Handles business logic around reconciliation runs:
 * - Turning raw inputs (component lists, requirements text, inventory CSV,
 *   credits text) into engine inputs
 * - Running the engine with configured defaults
 * - Keeping recent reports in memory for later retrieval
 *
 * This service is the orchestration layer between routes and the engine.
 */

import { randomUUID } from 'crypto';
import { env } from '../config';
import { parsePyproject, type ManifestParseResult } from '../parsers/pyproject';
import { parseRequirements } from '../parsers/requirements';
import { parseSetupPy } from '../parsers/setupPy';
import { parseSoftwareCredits } from '../parsers/softwareCredits';
import { reconcile } from '../reconciliation';
import type {
  DetectedComponent,
  DocumentedComponentRecord,
  ReconciliationResult,
  ReconciliationSummary,
} from '../reconciliation';
import { AppError, Logging, logger } from '../utils';
import { parseInventoryCsv } from '../utils/csv';

// ============================================
// Types
// ============================================

/**
 * Where the detected side comes from. Exactly one form is used.
 */
export type DetectedInput =
  | { kind: 'components'; components: DetectedComponent[] }
  | { kind: 'requirements'; content: string; source?: string }
  | { kind: 'csv'; content: string; source?: string }
  | { kind: 'pyproject'; content: string; source?: string }
  | { kind: 'setup-py'; content: string; source?: string };

/**
 * Where the documented side comes from. Absent means no credits file.
 */
export type DocumentedInput =
  | { kind: 'records'; records: DocumentedComponentRecord[] }
  | { kind: 'credits'; content: string };

export interface RunReconciliationParams {
  repoPath?: string;
  detected: DetectedInput;
  documented?: DocumentedInput;
  threshold?: number;
  minSubstringLength?: number;
}

export interface ReconciliationReport {
  id: string;
  repoPath: string;
  softwareCreditsExists: boolean;
  threshold: number;
  minSubstringLength: number;
  createdAt: string;
  result: ReconciliationResult;
}

export interface ReportListItem {
  id: string;
  repoPath: string;
  softwareCreditsExists: boolean;
  createdAt: string;
  summary: ReconciliationSummary;
}

// ============================================
// Report Store
// ============================================

/**
 * Bounded in-memory store. Oldest reports are evicted first.
 */
export class ReportStore {
  private readonly reports = new Map<string, ReconciliationReport>();

  constructor(private readonly capacity: number) {}

  save(report: ReconciliationReport): void {
    this.reports.set(report.id, report);

    while (this.reports.size > this.capacity) {
      const oldest = this.reports.keys().next();
      if (oldest.done) break;
      this.reports.delete(oldest.value);
    }
  }

  get(id: string): ReconciliationReport | undefined {
    return this.reports.get(id);
  }

  /** Newest first */
  list(): ReconciliationReport[] {
    return [...this.reports.values()].reverse();
  }

  clear(): void {
    this.reports.clear();
  }

  get size(): number {
    return this.reports.size;
  }
}

export const reportStore = new ReportStore(env.MAX_STORED_REPORTS);

// ============================================
// Input Resolution
// ============================================

/**
 * Turns the detected input into components.
 */
export async function resolveDetected(input: DetectedInput): Promise<DetectedComponent[]> {
  switch (input.kind) {
    case 'components':
      return input.components;

    case 'requirements': {
      const { components, errors } = parseRequirements(input.content, input.source);
      for (const { lineNumber, line } of errors) {
        logger.warn(`Could not parse requirements line ${lineNumber}: ${line}`);
      }
      return components;
    }

    case 'csv':
      try {
        const { components } = await parseInventoryCsv(input.content, input.source);
        return components;
      } catch (error) {
        throw AppError.badRequest(`Invalid inventory CSV: ${errorMessage(error)}`);
      }

    case 'pyproject': {
      let parsed: ManifestParseResult;
      try {
        parsed = parsePyproject(input.content, input.source);
      } catch (error) {
        throw AppError.badRequest(`Invalid pyproject.toml: ${errorMessage(error)}`);
      }
      return withSkippedWarnings(parsed, input.source ?? 'pyproject.toml');
    }

    case 'setup-py':
      return withSkippedWarnings(
        parseSetupPy(input.content, input.source),
        input.source ?? 'setup.py'
      );
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function withSkippedWarnings(
  { components, skipped }: ManifestParseResult,
  source: string
): DetectedComponent[] {
  for (const entry of skipped) {
    logger.warn(`Could not parse dependency in ${source}: ${entry}`);
  }
  return components;
}

/**
 * Turns the documented input into records.
 * An absent input is treated as a missing credits file.
 */
export function resolveDocumented(input: DocumentedInput | undefined): {
  records: DocumentedComponentRecord[];
  exists: boolean;
} {
  if (!input) {
    return { records: [], exists: false };
  }

  if (input.kind === 'records') {
    return { records: input.records, exists: true };
  }

  const parsed = parseSoftwareCredits(input.content);
  if (parsed.isPlaceholder) {
    logger.info('software_credits declares no third party components');
  }
  logger.debug(`Parsed ${parsed.components.length} components from software_credits`);

  return { records: parsed.components, exists: true };
}

// ============================================
// Reconciliation Runs
// ============================================

/**
 * Runs a reconciliation and stores the resulting report.
 *
 * @throws ReconciliationConfigError for an out-of-range threshold
 */
export async function runReconciliation(
  params: RunReconciliationParams
): Promise<ReconciliationReport> {
  const threshold = params.threshold ?? env.MATCH_THRESHOLD;
  const minSubstringLength = params.minSubstringLength ?? env.MIN_SUBSTRING_LENGTH;

  const detected = await resolveDetected(params.detected);
  const { records, exists } = resolveDocumented(params.documented);

  const result = reconcile(detected, records, threshold, { minSubstringLength });

  const report: ReconciliationReport = {
    id: randomUUID(),
    repoPath: params.repoPath ?? '.',
    softwareCreditsExists: exists,
    threshold,
    minSubstringLength,
    createdAt: new Date().toISOString(),
    result,
  };

  reportStore.save(report);
  logSummary(report);

  return report;
}

/**
 * Gets a stored report by id.
 *
 * @throws AppError 404 when the report is unknown or was evicted
 */
export function getReport(id: string): ReconciliationReport {
  const report = reportStore.get(id);
  if (!report) {
    throw AppError.notFound(`Reconciliation report ${id} not found`);
  }
  return report;
}

/**
 * Lists stored reports, newest first, without their component lists.
 */
export function listReports(): ReportListItem[] {
  return reportStore.list().map(({ id, repoPath, softwareCreditsExists, createdAt, result }) => ({
    id,
    repoPath,
    softwareCreditsExists,
    createdAt,
    summary: result.summary,
  }));
}

function logSummary({ id, repoPath, softwareCreditsExists, result }: ReconciliationReport): void {
  const { summary } = result;

  if (!softwareCreditsExists) {
    Logging.warn(`software_credits not found for ${repoPath}: ${summary.missingInDocs} components undocumented`);
  }

  Logging.info(
    `Reconciliation ${id} (${repoPath}): ${summary.correct} correct, ` +
      `${summary.missingInDocs} missing in docs, ${summary.missingInRepo} missing in repo, ` +
      `${summary.versionMismatches} version mismatches, ${summary.skipped} skipped`
  );
}

export const reconciliationService = {
  runReconciliation,
  getReport,
  listReports,
  resolveDetected,
  resolveDocumented,
};

export default reconciliationService;

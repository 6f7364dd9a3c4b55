/**
 * CSV Utilities for inventory exports
 *
 * Scanners can export what they detected as a CSV file:
 *
 * ```
 * name,version_spec,origin
 * PyYAML,==5.4.1,requirements.txt:3
 * jquery,3.6.0,static/vendor/jquery
 * ```
 *
 * Only `name` is required. `version` is accepted in place of `version_spec`.
 */

import { parse } from 'csv-parse';
import { z } from 'zod';
import type { DetectedComponent } from '../reconciliation/types';

/**
 * Required columns in the CSV file
 */
const REQUIRED_COLUMNS = ['name'] as const;

const rowsSchema = z.array(z.record(z.string()));

export type InventoryCsvRow = Record<string, string>;

export interface InventoryCsvResult {
  components: DetectedComponent[];
  stats: { total: number };
}

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers
 */
export function validateCsvHeaders(headers: string[]): { valid: boolean; missing: string[] } {
  const normalizedHeaders = headers.map((h) => h.toLowerCase().trim());
  const missing = REQUIRED_COLUMNS.filter((col) => !normalizedHeaders.includes(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

/**
 * Maps one CSV row to a detected component.
 * Rows with an empty name are kept; the engine reports them as skipped.
 */
export function parseRow(row: InventoryCsvRow, lineNumber: number, source: string): DetectedComponent {
  const versionSpec = (row.version_spec ?? row.version ?? '').trim();
  const origin = (row.origin ?? '').trim() || `${source}:${lineNumber}`;

  return {
    name: (row.name ?? '').trim(),
    ...(versionSpec ? { versionSpec } : {}),
    origin,
  };
}

// ============================================
// Parser
// ============================================

/**
 * Parses the text of an inventory CSV file.
 *
 * @param content - CSV text with a header row
 * @param source - File name used for rows without an origin column
 */
export async function parseInventoryCsv(
  content: string,
  source = 'inventory.csv'
): Promise<InventoryCsvResult> {
  const records = await new Promise<unknown>((resolve, reject) => {
    parse(
      content,
      {
        columns: (headers: string[]) => headers.map((h) => h.toLowerCase().trim()),
        skip_empty_lines: true,
        trim: true,
      },
      (error, output: unknown) => {
        if (error) {
          reject(error);
        } else {
          resolve(output);
        }
      }
    );
  });

  const rows = rowsSchema.parse(records);
  const headers = rows.length > 0 ? Object.keys(rows[0]) : readHeaderLine(content);

  const validation = validateCsvHeaders(headers);
  if (!validation.valid) {
    throw new Error(`Missing required CSV columns: ${validation.missing.join(', ')}`);
  }

  // The header is line 1
  const components = rows.map((row, index) => parseRow(row, index + 2, source));

  return { components, stats: { total: components.length } };
}

/**
 * Header of a file without data rows.
 */
function readHeaderLine(content: string): string[] {
  const firstLine = content.split(/\r?\n/).find((line) => line.trim()) ?? '';
  return firstLine ? firstLine.split(',') : [];
}

export default {
  parseInventoryCsv,
  parseRow,
  validateCsvHeaders,
};

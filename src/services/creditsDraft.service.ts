/**
 * Draft software_credits generator
 *
 * Builds the credits file a reviewer would end up with after applying a
 * reconciliation report: documented sections that still match are kept,
 * undocumented components get a stub section to fill in, and sections for
 * components no longer in the repository are left out.
 */

import { hasVersionLine } from '../parsers/softwareCredits';
import { normalizeVersion } from '../reconciliation';
import type { DetectedComponent, MatchedComponent } from '../reconciliation';
import type { ReconciliationReport } from './reconciliation.service';

const LINE_WIDTH = 80;
const STUB_BODY = 'License and copyright notice to be added.';

interface DraftSection {
  name: string;
  url?: string;
  content: string;
}

/**
 * Builds a section header padded with "=" to the line width.
 *
 * @example
 * formatSectionHeader("six", "https://pypi.org/project/six")
 * // "=== six (https://pypi.org/project/six) =====...====="
 */
export function formatSectionHeader(name: string, url?: string): string {
  const header = url ? `=== ${name} (${url})` : `=== ${name}`;
  return `${header} ${'='.repeat(Math.max(LINE_WIDTH - header.length - 1, 3))}`;
}

/**
 * Section body of a documented record, without its header line.
 */
function documentedBody(match: MatchedComponent): string {
  const [, ...bodyLines] = match.documented.rawText.split('\n');
  return bodyLines.join('\n').trim();
}

/**
 * A version read from the header name is lost with the header line, so it
 * is written back as a Version line.
 */
function keptSection(match: MatchedComponent): DraftSection {
  const body = documentedBody(match);
  const { documentedVersion } = match;

  if (documentedVersion === null || hasVersionLine(body)) {
    return { name: match.documented.name, url: match.documented.url, content: body };
  }

  const versionLine = `Version: ${documentedVersion}`;

  return {
    name: match.documented.name,
    url: match.documented.url,
    content: body ? `${versionLine}\n${body}` : versionLine,
  };
}

/**
 * A mismatched section keeps its text; the Version line is rewritten to
 * the detected version.
 */
function updatedSection(match: MatchedComponent): DraftSection {
  const body = documentedBody(match).replace(/^[ \t]*version[ \t]*:.*(\r?\n|$)/im, '').trim();
  const versionLine = `Version: ${match.detectedVersion ?? 'unknown'}`;

  return {
    name: match.documented.name,
    url: match.documented.url,
    content: body ? `${versionLine}\n${body}` : versionLine,
  };
}

function stubSection(component: DetectedComponent): DraftSection {
  const lines = [`Detected at: ${component.origin}`];
  const version = normalizeVersion(component.versionSpec);
  if (version) {
    lines.unshift(`Version: ${version}`);
  }
  lines.push('', STUB_BODY);

  return { name: component.name, content: lines.join('\n') };
}

/**
 * Generates draft software_credits content from a report.
 *
 * @param report - A stored reconciliation report
 * @param projectName - Name used in the header sentence
 */
export function generateCreditsDraft(report: ReconciliationReport, projectName: string): string {
  const { result } = report;

  const sections: DraftSection[] = [
    ...result.correct.map(keptSection),
    ...result.versionMismatches.map(updatedSection),
    ...result.missingInDocs.map(stubSection),
  ];

  sections.sort((a, b) => {
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });

  const lines = [
    'The following licenses and copyright notices apply to various components',
    `of ${projectName} as outlined below.`,
    '',
    '',
  ];

  for (const section of sections) {
    lines.push(formatSectionHeader(section.name, section.url), '');
    if (section.content) {
      lines.push(section.content, '');
    }
    lines.push('');
  }

  return lines.join('\n');
}

export default generateCreditsDraft;

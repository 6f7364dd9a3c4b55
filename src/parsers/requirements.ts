/**
 * Parser for requirements.txt dependency manifests
 *
 * Handles:
 * - Simple package names and version specifiers (==, >=, ~=, ...)
 * - Comments, blank lines and option lines (-r, -c, --index-url)
 * - Extras ("requests[socks]") and environment markers ("; python_version < '3.8'")
 * - git+ URLs and editable installs, reported with an unknown version
 */

import { UNKNOWN_VERSION } from '../reconciliation/constants';
import type { DetectedComponent } from '../reconciliation/types';

export const EDITABLE_OR_GIT_DEPENDENCY = '<editable-or-git-dependency>';

const REQUIREMENT = /^([A-Za-z0-9_.-]+)(\[[^\]]+\])?(.*)$/;

export interface RequirementsParseResult {
  components: DetectedComponent[];
  /** Lines that looked like requirements but could not be read */
  errors: Array<{ lineNumber: number; line: string }>;
}

/**
 * Parses a single requirements line (already stripped of comments).
 *
 * @returns name and version spec, or null when the line is not a requirement
 *
 * @example
 * parseRequirementLine("PyYAML==5.4.1") // { name: "PyYAML", versionSpec: "==5.4.1" }
 * parseRequirementLine("requests[socks] >=2.0 ; python_version > '3'") // { name: "requests", versionSpec: ">=2.0" }
 */
export function parseRequirementLine(line: string): { name: string; versionSpec: string } | null {
  const withoutMarker = line.split(';')[0].trim();
  const match = withoutMarker.match(REQUIREMENT);

  if (!match) {
    return null;
  }

  const versionSpec = match[3].trim();

  // Bare URLs ("https://...") are not requirements
  if (versionSpec.startsWith(':')) {
    return null;
  }

  // Direct references ("name @ https://...") carry no version
  if (!versionSpec || versionSpec.startsWith('@')) {
    return { name: match[1], versionSpec: UNKNOWN_VERSION };
  }

  return { name: match[1], versionSpec };
}

/**
 * Parses the text of a requirements file.
 *
 * @param content - File contents
 * @param source - File name used to build each component's origin
 */
export function parseRequirements(
  content: string,
  source = 'requirements.txt'
): RequirementsParseResult {
  const components: DetectedComponent[] = [];
  const errors: RequirementsParseResult['errors'] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();

    if (!line || line.startsWith('#')) {
      return;
    }

    const origin = `${source}:${lineNumber}`;

    // Editable installs and VCS URLs have no package name to match on
    if (line.startsWith('-e') || line.includes('git+')) {
      components.push({ name: EDITABLE_OR_GIT_DEPENDENCY, versionSpec: UNKNOWN_VERSION, origin });
      return;
    }

    // Other pip options (-r, -c, --index-url, ...)
    if (line.startsWith('-')) {
      return;
    }

    const parsed = parseRequirementLine(line.split('#')[0]);
    if (!parsed) {
      errors.push({ lineNumber, line });
      return;
    }

    components.push({ ...parsed, origin });
  });

  return { components, errors };
}

export default parseRequirements;

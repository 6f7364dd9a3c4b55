/**
 * Version Comparison for matched components
 *
 * Versions are compared as bare, case-insensitive tokens, not as semantic
 * versions: "v1.2.3" and "1.2.3.0" are different tokens.
 */

import { UNKNOWN_VERSION, VERSION_OPERATORS } from './constants';
import type { VersionComparison } from './types';

/**
 * Reduces a version spec to a bare token.
 *
 * Only the first clause of a compound constraint is kept, then any leading
 * comparison operators are stripped.
 *
 * @returns The token, or null when absent or "unknown"
 *
 * @example
 * normalizeVersion("==5.4.1") // "5.4.1"
 * normalizeVersion(" >= 2.0 , <3") // "2.0"
 * normalizeVersion("unknown") // null
 */
export function normalizeVersion(spec: string | undefined | null): string | null {
  if (!spec || typeof spec !== 'string') {
    return null;
  }

  let token = spec.split(',')[0].trim();

  let stripped = true;
  while (stripped) {
    stripped = false;
    for (const operator of VERSION_OPERATORS) {
      if (token.startsWith(operator)) {
        token = token.slice(operator.length).trimStart();
        stripped = true;
        break;
      }
    }
  }

  token = token.trim();

  if (!token || token.toLowerCase() === UNKNOWN_VERSION) {
    return null;
  }

  return token;
}

/**
 * Decides whether a matched pair's versions agree.
 *
 * A missing version on either side cannot be verified and is reported as
 * correct; the reviewer still sees the pair with its origin and raw text.
 *
 * @example
 * compareVersions("==5.4.1", "5.4.1") // { status: 'correct', ... }
 * compareVersions("==5.4.1", "5.1") // { status: 'version_mismatch', ... }
 * compareVersions(undefined, "5.1") // { status: 'correct', detectedVersion: null, ... }
 */
export function compareVersions(
  detectedSpec: string | undefined,
  documentedVersion: string | undefined
): VersionComparison {
  const detectedVersion = normalizeVersion(detectedSpec);
  const documented = normalizeVersion(documentedVersion);

  if (detectedVersion === null || documented === null) {
    return { status: 'correct', detectedVersion, documentedVersion: documented };
  }

  const status =
    detectedVersion.toLowerCase() === documented.toLowerCase() ? 'correct' : 'version_mismatch';

  return { status, detectedVersion, documentedVersion: documented };
}

export default compareVersions;

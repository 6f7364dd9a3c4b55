/**
 * install_requires extraction from setup.py
 *
 * The file is never executed. Quoted strings are read from the
 * `install_requires=[...]` list literal up to its closing bracket;
 * lists built at run time are not seen.
 */

import { parseRequirementLine } from './requirements';
import type { ManifestParseResult } from './pyproject';

const INSTALL_REQUIRES = /install_requires\s*=\s*\[/;

/**
 * Quoted strings of a list literal starting at `start`, up to the first
 * unquoted "]". Comments are skipped.
 */
export function readListStrings(content: string, start: number): string[] {
  const strings: string[] = [];
  let index = start;

  while (index < content.length) {
    const char = content[index];

    if (char === ']') break;

    if (char === '#') {
      const newline = content.indexOf('\n', index);
      index = newline === -1 ? content.length : newline;
      continue;
    }

    if (char === '"' || char === "'") {
      const end = content.indexOf(char, index + 1);
      if (end === -1) break;
      strings.push(content.slice(index + 1, end));
      index = end + 1;
      continue;
    }

    index += 1;
  }

  return strings;
}

/**
 * Parses the install_requires list of a setup.py file.
 *
 * @example
 * parseSetupPy("setup(install_requires=['requests[socks]>=2.0', 'six'])").components
 * // [{ name: 'requests', versionSpec: '>=2.0', ... }, { name: 'six', versionSpec: 'unknown', ... }]
 */
export function parseSetupPy(content: string, source = 'setup.py'): ManifestParseResult {
  const result: ManifestParseResult = { components: [], skipped: [] };

  const match = INSTALL_REQUIRES.exec(content);
  if (!match) {
    return result;
  }

  const origin = `${source}:install_requires`;

  for (const entry of readListStrings(content, match.index + match[0].length)) {
    const parsed = parseRequirementLine(entry);
    if (parsed) {
      result.components.push({ ...parsed, origin });
    } else {
      result.skipped.push(entry);
    }
  }

  return result;
}

export default parseSetupPy;

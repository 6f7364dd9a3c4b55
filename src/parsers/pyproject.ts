/**
 * Parser for pyproject.toml dependency tables
 *
 * Reads:
 * - [project] dependencies (PEP 508 strings)
 * - [project.optional-dependencies] groups
 * - [tool.poetry.dependencies], without the "python" constraint
 */

import { parse as parseToml } from '@iarna/toml';
import { z } from 'zod';
import { UNKNOWN_VERSION } from '../reconciliation/constants';
import type { DetectedComponent } from '../reconciliation/types';
import { parseRequirementLine } from './requirements';

const poetryDependencySchema = z.union([
  z.string(),
  z.object({ version: z.string().optional() }),
  z.array(z.unknown()),
]);

const pyprojectSchema = z.object({
  project: z
    .object({
      dependencies: z.array(z.string()).default([]),
      'optional-dependencies': z.record(z.array(z.string())).default({}),
    })
    .default({}),
  tool: z
    .object({
      poetry: z
        .object({
          dependencies: z.record(poetryDependencySchema).default({}),
        })
        .default({}),
    })
    .default({}),
});

type PoetryDependency = z.infer<typeof poetryDependencySchema>;

export interface ManifestParseResult {
  components: DetectedComponent[];
  /** Entries that are not readable requirements */
  skipped: string[];
}

/**
 * Poetry constraints are a string, a table with a version key, or a list
 * of per-platform tables. Only the first two carry a usable version.
 */
function poetryVersion(dependency: PoetryDependency): string {
  if (typeof dependency === 'string') {
    return dependency.trim() === '*' ? UNKNOWN_VERSION : dependency;
  }
  if (Array.isArray(dependency)) {
    return UNKNOWN_VERSION;
  }
  return dependency.version ?? UNKNOWN_VERSION;
}

function collect(
  entries: readonly string[],
  origin: string,
  result: ManifestParseResult
): void {
  for (const entry of entries) {
    const parsed = parseRequirementLine(entry);
    if (parsed) {
      result.components.push({ ...parsed, origin });
    } else {
      result.skipped.push(entry);
    }
  }
}

/**
 * Parses the text of a pyproject.toml file.
 *
 * @param source - File name used as the origin prefix
 * @throws Error when the text is not valid TOML or a table has the wrong shape
 *
 * @example
 * parsePyproject('[project]\ndependencies = ["PyYAML==5.4.1"]').components
 * // [{ name: 'PyYAML', versionSpec: '==5.4.1', origin: 'pyproject.toml:project.dependencies' }]
 */
export function parsePyproject(content: string, source = 'pyproject.toml'): ManifestParseResult {
  const data = pyprojectSchema.parse(parseToml(content));
  const result: ManifestParseResult = { components: [], skipped: [] };

  collect(data.project.dependencies, `${source}:project.dependencies`, result);

  for (const [group, entries] of Object.entries(data.project['optional-dependencies'])) {
    collect(entries, `${source}:project.optional-dependencies.${group}`, result);
  }

  const poetryOrigin = `${source}:tool.poetry.dependencies`;
  for (const [name, dependency] of Object.entries(data.tool.poetry.dependencies)) {
    if (name.toLowerCase() === 'python') continue;
    result.components.push({ name, versionSpec: poetryVersion(dependency), origin: poetryOrigin });
  }

  return result;
}

export default parsePyproject;

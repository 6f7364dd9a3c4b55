/**
 * Tests for pyproject.toml dependency parsing
 */

import { parsePyproject } from '../../src/parsers/pyproject';

const PYPROJECT = `
[project]
name = "billing"
dependencies = [
  "PyYAML==5.4.1",
  "requests[socks]>=2.0; python_version > '3.7'",
  "https://example.com/archive.tar.gz",
]

[project.optional-dependencies]
test = ["pytest>=7"]

[tool.poetry.dependencies]
python = "^3.10"
six = "^1.16"
certifi = "*"
ruamel-yaml = { version = "0.17.21", optional = true }
tool = { git = "https://git.example.com/team/tool.git" }
`;

describe('parsePyproject', () => {
  const result = parsePyproject(PYPROJECT);

  it('should read every dependency table with table-specific origins', () => {
    expect(result.components).toEqual([
      { name: 'PyYAML', versionSpec: '==5.4.1', origin: 'pyproject.toml:project.dependencies' },
      { name: 'requests', versionSpec: '>=2.0', origin: 'pyproject.toml:project.dependencies' },
      {
        name: 'pytest',
        versionSpec: '>=7',
        origin: 'pyproject.toml:project.optional-dependencies.test',
      },
      { name: 'six', versionSpec: '^1.16', origin: 'pyproject.toml:tool.poetry.dependencies' },
      { name: 'certifi', versionSpec: 'unknown', origin: 'pyproject.toml:tool.poetry.dependencies' },
      {
        name: 'ruamel-yaml',
        versionSpec: '0.17.21',
        origin: 'pyproject.toml:tool.poetry.dependencies',
      },
      { name: 'tool', versionSpec: 'unknown', origin: 'pyproject.toml:tool.poetry.dependencies' },
    ]);
  });

  it('should skip the python constraint', () => {
    expect(result.components.map((component) => component.name)).not.toContain('python');
  });

  it('should report unreadable entries', () => {
    expect(result.skipped).toEqual(['https://example.com/archive.tar.gz']);
  });

  it('should use the given source in origins', () => {
    const parsed = parsePyproject('[project]\ndependencies = ["six"]\n', 'libs/core/pyproject.toml');

    expect(parsed.components).toEqual([
      { name: 'six', versionSpec: 'unknown', origin: 'libs/core/pyproject.toml:project.dependencies' },
    ]);
  });

  it('should return nothing for a file without dependency tables', () => {
    expect(parsePyproject('[tool.black]\nline-length = 100\n')).toEqual({
      components: [],
      skipped: [],
    });
  });

  it('should reject invalid TOML', () => {
    expect(() => parsePyproject('[project\ndependencies = [')).toThrow();
  });

  it('should reject a dependency table of the wrong shape', () => {
    expect(() => parsePyproject('[project]\ndependencies = "six"\n')).toThrow();
  });
});

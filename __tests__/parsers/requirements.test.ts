/**
 * Tests for requirements.txt parsing
 */

import {
  EDITABLE_OR_GIT_DEPENDENCY,
  parseRequirementLine,
  parseRequirements,
} from '../../src/parsers/requirements';

describe('parseRequirementLine', () => {
  it.each([
    ['PyYAML==5.4.1', { name: 'PyYAML', versionSpec: '==5.4.1' }],
    ['requests >= 2.0', { name: 'requests', versionSpec: '>= 2.0' }],
    ['requests[socks]~=2.31', { name: 'requests', versionSpec: '~=2.31' }],
    ["idna>=3.4 ; python_version > '3.7'", { name: 'idna', versionSpec: '>=3.4' }],
    ['six', { name: 'six', versionSpec: 'unknown' }],
    ['pkg @ https://example.com/pkg-1.0.whl', { name: 'pkg', versionSpec: 'unknown' }],
  ])('should parse %p', (line, expected) => {
    expect(parseRequirementLine(line)).toEqual(expected);
  });

  it.each([['https://example.com/pkg.tar.gz'], ['!!not-a-package']])(
    'should reject %p',
    (line) => {
      expect(parseRequirementLine(line)).toBeNull();
    }
  );
});

describe('parseRequirements', () => {
  const content = [
    '# runtime dependencies',
    'PyYAML==5.4.1',
    "requests[socks] >= 2.0 ; python_version > '3'",
    '',
    '-r base.txt',
    '--index-url https://pypi.example.com/simple',
    '-e git+https://git.example.com/team/tool.git#egg=tool',
    'certifi  # pinned by the OS',
    'six',
    'name @ https://example.com/name-1.0.whl',
    'https://example.com/archive.tar.gz',
  ].join('\n');

  const result = parseRequirements(content);

  it('should parse requirements with line-numbered origins', () => {
    expect(result.components).toEqual([
      { name: 'PyYAML', versionSpec: '==5.4.1', origin: 'requirements.txt:2' },
      { name: 'requests', versionSpec: '>= 2.0', origin: 'requirements.txt:3' },
      {
        name: EDITABLE_OR_GIT_DEPENDENCY,
        versionSpec: 'unknown',
        origin: 'requirements.txt:7',
      },
      { name: 'certifi', versionSpec: 'unknown', origin: 'requirements.txt:8' },
      { name: 'six', versionSpec: 'unknown', origin: 'requirements.txt:9' },
      { name: 'name', versionSpec: 'unknown', origin: 'requirements.txt:10' },
    ]);
  });

  it('should report unreadable lines', () => {
    expect(result.errors).toEqual([{ lineNumber: 11, line: 'https://example.com/archive.tar.gz' }]);
  });

  it('should use the given source in origins', () => {
    const parsed = parseRequirements('\r\nflask==3.0.0\r\n', 'requirements/dev.txt');

    expect(parsed.components).toEqual([
      { name: 'flask', versionSpec: '==3.0.0', origin: 'requirements/dev.txt:2' },
    ]);
    expect(parsed.errors).toEqual([]);
  });
});

/**
 * Tests for Name Normalization
 */

import { normalizeName } from '../../src/reconciliation/normalizeName';

describe('normalizeName', () => {
  describe('basic transformations', () => {
    it('should convert to lowercase', () => {
      expect(normalizeName('PyYAML')).toBe('pyyaml');
    });

    it('should replace dots, underscores and hyphens with spaces', () => {
      expect(normalizeName('ruamel.yaml')).toBe('ruamel yaml');
      expect(normalizeName('typing_extensions')).toBe('typing extensions');
      expect(normalizeName('python-dateutil')).toBe('python dateutil');
    });

    it('should collapse runs of separators and whitespace', () => {
      expect(normalizeName('a._-b')).toBe('a b');
      expect(normalizeName('Open   Sans')).toBe('open sans');
      expect(normalizeName('\tFoo\nBar')).toBe('foo bar');
    });

    it('should trim whitespace and trailing separators', () => {
      expect(normalizeName('  Open Sans  ')).toBe('open sans');
      expect(normalizeName('zope.interface-')).toBe('zope interface');
    });
  });

  describe('edge cases', () => {
    it('should handle empty string', () => {
      expect(normalizeName('')).toBe('');
    });

    it('should return empty string for whitespace or separators only', () => {
      expect(normalizeName('   ')).toBe('');
      expect(normalizeName('._-')).toBe('');
    });

    it('should keep other punctuation', () => {
      expect(normalizeName('C++ Runtime')).toBe('c++ runtime');
    });
  });

  describe('idempotence', () => {
    const samples = [
      'PyYAML',
      'ruamel.yaml.clib',
      '  Zope.Interface- ',
      'a._-b',
      '__init__',
      'Open\t\tSans',
      '',
      '...',
      'six',
    ];

    it.each(samples)('should be idempotent for %j', (sample) => {
      const once = normalizeName(sample);
      expect(normalizeName(once)).toBe(once);
    });
  });
});

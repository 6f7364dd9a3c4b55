/**
 * Name Normalization for Software Credits Reconciliation
 *
 * Package names vary in casing and separators between manifests and
 * credits files. This module reduces a raw name to a comparison key.
 *
 * Example transformations:
 * - "PyYAML" → "pyyaml"
 * - "ruamel.yaml" → "ruamel yaml"
 * - "typing_extensions" → "typing extensions"
 * - "  Open   Sans " → "open sans"
 */

/**
 * Normalizes a component name by:
 * 1. Trimming leading/trailing whitespace
 * 2. Converting to lowercase
 * 3. Replacing ".", "_", "-" and whitespace runs with a single space
 * 4. Collapsing repeated spaces and trimming again
 *
 * Idempotent: normalizeName(normalizeName(x)) === normalizeName(x).
 *
 * @example
 * normalizeName("Ruamel.YAML") // Returns: "ruamel yaml"
 * normalizeName("zope.interface-") // Returns: "zope interface"
 * normalizeName("   ") // Returns: ""
 */
export function normalizeName(input: string): string {
  if (!input || typeof input !== 'string') {
    return '';
  }

  return input
    .trim()
    .toLowerCase()
    .replace(/[._\-\s]+/g, ' ')
    .trim();
}

export default normalizeName;

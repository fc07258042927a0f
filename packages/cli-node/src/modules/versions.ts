/**
 * Simplified semver matching for capability version constraints.
 *
 * Supported patterns: "*" or empty (any), "1.2.3" (exact), "^1.2.3" (same major),
 * "~1.2.3" (same major.minor), ">=", ">", "<=", "<". Space-separated patterns
 * must all match ("^1.0.0 <1.4.0").
 */

const parseVersion = (v: string): number[] => {
  return v.trim().replace(/^v/, '').split('.').map(n => parseInt(n, 10) || 0);
};

/**
 * Compare two versions. Negative when a < b, positive when a > b.
 */
export function compareVersions(a: string, b: string): number {
  const aParts = parseVersion(a);
  const bParts = parseVersion(b);
  for (let i = 0; i < 3; i++) {
    const diff = (aParts[i] ?? 0) - (bParts[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/** ">= 1.0.0" -> ">=1.0.0" */
const normalizePattern = (pattern: string): string => pattern.replace(/([<>=^~])\s+/g, '$1').trim();

/**
 * Check if version matches pattern
 */
export function versionMatches(version: string, pattern?: string): boolean {
  const comparators = normalizePattern(pattern ?? '').split(/\s+/);
  return comparators.every(comparator => matchesComparator(version, comparator));
}

/**
 * Join constraints into one pattern matched by every version that matches
 * them all. Wildcards drop out; the result does not depend on input order.
 */
export function combineConstraints(constraints: Iterable<string | undefined>): string {
  const distinct = new Set<string>();
  for (const constraint of constraints) {
    const normalized = constraint === undefined ? '' : normalizePattern(constraint);
    if (normalized && normalized !== '*') distinct.add(normalized);
  }
  return [...distinct].sort().join(' ');
}

function matchesComparator(version: string, trimmed: string): boolean {
  if (!trimmed || trimmed === '*') {
    return true;
  }

  if (trimmed.startsWith('>=')) {
    return compareVersions(version, trimmed.slice(2)) >= 0;
  }
  if (trimmed.startsWith('>')) {
    return compareVersions(version, trimmed.slice(1)) > 0;
  }
  if (trimmed.startsWith('<=')) {
    return compareVersions(version, trimmed.slice(2)) <= 0;
  }
  if (trimmed.startsWith('<')) {
    return compareVersions(version, trimmed.slice(1)) < 0;
  }

  const vParts = parseVersion(version);

  // ^ (compatible) - same major
  if (trimmed.startsWith('^')) {
    const pParts = parseVersion(trimmed.slice(1));
    return vParts[0] === pParts[0] && compareVersions(version, trimmed.slice(1)) >= 0;
  }

  // ~ (patch only) - same major.minor
  if (trimmed.startsWith('~')) {
    const pParts = parseVersion(trimmed.slice(1));
    return vParts[0] === pParts[0] &&
           (vParts[1] ?? 0) === (pParts[1] ?? 0) &&
           compareVersions(version, trimmed.slice(1)) >= 0;
  }

  // Exact match
  return compareVersions(version, trimmed) === 0;
}

/**
 * Pick the highest version satisfying the pattern, if any.
 */
export function selectHighestMatching(versions: readonly string[], pattern?: string): string | undefined {
  return versions
    .filter(v => versionMatches(v, pattern))
    .sort(compareVersions)
    .at(-1);
}

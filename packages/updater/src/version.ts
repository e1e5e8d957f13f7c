/**
 * Parse a dotted numeric version ("1.2.3", "1.5") into its components.
 * Throws if the string is not a dotted numeric version.
 */
export function parseVersion(version: string): number[] {
  if (!/^\d+(\.\d+)*$/.test(version)) {
    throw new Error(`Invalid version string: "${version}"`);
  }
  return version.split(".").map(Number);
}

/**
 * Compare two dotted numeric versions; missing components count as 0.
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parseVersion(a);
  const right = parseVersion(b);
  const length = Math.max(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const x = left[i] ?? 0;
    const y = right[i] ?? 0;
    if (x !== y) return x > y ? 1 : -1;
  }
  return 0;
}

/**
 * Returns true if the latest version is newer than the current version.
 */
export function isNewerVersion(current: string, latest: string): boolean {
  return compareVersions(latest, current) === 1;
}

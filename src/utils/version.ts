import semver from 'semver';

/**
 * Python release numbers (`0.27`, `2024.1.post1`, `1.0.0rc2`) are not semver.
 * Comparisons coerce them to their leading `major.minor.patch`, which is
 * enough to pick the stricter of two minimum versions.
 */

export function isUsableVersion(version: string): boolean {
  return semver.coerce(version) !== null;
}

/**
 * Return the stricter (higher) of two minimum versions. Ties keep `current`.
 */
export function higherMinimum(current: string | undefined, candidate: string | undefined): string | undefined {
  if (!current) return candidate;
  if (!candidate) return current;

  const a = semver.coerce(current);
  const b = semver.coerce(candidate);
  if (!a || !b) {
    return current;
  }
  return semver.gt(b, a) ? candidate : current;
}

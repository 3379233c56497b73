import semver from 'semver';

/**
 * Coerce a schema version id ("3", "1.2", "v2.0.1") to a comparable semver.
 * Returns null when the id carries no version number at all.
 */
export const parseVersion = (id: string) => semver.coerce(id);

/**
 * Compare two version ids for ordering.
 *
 * @example
 * compareVersions("1.2", "1.10.0") // -1
 */
export const compareVersions = (a: string, b: string): number => {
  const pa = parseVersion(a);
  const pb = parseVersion(b);
  if (!pa || !pb) return a.localeCompare(b);
  return semver.compare(pa, pb);
};

export const sortVersions = (versions: string[]) => [...versions].sort(compareVersions);

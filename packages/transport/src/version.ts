export const CLIENT_VERSION = '0.1.0';

/**
 * Converts a version into the form sent in `x-elastic-client-meta`:
 * pre-release suffixes collapse to a trailing `p`.
 */
export function clientMetaVersion(version: string): string {
  const match = /^([0-9][0-9.]*[0-9]|[0-9])(.*)$/.exec(version.trim().replace(/^v/, ''));
  if (!match) {
    return version;
  }
  const [, numeric, suffix] = match;
  return suffix ? `${numeric}p` : numeric;
}

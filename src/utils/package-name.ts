/**
 * Distribution name helpers.
 *
 * Index and wheel names compare case-insensitively with `-`, `_` and `.`
 * treated as the same separator, so `Mcp_Client.For-Ollama` and
 * `mcp-client-for-ollama` name one distribution.
 */

const NAME_PATTERN = /^[A-Za-z0-9]([A-Za-z0-9._-]*[A-Za-z0-9])?$/;

export function normalizePackageName(name: string): string {
  return name.trim().toLowerCase().replace(/[-_.]+/g, '-');
}

export function isValidPackageName(name: string): boolean {
  return NAME_PATTERN.test(name);
}

/**
 * Render an index install specifier: `name` or `name>=min`.
 */
export function formatSpecifier(name: string, minVersion?: string): string {
  return minVersion ? `${name}>=${minVersion}` : name;
}

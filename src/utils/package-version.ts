import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const PACKAGE_NAME = 'wheelstage';

function readVersion(manifestPath: string): string | undefined {
  const manifest: unknown = JSON.parse(readFileSync(manifestPath, 'utf8'));
  if (
    typeof manifest === 'object' && manifest !== null &&
    'name' in manifest && manifest.name === PACKAGE_NAME &&
    'version' in manifest && typeof manifest.version === 'string'
  ) {
    return manifest.version;
  }
  return undefined;
}

/**
 * Version of the installed wheelstage package. Walks up from this module
 * because the compiled layout sits one directory deeper than the sources.
 */
export function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const manifestPath = join(dir, 'package.json');
    const version = existsSync(manifestPath) ? readVersion(manifestPath) : undefined;
    if (version) return version;

    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

/**
 * Wheel file names follow
 * `{distribution}-{version}(-{build tag})?-{python tag}-{abi tag}-{platform tag}.whl`.
 * The distribution part never contains `-` (builders escape it to `_`).
 */

export interface WheelFilename {
  name: string;
  version: string;
  fileName: string;
}

export function parseWheelFilename(fileName: string): WheelFilename | null {
  if (!fileName.endsWith('.whl')) return null;

  const parts = fileName.slice(0, -'.whl'.length).split('-');
  if (parts.length !== 5 && parts.length !== 6) return null;
  if (parts.some(part => part.length === 0)) return null;

  return { name: parts[0], version: parts[1], fileName };
}

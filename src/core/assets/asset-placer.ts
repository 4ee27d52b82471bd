/**
 * Asset Placer
 *
 * Places the desktop entry and the icon under the staging root:
 *
 *   <root><prefix>/share/applications/<name>.desktop
 *   <root><prefix>/share/pixmaps/<name>.png
 *
 * and rewrites the desktop entry's icon line to `Icon=<name>`. A desktop
 * entry without the expected line is still placed; the miss is reported as
 * a warning because the application runs fine without a menu icon.
 */

import { posix } from 'path';
import type { RecipeAssets, StageWarning } from '../../types/index.js';
import { FILE_PATTERNS, INSTALL_PATHS } from '../../constants/index.js';
import { copyFile, readTextFile, resolveUnderRoot, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface AssetPlacementOptions {
  stagingRoot: string;
  prefix: string;
  packageName: string;
  assets: RecipeAssets;
}

export interface AssetPlacementResult {
  /** Absolute paths written, desktop entry first. */
  placed: string[];
  substituted: boolean;
  warnings: StageWarning[];
}

export interface SubstitutionResult {
  content: string;
  replaced: boolean;
}

/**
 * Replace the first line that equals `literal` exactly. Line endings,
 * including CRLF, are preserved.
 */
export function substituteLine(content: string, literal: string, replacement: string): SubstitutionResult {
  // Odd indexes hold the separators
  const parts = content.split(/(\r?\n)/);
  for (let i = 0; i < parts.length; i += 2) {
    if (parts[i] === literal) {
      parts[i] = replacement;
      return { content: parts.join(''), replaced: true };
    }
  }
  return { content, replaced: false };
}

export function getAssetDestinations(prefix: string, packageName: string): { desktop: string; icon: string } {
  return {
    desktop: posix.join(prefix, INSTALL_PATHS.APPLICATIONS, `${packageName}${FILE_PATTERNS.DESKTOP_EXT}`),
    icon: posix.join(prefix, INSTALL_PATHS.PIXMAPS, `${packageName}${FILE_PATTERNS.ICON_EXT}`)
  };
}

export async function placeAssets(options: AssetPlacementOptions): Promise<AssetPlacementResult> {
  const { stagingRoot, prefix, packageName, assets } = options;
  const destinations = getAssetDestinations(prefix, packageName);
  const desktopPath = resolveUnderRoot(stagingRoot, destinations.desktop);
  const iconPath = resolveUnderRoot(stagingRoot, destinations.icon);

  const template = await readTextFile(assets.desktop);
  const { content, replaced } = substituteLine(template, assets.iconLiteral, `Icon=${packageName}`);

  const warnings: StageWarning[] = [];
  if (!replaced) {
    const message = `Desktop entry ${assets.desktop} has no line '${assets.iconLiteral}'; menu icon left unchanged`;
    logger.warn(message);
    warnings.push({ stage: 'assets', kind: 'AssetSubstitutionMiss', subject: assets.desktop, message });
  }

  await writeTextFile(desktopPath, content);
  await copyFile(assets.icon, iconPath);

  return { placed: [desktopPath, iconPath], substituted: replaced, warnings };
}

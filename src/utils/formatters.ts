import { relative, isAbsolute } from 'path';
import { homedir } from 'os';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Relative paths are returned as-is
 * - Paths inside `cwd` are shown relative to it
 * - Paths under the home directory use tilde notation
 * - Anything else stays absolute
 *
 * @example
 * formatPathForDisplay('/work/app/dist/x.whl', '/work/app') // => 'dist/x.whl'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath === '') {
    return '.';
  }
  if (!relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  const home = homedir();
  const fromHome = relative(home, path);
  if (!fromHome.startsWith('..') && !isAbsolute(fromHome)) {
    return `~/${fromHome}`;
  }

  return path;
}

/**
 * Format tree connector for hierarchical display
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Render items as tree lines with correct connectors
 */
export function formatTreeLines(items: readonly string[], indent: string = '  '): string[] {
  return items.map((item, index) => `${indent}${getTreeConnector(index === items.length - 1)}${item}`);
}

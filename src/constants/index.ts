/**
 * Shared constants for the wheelstage CLI application
 * This file provides a single source of truth for file names, default tool
 * invocations and the fixed install layout.
 */

export const FILE_PATTERNS = {
  RECIPE_YML: 'wheelstage.yml',
  PYPROJECT_TOML: 'pyproject.toml',
  SETUP_PY: 'setup.py',
  SETUP_CFG: 'setup.cfg',
  WHEEL_GLOB: '*.whl',
  DESKTOP_EXT: '.desktop',
  ICON_EXT: '.png',
} as const;

/**
 * Project manifests the artifact builder recognizes, in lookup order.
 */
export const RECOGNIZED_MANIFESTS = [
  FILE_PATTERNS.PYPROJECT_TOML,
  FILE_PATTERNS.SETUP_PY,
  FILE_PATTERNS.SETUP_CFG,
] as const;

/**
 * Install layout relative to the prefix.
 */
export const INSTALL_PATHS = {
  APPLICATIONS: 'share/applications',
  PIXMAPS: 'share/pixmaps',
} as const;

/** Prefix of per-source scratch directories inside the artifact output directory. */
export const PARTIAL_BUILD_DIR_PREFIX = '.partial-';

export const PLAN_FORMAT_VERSION = 1 as const;

export const DEFAULTS = {
  OUT_DIR: 'dist',
  PREFIX: '/usr',
  TIMEOUT_MS: 600_000,
  ICON_LITERAL: 'Icon=/usr/share/pixmaps/mcp-central.png',
  BUILD_COMMAND: 'python',
  BUILD_ARGS: ['-m', 'build', '--wheel', '--no-isolation', '--outdir', '{outDir}', '{source}'],
  INSTALL_COMMAND: 'python',
  INSTALL_ARGS: ['-m', 'pip', 'install', '--root={root}', '--prefix={prefix}', '--no-warn-script-location'],
  NO_DEPS_FLAG: '--no-deps',
} as const;

export const DEPENDENCY_MODES = ['skip', 'full'] as const;
export const PREFERRED_CHANNELS = ['host', 'index', 'bundled'] as const;

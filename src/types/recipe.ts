/**
 * Recipe types: the declarative description of one packaged application
 * (wheelstage.yml after validation and path resolution).
 */

/** Channel a recipe author would like a dependency to come from. */
export type PreferredChannel = 'host' | 'index' | 'bundled';

/**
 * Whether the installer may resolve an artifact's own dependencies.
 * - `skip`: the artifact is installed with the installer's dependency-skip
 *   flag; its manifest dependencies are routed by the classifier instead.
 * - `full`: the installer resolves the artifact's dependencies itself.
 */
export type DependencyMode = 'skip' | 'full';

export interface DependencyRef {
  name: string;
  /** Minimum version, rendered as `name>=version` for the index installer. */
  versionConstraint?: string;
  preferredChannel: PreferredChannel;
}

export interface ToolCommand {
  command: string;
  /** Arguments; `{placeholder}` tokens are expanded per invocation. */
  args: string[];
}

export interface InstallerCommand extends ToolCommand {
  /** Flag appended when an artifact is installed without its dependencies. */
  noDepsFlag: string;
}

export interface RecipeTools {
  build: ToolCommand;
  install: InstallerCommand;
  /** Per-invocation timeout for every external tool call. */
  timeoutMs: number;
}

export interface SubprojectConfig {
  /** Absolute path of the bundled subproject's source tree. */
  path: string;
  dependencyMode: DependencyMode;
}

export interface RecipeAssets {
  /** Absolute path of the desktop entry template. */
  desktop: string;
  /** Absolute path of the icon image. */
  icon: string;
  /** Exact line rewritten to `Icon=<name>` in the placed desktop entry. */
  iconLiteral: string;
}

export interface Recipe {
  /** Final installed package name; also the asset file base name. */
  name: string;
  version: string;
  /** Directory the recipe file was loaded from. */
  recipeDir: string;
  /** Absolute path of the primary source tree. */
  source: string;
  /** Absolute path of the artifact output directory. */
  outDir: string;
  /** Install prefix inside the staging root, e.g. `/usr`. */
  prefix: string;
  primary: { dependencyMode: DependencyMode };
  subprojects: SubprojectConfig[];
  /** Names the host package manager is trusted to provide. */
  hostProvides: string[];
  dependencies: DependencyRef[];
  assets: RecipeAssets;
  tools: RecipeTools;
}

import * as yaml from 'js-yaml';
import { dirname, isAbsolute, posix, resolve } from 'path';
import type {
  DependencyMode,
  DependencyRef,
  InstallerCommand,
  PreferredChannel,
  Recipe,
  RecipeAssets,
  RecipeTools,
  SubprojectConfig,
  ToolCommand
} from '../../types/index.js';
import { DEFAULTS, DEPENDENCY_MODES, PREFERRED_CHANNELS } from '../../constants/index.js';
import { readTextFile } from '../../utils/fs.js';
import { ConfigError, ValidationError } from '../../utils/errors.js';
import { isValidPackageName, normalizePackageName } from '../../utils/package-name.js';
import { isUsableVersion } from '../../utils/version.js';
import { logger } from '../../utils/logger.js';

type YamlRecord = Record<string, unknown>;

/**
 * Core schema without implicit floats, so `version: 1.10` stays the string
 * "1.10" instead of becoming the number 1.1.
 */
const RECIPE_SCHEMA = yaml.FAILSAFE_SCHEMA.extend({
  implicit: [yaml.types.null, yaml.types.bool, yaml.types.int]
});

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: YamlRecord, key: string, field: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return String(value);
    throw new ValidationError(`${field} must be quoted; the number ${value} may have lost digits`, { field, value });
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, { field });
  }
  return value.trim();
}

function requireString(record: YamlRecord, key: string, field: string): string {
  const value = readString(record, key, field);
  if (value === undefined) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return value;
}

function readStringList(value: unknown, field: string): string[] {
  if (value === undefined || value === null) return [];
  const items: unknown[] = Array.isArray(value) ? value : [value];
  const strings = items.filter((item): item is string => typeof item === 'string');
  if (!Array.isArray(value) || strings.length !== items.length) {
    throw new ValidationError(`${field} must be a list of strings`, { field });
  }
  return strings;
}

function readDependencyMode(value: unknown, field: string): DependencyMode {
  if (value === undefined || value === null) return 'skip';
  const mode = DEPENDENCY_MODES.find(candidate => candidate === value);
  if (!mode) {
    throw new ValidationError(`${field} must be one of: ${DEPENDENCY_MODES.join(', ')}`, { field, value });
  }
  return mode;
}

function readChannel(value: unknown, field: string): PreferredChannel {
  if (value === undefined || value === null) return 'index';
  const channel = PREFERRED_CHANNELS.find(candidate => candidate === value);
  if (!channel) {
    throw new ValidationError(`${field} must be one of: ${PREFERRED_CHANNELS.join(', ')}`, { field, value });
  }
  return channel;
}

function parseDependencies(value: unknown): DependencyRef[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError('dependencies must be a list', { field: 'dependencies' });
  }

  const seen = new Map<string, string>();
  return value.map((entry: unknown, index: number): DependencyRef => {
    const field = `dependencies[${index}]`;
    const record: YamlRecord = typeof entry === 'string' ? { name: entry } : isRecord(entry) ? entry : {};
    const name = requireString(record, 'name', `${field}.name`);
    if (!isValidPackageName(name)) {
      throw new ValidationError(`${field}.name '${name}' is not a valid distribution name`, { field });
    }

    const normalized = normalizePackageName(name);
    const previous = seen.get(normalized);
    if (previous) {
      throw new ValidationError(`dependency '${name}' is declared twice (also as '${previous}')`, { field });
    }
    seen.set(normalized, name);

    const versionConstraint = readString(record, 'version', `${field}.version`);
    if (versionConstraint !== undefined && !isUsableVersion(versionConstraint)) {
      throw new ValidationError(`${field}.version '${versionConstraint}' is not a version number`, { field });
    }

    return {
      name,
      ...(versionConstraint ? { versionConstraint } : {}),
      preferredChannel: readChannel(record.channel, `${field}.channel`)
    };
  });
}

function parseSubprojects(value: unknown, baseDir: string): SubprojectConfig[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError('subprojects must be a list', { field: 'subprojects' });
  }
  return value.map((entry: unknown, index: number): SubprojectConfig => {
    const field = `subprojects[${index}]`;
    const record: YamlRecord = typeof entry === 'string' ? { path: entry } : isRecord(entry) ? entry : {};
    return {
      path: resolve(baseDir, requireString(record, 'path', `${field}.path`)),
      dependencyMode: readDependencyMode(record.dependencyMode, `${field}.dependencyMode`)
    };
  });
}

function parseAssets(value: unknown, baseDir: string): RecipeAssets {
  if (!isRecord(value)) {
    throw new ValidationError('assets is required and must be a mapping', { field: 'assets' });
  }
  return {
    desktop: resolve(baseDir, requireString(value, 'desktop', 'assets.desktop')),
    icon: resolve(baseDir, requireString(value, 'icon', 'assets.icon')),
    iconLiteral: readString(value, 'iconLiteral', 'assets.iconLiteral') ?? DEFAULTS.ICON_LITERAL
  };
}

function parseToolCommand(value: unknown, field: string, fallback: ToolCommand): ToolCommand {
  if (value === undefined || value === null) {
    return { command: fallback.command, args: [...fallback.args] };
  }
  if (!isRecord(value)) {
    throw new ValidationError(`${field} must be a mapping`, { field });
  }
  return {
    command: requireString(value, 'command', `${field}.command`),
    args: readStringList(value.args, `${field}.args`)
  };
}

function parseTools(value: unknown): RecipeTools {
  const record: YamlRecord = isRecord(value) ? value : {};
  if (value !== undefined && value !== null && !isRecord(value)) {
    throw new ValidationError('tools must be a mapping', { field: 'tools' });
  }

  const timeout = record.timeoutMs ?? DEFAULTS.TIMEOUT_MS;
  if (typeof timeout !== 'number' || !Number.isInteger(timeout) || timeout <= 0) {
    throw new ValidationError('tools.timeoutMs must be a positive integer', { field: 'tools.timeoutMs' });
  }

  const installRecord = isRecord(record.install) ? record.install : {};
  const install: InstallerCommand = {
    ...parseToolCommand(record.install, 'tools.install', {
      command: DEFAULTS.INSTALL_COMMAND,
      args: [...DEFAULTS.INSTALL_ARGS]
    }),
    noDepsFlag: readString(installRecord, 'noDepsFlag', 'tools.install.noDepsFlag') ?? DEFAULTS.NO_DEPS_FLAG
  };

  return {
    build: parseToolCommand(record.build, 'tools.build', {
      command: DEFAULTS.BUILD_COMMAND,
      args: [...DEFAULTS.BUILD_ARGS]
    }),
    install,
    timeoutMs: timeout
  };
}

/**
 * Validate an already-parsed recipe document. Relative paths resolve
 * against `recipeDir`.
 */
export function validateRecipe(document: unknown, recipeDir: string): Recipe {
  if (!isRecord(document)) {
    throw new ValidationError('recipe must be a YAML mapping');
  }

  const name = requireString(document, 'name', 'name');
  if (!isValidPackageName(name)) {
    throw new ValidationError(`name '${name}' is not a valid package name`, { field: 'name' });
  }

  const prefix = readString(document, 'prefix', 'prefix') ?? DEFAULTS.PREFIX;
  if (!posix.isAbsolute(prefix)) {
    throw new ValidationError(`prefix '${prefix}' must be an absolute path`, { field: 'prefix' });
  }

  const primaryRecord = isRecord(document.primary) ? document.primary : {};
  const host = isRecord(document.host) ? document.host : {};

  return {
    name,
    version: requireString(document, 'version', 'version'),
    recipeDir,
    source: resolve(recipeDir, readString(document, 'source', 'source') ?? '.'),
    outDir: resolve(recipeDir, readString(document, 'outDir', 'outDir') ?? DEFAULTS.OUT_DIR),
    prefix: posix.normalize(prefix),
    primary: { dependencyMode: readDependencyMode(primaryRecord.dependencyMode, 'primary.dependencyMode') },
    subprojects: parseSubprojects(document.subprojects, recipeDir),
    hostProvides: readStringList(host.provides, 'host.provides'),
    dependencies: parseDependencies(document.dependencies),
    assets: parseAssets(document.assets, recipeDir),
    tools: parseTools(document.tools)
  };
}

/**
 * Parse wheelstage.yml file with validation
 */
export async function parseRecipeYml(recipePath: string): Promise<Recipe> {
  if (!isAbsolute(recipePath)) {
    throw new ConfigError(`Recipe path must be absolute: ${recipePath}`);
  }

  const content = await readTextFile(recipePath);
  let document: unknown;
  try {
    document = yaml.load(content, { schema: RECIPE_SCHEMA });
  } catch (error) {
    throw new ConfigError(`Failed to parse ${recipePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    const recipe = validateRecipe(document, dirname(recipePath));
    logger.debug(`Loaded recipe ${recipe.name}@${recipe.version}`, {
      dependencies: recipe.dependencies.length,
      subprojects: recipe.subprojects.length
    });
    return recipe;
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigError(`Invalid recipe ${recipePath}: ${error.message}`, error.details);
    }
    throw error;
  }
}

import { join } from 'path';
import { parse as parseToml } from 'smol-toml';
import type { DependencyRef } from '../../types/index.js';
import { FILE_PATTERNS, RECOGNIZED_MANIFESTS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import { parseRequirements } from './requirement-parser.js';

export interface ProjectManifest {
  /** Absolute path of the manifest file found. */
  path: string;
  kind: typeof RECOGNIZED_MANIFESTS[number];
  name?: string;
  version?: string;
  /**
   * Runtime dependencies. Only `pyproject.toml` declares them statically;
   * for setup.py/setup.cfg this is `null` (unknown).
   */
  dependencies: DependencyRef[] | null;
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Locate the first recognized manifest in a source tree.
 */
export async function findManifest(sourceDir: string): Promise<ProjectManifest['kind'] | null> {
  for (const candidate of RECOGNIZED_MANIFESTS) {
    if (await exists(join(sourceDir, candidate))) {
      return candidate;
    }
  }
  return null;
}

/**
 * Read name, version and runtime dependencies from a source tree's manifest.
 * Returns null when the tree has no recognized manifest.
 */
export async function readProjectManifest(sourceDir: string): Promise<ProjectManifest | null> {
  const kind = await findManifest(sourceDir);
  if (!kind) return null;

  const path = join(sourceDir, kind);
  if (kind !== FILE_PATTERNS.PYPROJECT_TOML) {
    return { path, kind, dependencies: null };
  }

  let document: Record<string, unknown>;
  try {
    document = parseToml(await readTextFile(path));
  } catch (error) {
    throw new ValidationError(`Failed to parse ${path}: ${error instanceof Error ? error.message : String(error)}`, { path });
  }

  const project = document.project;
  if (!isTable(project)) {
    // Build backends without a [project] table (e.g. legacy poetry)
    return { path, kind, dependencies: null };
  }

  const rawDependencies = Array.isArray(project.dependencies) ? project.dependencies : [];
  const requirements = rawDependencies.filter((entry): entry is string => typeof entry === 'string');

  return {
    path,
    kind,
    name: typeof project.name === 'string' ? project.name : undefined,
    version: typeof project.version === 'string' ? project.version : undefined,
    dependencies: parseRequirements(requirements)
  };
}

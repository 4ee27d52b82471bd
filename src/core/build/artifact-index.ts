import { basename, join } from 'path';
import * as yaml from 'js-yaml';
import type { ArtifactRole, BuiltArtifact, DependencyRef } from '../../types/index.js';
import { PREFERRED_CHANNELS } from '../../constants/index.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { ConfigError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Record of the last successful build, kept next to the wheels so `plan`
 * and `install` can run without rebuilding.
 */

export const ARTIFACT_INDEX_FILE = 'wheelstage-artifacts.yml';

const HEADER_COMMENT = '# This file is managed by wheelstage. Do not edit manually.';

export function getArtifactIndexPath(outDir: string): string {
  return join(outDir, ARTIFACT_INDEX_FILE);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeDependency(entry: unknown): DependencyRef | null {
  if (!isRecord(entry) || typeof entry.name !== 'string') return null;
  const channel = PREFERRED_CHANNELS.find(candidate => candidate === entry.preferredChannel) ?? 'index';
  return typeof entry.versionConstraint === 'string'
    ? { name: entry.name, versionConstraint: entry.versionConstraint, preferredChannel: channel }
    : { name: entry.name, preferredChannel: channel };
}

function sanitizeArtifact(entry: unknown, outDir: string): BuiltArtifact | null {
  if (!isRecord(entry)) return null;
  const { name, version, file, role, sourceDir } = entry;
  if (typeof name !== 'string' || typeof version !== 'string' || typeof file !== 'string' || typeof sourceDir !== 'string') {
    return null;
  }
  const artifactRole: ArtifactRole | undefined = role === 'primary' || role === 'subproject' ? role : undefined;
  if (!artifactRole) return null;

  const rawDeps: unknown[] = Array.isArray(entry.dependencies) ? entry.dependencies : [];
  return {
    name,
    version,
    path: join(outDir, file),
    role: artifactRole,
    sourceDir,
    declaredDependencies: rawDeps
      .map(sanitizeDependency)
      .filter((dep): dep is DependencyRef => dep !== null)
  };
}

export async function writeArtifactIndex(outDir: string, artifacts: readonly BuiltArtifact[]): Promise<void> {
  const data = {
    artifacts: artifacts.map(artifact => ({
      name: artifact.name,
      version: artifact.version,
      file: basename(artifact.path),
      role: artifact.role,
      sourceDir: artifact.sourceDir,
      dependencies: artifact.declaredDependencies.map(dep => ({ ...dep }))
    }))
  };
  const body = yaml.dump(data, { lineWidth: 120, noRefs: true, sortKeys: false });
  await writeTextFile(getArtifactIndexPath(outDir), `${HEADER_COMMENT}\n${body}`);
}

/**
 * Load the artifacts of the last build. Every listed wheel must still exist.
 */
export async function readArtifactIndex(outDir: string): Promise<BuiltArtifact[]> {
  const indexPath = getArtifactIndexPath(outDir);
  if (!(await exists(indexPath))) {
    throw new ConfigError(`No build record at ${indexPath}; run 'wheelstage build' first`);
  }

  let data: unknown;
  try {
    data = yaml.load(await readTextFile(indexPath));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${indexPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const entries: unknown[] = isRecord(data) && Array.isArray(data.artifacts) ? data.artifacts : [];
  const artifacts = entries
    .map(entry => sanitizeArtifact(entry, outDir))
    .filter((artifact): artifact is BuiltArtifact => artifact !== null);

  for (const artifact of artifacts) {
    if (!(await exists(artifact.path))) {
      throw new ConfigError(`Built artifact is missing: ${artifact.path}; run 'wheelstage build' again`);
    }
  }

  logger.debug(`Loaded ${artifacts.length} artifact(s) from ${indexPath}`);
  return artifacts;
}

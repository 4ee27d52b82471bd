/**
 * Artifact Builder
 *
 * Builds one wheel per source tree (the primary project, then each bundled
 * subproject) into the recipe's output directory.
 *
 * Each build writes into its own `.partial-<n>` scratch directory. Only a
 * build that exits 0 and yields exactly one wheel has that wheel moved into
 * the output directory; anything else removes the scratch directory and
 * raises BuildFailureError, so no half-built wheel is left where a later
 * stage could pick it up. The build record of a previous run is removed
 * before the first build and written again only once every source has built.
 */

import { basename, join } from 'path';
import { minimatch } from 'minimatch';
import type { ArtifactRole, BuiltArtifact, DependencyMode, Recipe, StageWarning } from '../../types/index.js';
import { FILE_PATTERNS, PARTIAL_BUILD_DIR_PREFIX, RECOGNIZED_MANIFESTS } from '../../constants/index.js';
import { ensureDir, listFiles, moveFile, remove } from '../../utils/fs.js';
import { BuildFailureError, TIMEOUT_EXIT_CODE } from '../../utils/errors.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { formatPathForDisplay } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { expandArgs } from '../tools/command-template.js';
import { diagnosticOutput, execFileRunner, type ToolRunner } from '../tools/tool-runner.js';
import { findManifest, readProjectManifest } from './manifest-reader.js';
import { parseWheelFilename } from './wheel-filename.js';
import { getArtifactIndexPath, writeArtifactIndex } from './artifact-index.js';

export interface BuildSource {
  sourceDir: string;
  role: ArtifactRole;
  dependencyMode: DependencyMode;
}

export interface ArtifactBuildOptions {
  recipe: Recipe;
  runner?: ToolRunner;
  output?: OutputPort;
}

export interface BuildResult {
  artifacts: BuiltArtifact[];
  warnings: StageWarning[];
}

/**
 * Source trees of a recipe in build order: primary first, then subprojects.
 */
export function getBuildSources(recipe: Recipe): BuildSource[] {
  return [
    { sourceDir: recipe.source, role: 'primary', dependencyMode: recipe.primary.dependencyMode },
    ...recipe.subprojects.map((subproject): BuildSource => ({
      sourceDir: subproject.path,
      role: 'subproject',
      dependencyMode: subproject.dependencyMode
    }))
  ];
}

async function assertManifests(sources: readonly BuildSource[]): Promise<void> {
  for (const source of sources) {
    if (!(await findManifest(source.sourceDir))) {
      throw new BuildFailureError(
        `No recognized project manifest (${RECOGNIZED_MANIFESTS.join(', ')}) in ${source.sourceDir}`,
        { sourceDir: source.sourceDir }
      );
    }
  }
}

/**
 * Remove wheels of the same distribution left over from earlier builds so the
 * output directory holds exactly one wheel per built project.
 */
async function removeStaleWheels(outDir: string, distribution: string, keepFileName: string): Promise<void> {
  const normalized = normalizePackageName(distribution);
  for (const fileName of await listFiles(outDir)) {
    const parsed = parseWheelFilename(fileName);
    if (parsed && fileName !== keepFileName && normalizePackageName(parsed.name) === normalized) {
      logger.debug(`Removing stale wheel ${fileName}`);
      await remove(join(outDir, fileName));
    }
  }
}

async function buildOne(
  source: BuildSource,
  index: number,
  recipe: Recipe,
  runner: ToolRunner,
  warnings: StageWarning[]
): Promise<BuiltArtifact> {
  const partialDir = join(recipe.outDir, `${PARTIAL_BUILD_DIR_PREFIX}${index}`);
  await remove(partialDir);
  await ensureDir(partialDir);

  const fail = async (message: string, exitCode?: number, output?: string): Promise<never> => {
    await remove(partialDir);
    throw new BuildFailureError(message, { sourceDir: source.sourceDir, exitCode, output });
  };

  const result = await runner.run({
    command: recipe.tools.build.command,
    args: expandArgs(recipe.tools.build.args, { outDir: partialDir, source: source.sourceDir }),
    cwd: source.sourceDir,
    timeoutMs: recipe.tools.timeoutMs
  });

  if (result.timedOut) {
    return fail(`Build of ${source.sourceDir} timed out after ${recipe.tools.timeoutMs}ms`, TIMEOUT_EXIT_CODE, diagnosticOutput(result));
  }
  if (result.exitCode !== 0) {
    return fail(`Build of ${source.sourceDir} failed with exit code ${result.exitCode}`, result.exitCode, diagnosticOutput(result));
  }

  const wheels = (await listFiles(partialDir)).filter(fileName => minimatch(fileName, FILE_PATTERNS.WHEEL_GLOB));
  if (wheels.length !== 1) {
    return fail(`Build of ${source.sourceDir} produced ${wheels.length} wheels; expected exactly one`);
  }

  const wheel = parseWheelFilename(wheels[0]);
  if (!wheel) {
    return fail(`Build of ${source.sourceDir} produced an unrecognized wheel name: ${wheels[0]}`);
  }

  const manifest = await readProjectManifest(source.sourceDir);
  if (manifest && manifest.dependencies === null) {
    warnings.push({
      stage: 'build',
      kind: 'ManifestWithoutMetadata',
      subject: wheel.name,
      message: `Dependencies of ${wheel.name} cannot be read from ${basename(manifest.path)}; declare them in the recipe`
    });
  }

  const finalPath = join(recipe.outDir, wheel.fileName);
  await moveFile(join(partialDir, wheel.fileName), finalPath);
  await remove(partialDir);
  await removeStaleWheels(recipe.outDir, wheel.name, wheel.fileName);

  return {
    name: manifest?.name ?? wheel.name,
    version: wheel.version,
    path: finalPath,
    role: source.role,
    sourceDir: source.sourceDir,
    declaredDependencies: manifest?.dependencies ?? []
  };
}

/**
 * Build every source tree of the recipe. Fails before running any build if a
 * source tree lacks a recognized manifest.
 */
export async function buildArtifacts(options: ArtifactBuildOptions): Promise<BuildResult> {
  const { recipe } = options;
  const runner = options.runner ?? execFileRunner;
  const output = resolveOutput(options);
  const sources = getBuildSources(recipe);

  await assertManifests(sources);
  await ensureDir(recipe.outDir);
  await remove(getArtifactIndexPath(recipe.outDir));

  const artifacts: BuiltArtifact[] = [];
  const warnings: StageWarning[] = [];

  for (const [index, source] of sources.entries()) {
    const spinner = output.spinner();
    spinner.start(`Building ${formatPathForDisplay(source.sourceDir, recipe.recipeDir)}`);
    try {
      const artifact = await buildOne(source, index, recipe, runner, warnings);
      spinner.stop(`Built ${basename(artifact.path)}`);
      artifacts.push(artifact);
    } catch (error) {
      spinner.stop();
      throw error;
    }
  }

  await writeArtifactIndex(recipe.outDir, artifacts);
  logger.info(`Built ${artifacts.length} artifact(s)`, { outDir: recipe.outDir });
  return { artifacts, warnings };
}

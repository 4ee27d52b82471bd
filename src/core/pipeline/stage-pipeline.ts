import { readdir } from 'fs/promises';
import type { BuiltArtifact, InstallPlan, Recipe, StageName, StageWarning } from '../../types/index.js';
import { WheelstageError } from '../../types/index.js';
import { isDirectory } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import type { ToolRunner } from '../tools/tool-runner.js';
import { buildArtifacts } from '../build/artifact-builder.js';
import { buildInstallPlan } from '../plan/channel-classifier.js';
import { executePlan, type InstallReport } from '../install/installation-orchestrator.js';
import { placeAssets, type AssetPlacementResult } from '../assets/asset-placer.js';

export interface StagePipelineOptions {
  recipe: Recipe;
  /** Absolute staging root, normally fresh per run. */
  stagingRoot: string;
  runner?: ToolRunner;
  output?: OutputPort;
}

export interface StagePipelineResult {
  artifacts: BuiltArtifact[];
  plan: InstallPlan;
  install: InstallReport;
  assets: AssetPlacementResult;
  warnings: StageWarning[];
}

/**
 * Run one stage, tagging untagged failures with the stage name.
 */
async function runStage<T>(stage: StageName, output: OutputPort, fn: () => Promise<T> | T): Promise<T> {
  output.step(`Stage: ${stage}`);
  try {
    return await fn();
  } catch (error) {
    if (error instanceof WheelstageError && !error.stage) {
      error.stage = stage;
    }
    throw error;
  }
}

async function isNonEmptyDirectory(path: string): Promise<boolean> {
  if (!(await isDirectory(path))) return false;
  return (await readdir(path)).length > 0;
}

/**
 * Build → classify → install → place assets.
 *
 * Stages run strictly in sequence; any fatal error stops the pipeline before
 * the next stage starts. A build failure therefore never touches the staging
 * root.
 */
export async function runStagePipeline(options: StagePipelineOptions): Promise<StagePipelineResult> {
  const { recipe, stagingRoot, runner } = options;
  const output = resolveOutput(options);
  const warnings: StageWarning[] = [];

  const build = await runStage('build', output, () => buildArtifacts({ recipe, runner, output }));
  warnings.push(...build.warnings);

  const plan = await runStage('classify', output, () => buildInstallPlan(recipe, build.artifacts));
  warnings.push(
    ...plan.warnings.map((message): StageWarning => ({ stage: 'classify', kind: 'ChannelPreferenceOverridden', message }))
  );

  if (await isNonEmptyDirectory(stagingRoot)) {
    const message = `Staging root ${stagingRoot} is not empty; results may include files from an earlier run`;
    logger.warn(message);
    warnings.push({ stage: 'install', kind: 'StagingRootNotEmpty', subject: stagingRoot, message });
  }

  const install = await runStage('install', output, () =>
    executePlan(plan, {
      stagingRoot,
      prefix: recipe.prefix,
      installer: recipe.tools.install,
      timeoutMs: recipe.tools.timeoutMs,
      runner,
      output
    })
  );

  const assets = await runStage('assets', output, () =>
    placeAssets({ stagingRoot, prefix: recipe.prefix, packageName: recipe.name, assets: recipe.assets })
  );
  warnings.push(...assets.warnings);

  logger.info(`Staged ${recipe.name}@${recipe.version}`, { stagingRoot, warnings: warnings.length });
  return { artifacts: build.artifacts, plan, install, assets, warnings };
}

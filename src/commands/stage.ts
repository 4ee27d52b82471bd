/**
 * Stage Command
 *
 * Full run: build, classify, install, place assets.
 */
import type { Command } from 'commander';
import { createCommandContext } from '../cli/context.js';
import { resolveFromContext } from '../core/execution-context.js';
import { parseRecipeYml } from '../core/recipe/recipe-yml.js';
import { runStagePipeline } from '../core/pipeline/stage-pipeline.js';
import { displayPlan } from '../core/plan/plan-reporting.js';
import { displayInstallReport, displayWarnings } from '../core/install/install-reporting.js';
import { resolveOutput } from '../core/ports/resolve.js';

export interface StageCommandOptions {
  root: string;
}

export async function setupStageCommand(options: StageCommandOptions, command: Command): Promise<void> {
  const ctx = await createCommandContext(command);
  const output = resolveOutput(ctx);
  const recipe = await parseRecipeYml(ctx.recipePath);

  const result = await runStagePipeline({
    recipe,
    stagingRoot: resolveFromContext(ctx, options.root),
    output
  });

  displayPlan({ ...result.plan, warnings: [] }, output);
  displayInstallReport(result.install, output);
  displayWarnings(result.warnings, output);
  output.success(`${recipe.name} ${recipe.version} staged`);
}

/**
 * Plan Command
 *
 * Classifies the artifacts of the last build without installing anything.
 */
import type { Command } from 'commander';
import { createCommandContext } from '../cli/context.js';
import { resolveFromContext } from '../core/execution-context.js';
import { parseRecipeYml } from '../core/recipe/recipe-yml.js';
import { readArtifactIndex } from '../core/build/artifact-index.js';
import { buildInstallPlan } from '../core/plan/channel-classifier.js';
import { displayPlan } from '../core/plan/plan-reporting.js';
import { savePlan, serializePlan } from '../core/plan/plan-file.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPathForDisplay } from '../utils/formatters.js';

export interface PlanCommandOptions {
  json?: boolean;
  output?: string;
}

export async function setupPlanCommand(options: PlanCommandOptions, command: Command): Promise<void> {
  const ctx = await createCommandContext(command);
  const recipe = await parseRecipeYml(ctx.recipePath);
  const artifacts = await readArtifactIndex(recipe.outDir);
  const plan = buildInstallPlan(recipe, artifacts);

  if (options.json) {
    process.stdout.write(serializePlan(plan));
    return;
  }

  const output = resolveOutput(ctx);
  displayPlan(plan, output);

  if (options.output) {
    const planPath = resolveFromContext(ctx, options.output);
    await savePlan(planPath, plan);
    output.success(`Plan written to ${formatPathForDisplay(planPath, ctx.sourceCwd)}`);
  }
}

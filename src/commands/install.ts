/**
 * Install Command
 *
 * Executes a saved plan, or the plan for the last build, into a staging root.
 */
import type { Command } from 'commander';
import { createCommandContext } from '../cli/context.js';
import { resolveFromContext } from '../core/execution-context.js';
import { parseRecipeYml } from '../core/recipe/recipe-yml.js';
import { readArtifactIndex } from '../core/build/artifact-index.js';
import { buildInstallPlan } from '../core/plan/channel-classifier.js';
import { loadPlan } from '../core/plan/plan-file.js';
import { executePlan } from '../core/install/installation-orchestrator.js';
import { displayInstallReport } from '../core/install/install-reporting.js';
import { resolveOutput } from '../core/ports/resolve.js';
import type { InstallPlan } from '../types/index.js';

export interface InstallCommandOptions {
  root: string;
  plan?: string;
  dryRun?: boolean;
}

export async function setupInstallCommand(options: InstallCommandOptions, command: Command): Promise<void> {
  const ctx = await createCommandContext(command);
  const output = resolveOutput(ctx);
  const recipe = await parseRecipeYml(ctx.recipePath);

  let plan: InstallPlan;
  if (options.plan) {
    plan = await loadPlan(resolveFromContext(ctx, options.plan));
  } else {
    plan = buildInstallPlan(recipe, await readArtifactIndex(recipe.outDir));
  }

  const report = await executePlan(plan, {
    stagingRoot: resolveFromContext(ctx, options.root),
    prefix: recipe.prefix,
    installer: recipe.tools.install,
    timeoutMs: recipe.tools.timeoutMs,
    output,
    dryRun: options.dryRun
  });

  displayInstallReport(report, output);
}

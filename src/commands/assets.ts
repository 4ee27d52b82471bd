/**
 * Assets Command
 */
import type { Command } from 'commander';
import { createCommandContext } from '../cli/context.js';
import { resolveFromContext } from '../core/execution-context.js';
import { parseRecipeYml } from '../core/recipe/recipe-yml.js';
import { placeAssets } from '../core/assets/asset-placer.js';
import { displayWarnings } from '../core/install/install-reporting.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPathForDisplay, formatTreeLines } from '../utils/formatters.js';

export interface AssetsCommandOptions {
  root: string;
}

export async function setupAssetsCommand(options: AssetsCommandOptions, command: Command): Promise<void> {
  const ctx = await createCommandContext(command);
  const output = resolveOutput(ctx);
  const recipe = await parseRecipeYml(ctx.recipePath);
  const stagingRoot = resolveFromContext(ctx, options.root);

  const result = await placeAssets({
    stagingRoot,
    prefix: recipe.prefix,
    packageName: recipe.name,
    assets: recipe.assets
  });

  output.success(`Placed ${result.placed.length} asset(s)`);
  for (const line of formatTreeLines(result.placed.map(path => formatPathForDisplay(path, ctx.sourceCwd)))) {
    output.message(line);
  }
  displayWarnings(result.warnings, output);
}

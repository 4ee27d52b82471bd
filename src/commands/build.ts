/**
 * Build Command
 */
import type { Command } from 'commander';
import { createCommandContext } from '../cli/context.js';
import { parseRecipeYml } from '../core/recipe/recipe-yml.js';
import { buildArtifacts } from '../core/build/artifact-builder.js';
import { displayWarnings } from '../core/install/install-reporting.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatPathForDisplay, formatTreeLines } from '../utils/formatters.js';

export async function setupBuildCommand(_options: Record<string, never>, command: Command): Promise<void> {
  const ctx = await createCommandContext(command);
  const output = resolveOutput(ctx);
  const recipe = await parseRecipeYml(ctx.recipePath);

  const result = await buildArtifacts({ recipe, output });

  output.success(`Built ${result.artifacts.length} artifact(s) in ${formatPathForDisplay(recipe.outDir, ctx.sourceCwd)}`);
  const lines = formatTreeLines(
    result.artifacts.map(artifact => `${artifact.name} ${artifact.version} (${artifact.role})`)
  );
  for (const line of lines) {
    output.message(line);
  }
  displayWarnings(result.warnings, output);
}

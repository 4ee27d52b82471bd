#!/usr/bin/env node
import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package-version.js';
import { withErrorHandling } from './cli/error-handling.js';
import type { PlanCommandOptions } from './commands/plan.js';
import type { InstallCommandOptions } from './commands/install.js';
import type { AssetsCommandOptions } from './commands/assets.js';
import type { StageCommandOptions } from './commands/stage.js';

/**
 * wheelstage CLI - Main entry point
 *
 * Commands are lazily loaded via dynamic import() so only the invoked
 * command's module tree is loaded.
 */

const program = new Command();

program
  .name('wheelstage')
  .description('Build Python wheels and stage them into a package root across host, index and bundled channels')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--recipe <file>', 'recipe file (defaults to wheelstage.yml in the working directory)')
  .option('--verbose', 'enable debug logging')
  .configureHelp({ sortSubcommands: true });

// === STAGES ===

program
  .command('build')
  .description('Build the primary project and bundled subprojects into wheels')
  .action(withErrorHandling(async (options: Record<string, never>, command: Command) => {
    const { setupBuildCommand } = await import('./commands/build.js');
    await setupBuildCommand(options, command);
  }));

program
  .command('plan')
  .description('Classify every dependency of the last build into an install channel')
  .option('--json', 'print the plan as JSON')
  .option('-o, --output <file>', 'write the plan to a file for a later install --plan')
  .action(withErrorHandling(async (options: PlanCommandOptions, command: Command) => {
    const { setupPlanCommand } = await import('./commands/plan.js');
    await setupPlanCommand(options, command);
  }));

program
  .command('install')
  .description('Install the planned dependencies and artifacts into a staging root')
  .requiredOption('--root <dir>', 'staging root (the packaging tool\'s destination directory)')
  .option('--plan <file>', 'execute a saved plan instead of classifying the last build')
  .option('--dry-run', 'print installer invocations without running them')
  .action(withErrorHandling(async (options: InstallCommandOptions, command: Command) => {
    const { setupInstallCommand } = await import('./commands/install.js');
    await setupInstallCommand(options, command);
  }));

program
  .command('assets')
  .description('Place the desktop entry and icon under the staging root')
  .requiredOption('--root <dir>', 'staging root')
  .action(withErrorHandling(async (options: AssetsCommandOptions, command: Command) => {
    const { setupAssetsCommand } = await import('./commands/assets.js');
    await setupAssetsCommand(options, command);
  }));

program
  .command('stage')
  .description('Run build, classify, install and asset placement in one go')
  .requiredOption('--root <dir>', 'staging root')
  .action(withErrorHandling(async (options: StageCommandOptions, command: Command) => {
    const { setupStageCommand } = await import('./commands/stage.js');
    await setupStageCommand(options, command);
  }));

// === GLOBAL ERROR HANDLING ===

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('✗ An unexpected error occurred. Re-run with --verbose for details.');
  process.exit(1);
});

export async function run(): Promise<void> {
  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync();
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('✗ Fatal error occurred. Exiting.');
  process.exit(1);
});

export { program };

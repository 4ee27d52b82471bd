/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's output port: Clack for
 * interactive terminals, plain console output for CI and piped output.
 */

import type { Command } from 'commander';
import type { ExecutionContext, ExecutionOptions, OutputMode } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Force an output mode; detected from the terminal when omitted. */
  outputMode?: OutputMode;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(): boolean {
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  const mode: OutputMode = options.outputMode ?? (detectInteractive() ? 'rich' : 'plain');
  ctx.output = mode === 'rich' ? createClackOutput() : consoleOutput;
  return ctx;
}

/**
 * Program-level options shared by every command.
 */
export interface GlobalOptions {
  cwd?: string;
  recipe?: string;
  verbose?: boolean;
}

/**
 * Build the context for a command from its own and the program's options.
 */
export async function createCommandContext(command: Command): Promise<ExecutionContext> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  return createCliExecutionContext({
    cwd: globals.cwd,
    recipe: globals.recipe,
    verbose: globals.verbose
  });
}

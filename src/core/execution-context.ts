/**
 * Execution Context Module
 *
 * Creates and validates the ExecutionContext for a command: the working
 * directory every relative argument resolves against, and the recipe file.
 */

import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { LogLevel } from '../types/index.js';
import { FILE_PATTERNS } from '../constants/index.js';
import { isDirectory } from '../utils/fs.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * - sourceCwd: --cwd resolved against process.cwd(), else process.cwd()
 * - recipePath: --recipe resolved against sourceCwd, else sourceCwd/wheelstage.yml
 *
 * @throws ValidationError if --cwd is not a directory
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();

  if (!(await isDirectory(sourceCwd))) {
    throw new ValidationError(`--cwd is not a directory: ${sourceCwd}`);
  }

  const verbose = options.verbose ?? false;
  if (verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const context: ExecutionContext = {
    sourceCwd,
    recipePath: resolve(sourceCwd, options.recipe ?? FILE_PATTERNS.RECIPE_YML),
    verbose
  };

  logger.debug('Created execution context', { sourceCwd, recipePath: context.recipePath });
  return context;
}

/**
 * Resolve a path argument (such as --root) against the context's working directory.
 */
export function resolveFromContext(context: ExecutionContext, path: string): string {
  return resolve(context.sourceCwd, path);
}

/**
 * Execution Context Types
 *
 * Directory resolution and output ports for one command invocation.
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * ExecutionContext - Single source of truth for directory resolution
 *
 * - sourceCwd: where relative CLI arguments (recipe path, --root) resolve
 * - recipePath: the recipe file the command operates on
 *
 * Also carries the output port so the same core logic can be driven by a
 * terminal or by CI.
 */
export interface ExecutionContext {
  /**
   * Absolute path to the working directory.
   * `--cwd` replaces process.cwd() for every relative argument.
   */
  sourceCwd: string;

  /** Absolute path to the recipe file. */
  recipePath: string;

  /** True when --verbose was given (logger switched to debug). */
  verbose: boolean;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** --cwd flag */
  cwd?: string;

  /** --recipe flag, relative to the working directory */
  recipe?: string;

  /** --verbose flag */
  verbose?: boolean;
}

export type OutputMode = 'rich' | 'plain';

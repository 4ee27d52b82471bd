/**
 * CLI-specific error handling wrapper for Commander.js actions.
 *
 * Lives in the CLI layer (not core) because it calls process.exit() and
 * writes directly to stderr.
 */

import { handleError } from '../utils/errors.js';

/**
 * Wraps an async function with error handling for Commander.js actions.
 * Prints the failing stage and message, then exits with the error's exit
 * code (an external tool's own status when one failed).
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(result.exitCode);
    }
  };
}

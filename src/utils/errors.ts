import { WheelstageError, ErrorCodes, type CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure kinds of a packaging run
 */

/** Exit status reported when an external tool exceeds its timeout. */
export const TIMEOUT_EXIT_CODE = 124;

/**
 * The build tool reported an error, timed out, or there was nothing to build.
 */
export class BuildFailureError extends WheelstageError {
  constructor(
    message: string,
    details: { sourceDir: string; exitCode?: number; output?: string }
  ) {
    super(
      details.output ? `${message}\n${details.output}` : message,
      ErrorCodes.BUILD_FAILURE,
      details,
      { stage: 'build', exitCode: details.exitCode && details.exitCode > 0 ? details.exitCode : 1 }
    );
    this.name = 'BuildFailureError';
  }
}

/**
 * A dependency was routed to more than one channel. Must be fixed in the
 * recipe; never resolved automatically.
 */
export class ClassificationConflictError extends WheelstageError {
  readonly conflicts: string[];

  constructor(message: string, conflicts: string[], stage: 'classify' | 'install' = 'classify') {
    super(message, ErrorCodes.CLASSIFICATION_CONFLICT, { conflicts }, { stage });
    this.name = 'ClassificationConflictError';
    this.conflicts = conflicts;
  }
}

/**
 * The installer exited non-zero (or timed out) for one plan entry.
 */
export class InstallFailureError extends WheelstageError {
  readonly dependency: string;

  constructor(dependency: string, exitCode: number, output: string) {
    const header = exitCode === TIMEOUT_EXIT_CODE
      ? `Install of '${dependency}' timed out`
      : `Install of '${dependency}' failed with exit code ${exitCode}`;
    super(
      output ? `${header}\n${output}` : header,
      ErrorCodes.INSTALL_FAILURE,
      { dependency, exitCode },
      { stage: 'install', exitCode: exitCode > 0 ? exitCode : 1 }
    );
    this.name = 'InstallFailureError';
    this.dependency = dependency;
  }
}

/**
 * The plan asks for something the orchestrator refuses to run.
 */
export class InstallConfigurationError extends WheelstageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INSTALL_CONFIGURATION, details, { stage: 'install' });
    this.name = 'InstallConfigurationError';
  }
}

export class FileSystemError extends WheelstageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends WheelstageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends WheelstageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details, { stage: 'recipe' });
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult & { exitCode: number } {
  if (error instanceof WheelstageError) {
    logger.debug(error.message, { code: error.code, stage: error.stage, details: error.details });
    const where = error.stage ? `[${error.stage}] ` : '';
    return {
      success: false,
      error: `${where}${error.message}`,
      exitCode: error.exitCode
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message,
      exitCode: 1
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred',
      exitCode: 1
    };
  }
}

/**
 * Common types and interfaces for the wheelstage CLI application
 */

// Re-export domain types
export * from './recipe.js';
export * from './plan.js';
export * from './execution-context.js';

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

/**
 * Pipeline stage a failure belongs to. Errors carry it so the CLI can say
 * which part of the packaging run stopped.
 */
export type StageName = 'recipe' | 'build' | 'classify' | 'install' | 'assets';

// Error types
export class WheelstageError extends Error {
  public code: string;
  public details?: Record<string, unknown>;
  public stage?: StageName;
  /** Process exit status to report; external tool failures propagate theirs. */
  public exitCode: number;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options: { stage?: StageName; exitCode?: number } = {}
  ) {
    super(message);
    this.name = 'WheelstageError';
    this.code = code;
    this.details = details;
    this.stage = options.stage;
    this.exitCode = options.exitCode ?? 1;
  }
}

export enum ErrorCodes {
  BUILD_FAILURE = 'BUILD_FAILURE',
  CLASSIFICATION_CONFLICT = 'CLASSIFICATION_CONFLICT',
  INSTALL_FAILURE = 'INSTALL_FAILURE',
  INSTALL_CONFIGURATION = 'INSTALL_CONFIGURATION',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

/**
 * Non-fatal condition collected during a run and shown in the final report.
 */
export interface StageWarning {
  stage: StageName;
  kind: 'AssetSubstitutionMiss' | 'ChannelPreferenceOverridden' | 'ManifestWithoutMetadata' | 'StagingRootNotEmpty';
  message: string;
  subject?: string;
}

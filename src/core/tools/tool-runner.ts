import { execFile } from 'child_process';
import { constants } from 'os';
import { promisify } from 'util';

import { logger } from '../../utils/logger.js';
import { TIMEOUT_EXIT_CODE } from '../../utils/errors.js';
import { formatCommandLine } from './command-template.js';

const execFileAsync = promisify(execFile);

/** Exit status used when the command itself cannot be started. */
const COMMAND_NOT_FOUND_EXIT_CODE = 127;

/** Shells report death by signal N as 128 + N. */
const SIGNAL_EXIT_BASE = 128;

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd?: string;
  timeoutMs: number;
}

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Runs one external tool to completion. Every build and install goes through
 * this seam so tests can substitute an in-process runner.
 */
export interface ToolRunner {
  run(invocation: ToolInvocation): Promise<ToolResult>;
}

export interface ExecFileFailure {
  code?: number | string | null;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message: string;
}

function isExecFileFailure(error: unknown): error is ExecFileFailure {
  return error instanceof Error;
}

/**
 * Map a failed execFile call to a tool result. Only a kill by the runner's own
 * timer counts as a timeout.
 */
export function failureResult(error: ExecFileFailure, timedOut: boolean): ToolResult {
  const stdout = error.stdout ?? '';
  const stderr = error.stderr ?? '';

  if (timedOut) {
    return { exitCode: TIMEOUT_EXIT_CODE, stdout, stderr, timedOut: true };
  }
  if (typeof error.code === 'number') {
    return { exitCode: error.code, stdout, stderr, timedOut: false };
  }
  const signalNumber = error.signal ? SIGNAL_NUMBERS.get(error.signal) : undefined;
  if (signalNumber !== undefined) {
    return { exitCode: SIGNAL_EXIT_BASE + signalNumber, stdout, stderr: stderr || error.message, timedOut: false };
  }
  // ENOENT, EACCES: the process never ran
  return {
    exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
    stdout,
    stderr: stderr || error.message,
    timedOut: false
  };
}

/**
 * Default runner backed by child_process.execFile (no shell).
 */
export const execFileRunner: ToolRunner = {
  async run(invocation: ToolInvocation): Promise<ToolResult> {
    logger.debug(`Running: ${formatCommandLine(invocation.command, invocation.args)}`, {
      cwd: invocation.cwd,
      timeoutMs: invocation.timeoutMs
    });

    let timedOut = false;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, invocation.timeoutMs);

    try {
      const { stdout, stderr } = await execFileAsync(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        signal: controller.signal,
        maxBuffer: 64 * 1024 * 1024,
        encoding: 'utf8'
      });
      return { exitCode: 0, stdout, stderr, timedOut: false };
    } catch (error) {
      if (!isExecFileFailure(error)) {
        throw error;
      }
      const result = failureResult(error, timedOut);
      logger.debug(`Command exited with ${result.exitCode}`, { timedOut: result.timedOut });
      return result;
    } finally {
      clearTimeout(timer);
    }
  }
};

/**
 * Text to surface verbatim when a tool fails.
 */
export function diagnosticOutput(result: ToolResult): string {
  return [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join('\n');
}

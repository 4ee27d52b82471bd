import type { InstallerCommand, PlanAction } from '../../../types/index.js';
import { InstallFailureError } from '../../../utils/errors.js';
import { logger } from '../../../utils/logger.js';
import { expandArgs, formatCommandLine } from '../../tools/command-template.js';
import { diagnosticOutput, type ToolRunner } from '../../tools/tool-runner.js';

/**
 * Everything a channel installer needs to run one installer invocation.
 */
export interface ChannelInstallContext {
  stagingRoot: string;
  prefix: string;
  installer: InstallerCommand;
  timeoutMs: number;
  runner: ToolRunner;
  dryRun: boolean;
}

export interface InstalledEntry {
  channel: PlanAction['channel'];
  /** Dependency or artifact name the invocation installed. */
  subject: string;
  commandLine: string;
}

/**
 * A channel installer turns one plan action into one installer invocation.
 */
export interface ChannelInstaller {
  readonly name: string;
  canHandle(action: PlanAction): boolean;
  install(action: PlanAction, context: ChannelInstallContext): Promise<InstalledEntry>;
}

/**
 * Abstract base class for channel installers.
 * Runs the installer, logs, and maps a non-zero exit to InstallFailureError.
 */
export abstract class BaseChannelInstaller<A extends PlanAction> implements ChannelInstaller {
  abstract readonly name: string;

  protected abstract matches(action: PlanAction): action is A;

  /** Name reported in progress output and failures. */
  protected abstract subjectOf(action: A): string;

  /** Arguments appended after the recipe's installer arguments. */
  protected abstract trailingArgs(action: A, context: ChannelInstallContext): string[];

  canHandle(action: PlanAction): boolean {
    return this.matches(action);
  }

  async install(action: PlanAction, context: ChannelInstallContext): Promise<InstalledEntry> {
    if (!this.matches(action)) {
      throw new Error(`${this.name} installer cannot handle ${action.channel} actions`);
    }

    const subject = this.subjectOf(action);
    const args = [
      ...expandArgs(context.installer.args, { root: context.stagingRoot, prefix: context.prefix }),
      ...this.trailingArgs(action, context)
    ];
    const commandLine = formatCommandLine(context.installer.command, args);

    if (context.dryRun) {
      logger.debug(`Dry run, not executing: ${commandLine}`);
      return { channel: action.channel, subject, commandLine };
    }

    const result = await context.runner.run({
      command: context.installer.command,
      args,
      timeoutMs: context.timeoutMs
    });

    if (result.exitCode !== 0) {
      throw new InstallFailureError(subject, result.exitCode, diagnosticOutput(result));
    }

    logger.info(`Installed ${subject}`, { channel: action.channel });
    return { channel: action.channel, subject, commandLine };
  }
}

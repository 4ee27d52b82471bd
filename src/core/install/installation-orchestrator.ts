import { isAbsolute } from 'path';
import type { InstallPlan, InstallerCommand, PlanAction } from '../../types/index.js';
import { ensureDir, resolveUnderRoot } from '../../utils/fs.js';
import { ClassificationConflictError, InstallConfigurationError, ValidationError } from '../../utils/errors.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { execFileRunner, type ToolRunner } from '../tools/tool-runner.js';
import type { ChannelInstallContext, ChannelInstaller, InstalledEntry } from './channels/base.js';
import { IndexChannelInstaller } from './channels/index-channel.js';
import { LocalArtifactChannelInstaller } from './channels/local-artifact-channel.js';

export interface ExecutePlanOptions {
  /** Absolute staging root; every install writes beneath it. */
  stagingRoot: string;
  /** Absolute install prefix inside the staging root. */
  prefix: string;
  installer: InstallerCommand;
  timeoutMs: number;
  runner?: ToolRunner;
  output?: OutputPort;
  /** Print invocations without running them. */
  dryRun?: boolean;
}

export interface InstallReport {
  stagingRoot: string;
  prefix: string;
  installed: InstalledEntry[];
  /** Host-managed dependencies: recorded as preconditions, never executed. */
  hostManaged: string[];
  dryRun: boolean;
}

/**
 * Name an action installs, as checked for channel exclusivity.
 */
export function actionSubject(action: PlanAction): string {
  return action.channel === 'IndexInstall' ? action.dependency.name : action.artifact.name;
}

/**
 * Re-check a plan before anything runs. Plans built by the classifier pass
 * by construction; plan files edited by hand may not.
 *
 * @throws ClassificationConflictError when a name would be installed twice or
 *   is also host-managed
 * @throws InstallConfigurationError when a dependency-routed artifact is set
 *   to install its dependencies
 */
export function assertPlanExecutable(plan: InstallPlan): void {
  const hostNames = new Set(plan.hostManaged.map(dep => normalizePackageName(dep.name)));
  const scheduled = new Set<string>();
  const duplicates: string[] = [];

  for (const action of plan.actions) {
    const subject = actionSubject(action);
    const key = normalizePackageName(subject);
    if (scheduled.has(key) || hostNames.has(key)) {
      duplicates.push(subject);
    }
    scheduled.add(key);

    if (action.channel === 'LocalArtifactInstall' && action.dependenciesRouted && action.dependencyMode === 'full') {
      throw new InstallConfigurationError(
        `Artifact '${action.artifact.name}' has its dependencies routed by the plan and must be installed with dependencies skipped`,
        { artifact: action.artifact.name }
      );
    }
  }

  if (duplicates.length > 0) {
    throw new ClassificationConflictError(
      `Plan installs the same dependency more than once: ${duplicates.join(', ')}`,
      duplicates,
      'install'
    );
  }
}

/**
 * InstallationOrchestrator executes an InstallPlan against a staging root.
 *
 * Actions run strictly in plan order, one installer invocation at a time,
 * all against the same root and prefix. The first failure aborts the rest of
 * the plan and leaves the staging root untouched for inspection.
 */
export class InstallationOrchestrator {
  private installers: ChannelInstaller[] = [];

  /**
   * Register a channel installer.
   */
  registerInstaller(installer: ChannelInstaller): void {
    this.installers.push(installer);
  }

  private selectInstaller(action: PlanAction): ChannelInstaller {
    const installer = this.installers.find(candidate => candidate.canHandle(action));
    if (!installer) {
      throw new InstallConfigurationError(`No installer registered for ${action.channel} actions`);
    }
    return installer;
  }

  async execute(plan: InstallPlan, options: ExecutePlanOptions): Promise<InstallReport> {
    if (!isAbsolute(options.stagingRoot)) {
      throw new ValidationError(`staging root must be an absolute path: ${options.stagingRoot}`);
    }
    // Rejects prefixes that would leave the root (e.g. /../etc)
    const prefixDir = resolveUnderRoot(options.stagingRoot, options.prefix);

    assertPlanExecutable(plan);
    const installers = plan.actions.map(action => this.selectInstaller(action));

    const dryRun = options.dryRun ?? false;
    const output = resolveOutput(options);
    if (!dryRun) {
      await ensureDir(options.stagingRoot);
    }

    const context: ChannelInstallContext = {
      stagingRoot: options.stagingRoot,
      prefix: options.prefix,
      installer: options.installer,
      timeoutMs: options.timeoutMs,
      runner: options.runner ?? execFileRunner,
      dryRun
    };

    logger.debug(`Executing plan for ${plan.packageName}`, {
      actions: plan.actions.length,
      prefixDir,
      dryRun
    });

    const installed: InstalledEntry[] = [];
    for (const [index, action] of plan.actions.entries()) {
      const subject = actionSubject(action);
      const spinner = output.spinner();
      spinner.start(`[${index + 1}/${plan.actions.length}] ${dryRun ? 'Would install' : 'Installing'} ${subject}`);
      try {
        installed.push(await installers[index].install(action, context));
        spinner.stop(dryRun ? undefined : `Installed ${subject}`);
      } catch (error) {
        spinner.stop();
        throw error;
      }
    }

    return {
      stagingRoot: options.stagingRoot,
      prefix: options.prefix,
      installed,
      hostManaged: plan.hostManaged.map(dep => dep.name),
      dryRun
    };
  }
}

/**
 * Create an orchestrator with the built-in channel installers registered.
 */
export function createOrchestrator(): InstallationOrchestrator {
  const orchestrator = new InstallationOrchestrator();
  orchestrator.registerInstaller(new LocalArtifactChannelInstaller());
  orchestrator.registerInstaller(new IndexChannelInstaller());
  return orchestrator;
}

/**
 * Execute a plan with the built-in installers.
 */
export async function executePlan(plan: InstallPlan, options: ExecutePlanOptions): Promise<InstallReport> {
  return createOrchestrator().execute(plan, options);
}

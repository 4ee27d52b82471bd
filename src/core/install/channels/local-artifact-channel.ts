import type { LocalArtifactAction, PlanAction } from '../../../types/index.js';
import { BaseChannelInstaller, type ChannelInstallContext } from './base.js';

/**
 * Installs a locally built wheel. In `skip` mode the installer's
 * dependency-skip flag is passed because the plan already routes the
 * wheel's dependencies to other channels.
 */
export class LocalArtifactChannelInstaller extends BaseChannelInstaller<LocalArtifactAction> {
  readonly name = 'local-artifact';

  protected matches(action: PlanAction): action is LocalArtifactAction {
    return action.channel === 'LocalArtifactInstall';
  }

  protected subjectOf(action: LocalArtifactAction): string {
    return action.artifact.name;
  }

  protected trailingArgs(action: LocalArtifactAction, context: ChannelInstallContext): string[] {
    return action.dependencyMode === 'skip'
      ? [context.installer.noDepsFlag, action.artifact.path]
      : [action.artifact.path];
  }
}

import type { IndexInstallAction, PlanAction } from '../../../types/index.js';
import { formatSpecifier } from '../../../utils/package-name.js';
import { BaseChannelInstaller } from './base.js';

/**
 * Installs one dependency from the package index. The installer resolves
 * the dependency's own requirements, so no dependency-skip flag is passed.
 */
export class IndexChannelInstaller extends BaseChannelInstaller<IndexInstallAction> {
  readonly name = 'index';

  protected matches(action: PlanAction): action is IndexInstallAction {
    return action.channel === 'IndexInstall';
  }

  protected subjectOf(action: IndexInstallAction): string {
    return action.dependency.name;
  }

  protected trailingArgs(action: IndexInstallAction): string[] {
    return [formatSpecifier(action.dependency.name, action.dependency.versionConstraint)];
  }
}

import type { InstallPlan, PlanAction } from '../../types/index.js';
import { formatSpecifier } from '../../utils/package-name.js';
import { formatTreeLines } from '../../utils/formatters.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';

/**
 * One line per action, e.g. `LocalArtifactInstall demo-app 0.3.0 (primary, no deps)`.
 */
export function describeAction(action: PlanAction): string {
  if (action.channel === 'IndexInstall') {
    return `IndexInstall ${formatSpecifier(action.dependency.name, action.dependency.versionConstraint)}`;
  }
  const mode = action.dependencyMode === 'skip' ? 'no deps' : 'with deps';
  return `LocalArtifactInstall ${action.artifact.name} ${action.artifact.version} (${action.role}, ${mode})`;
}

export function displayPlan(plan: InstallPlan, output: OutputPort = resolveOutput()): void {
  output.step(`Install plan for ${plan.packageName}`);
  for (const line of formatTreeLines(plan.actions.map(describeAction))) {
    output.message(line);
  }

  if (plan.hostManaged.length > 0) {
    output.info(`HostManaged (not executed): ${plan.hostManaged.map(dep => dep.name).join(', ')}`);
  }
  for (const warning of plan.warnings) {
    output.warn(warning);
  }
}

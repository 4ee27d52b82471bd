/**
 * Channel Classifier
 *
 * Assigns every declared dependency to exactly one installation channel:
 *
 *   1. name provided by the host package manager  → HostManaged
 *   2. name of a locally built artifact            → LocalArtifactInstall
 *   3. anything else                               → IndexInstall
 *
 * A name that is both host-provided and built locally is a conflict and is
 * rejected; the classifier never picks one side. So is a host-provided name
 * that an artifact in `full` dependency mode declares, since its installer
 * would pull that name in again. The remaining dependencies of such
 * artifacts are recorded against the channel they will arrive through.
 *
 * Execution order of the resulting plan: primary artifact, index installs in
 * declaration order, subproject artifacts in build order.
 */

import type {
  BuiltArtifact,
  ChannelAssignment,
  DependencyMode,
  DependencyRef,
  IndexInstallAction,
  InstallPlan,
  LocalArtifactAction,
  Recipe
} from '../../types/index.js';
import { ClassificationConflictError } from '../../utils/errors.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { deepFreeze } from '../../utils/freeze.js';
import { logger } from '../../utils/logger.js';
import { mergeDeclaredDependencies } from './dependency-merge.js';

export interface ClassifyOptions {
  packageName: string;
  /** Dependency mode per artifact; defaults to `skip`. */
  dependencyModeOf?: (artifact: BuiltArtifact) => DependencyMode;
}

function indexArtifacts(localArtifacts: readonly BuiltArtifact[]): Map<string, BuiltArtifact> {
  const byName = new Map<string, BuiltArtifact>();
  const duplicates: string[] = [];

  for (const artifact of localArtifacts) {
    const key = normalizePackageName(artifact.name);
    if (byName.has(key)) {
      duplicates.push(artifact.name);
      continue;
    }
    byName.set(key, artifact);
  }

  if (duplicates.length > 0) {
    throw new ClassificationConflictError(
      `Artifacts built more than once: ${duplicates.join(', ')}`,
      duplicates
    );
  }
  return byName;
}

interface DelegatedDependency {
  artifact: BuiltArtifact;
  dependency: DependencyRef;
}

/**
 * Manifest dependencies the installer resolves itself, from artifacts in
 * `full` dependency mode. Self-dependencies are dropped.
 */
function delegatedDependencies(
  localArtifacts: readonly BuiltArtifact[],
  dependencyModeOf: (artifact: BuiltArtifact) => DependencyMode
): DelegatedDependency[] {
  return localArtifacts
    .filter(artifact => dependencyModeOf(artifact) === 'full')
    .flatMap(artifact => {
      const self = normalizePackageName(artifact.name);
      return artifact.declaredDependencies
        .filter(dependency => normalizePackageName(dependency.name) !== self)
        .map(dependency => ({ artifact, dependency }));
    });
}

/**
 * Classify declared dependencies into an immutable InstallPlan.
 *
 * @param declaredDependencies - dependencies to route; names must be unique
 * @param hostSatisfiedSet - names the host package manager provides
 * @param localArtifacts - wheels built for this run
 * @throws ClassificationConflictError when a name is host-provided and built
 *   locally, host-provided and pulled in by a full-mode artifact, or declared
 *   more than once
 */
export function classify(
  declaredDependencies: readonly DependencyRef[],
  hostSatisfiedSet: ReadonlySet<string>,
  localArtifacts: readonly BuiltArtifact[],
  options: ClassifyOptions
): InstallPlan {
  const dependencyModeOf = options.dependencyModeOf ?? ((): DependencyMode => 'skip');
  const hostNames = new Set(Array.from(hostSatisfiedSet, normalizePackageName));
  const artifactsByName = indexArtifacts(localArtifacts);

  const conflicts = localArtifacts
    .filter(artifact => hostNames.has(normalizePackageName(artifact.name)))
    .map(artifact => artifact.name);
  if (conflicts.length > 0) {
    throw new ClassificationConflictError(
      `Dependencies both provided by the host package manager and built locally: ${conflicts.join(', ')}. ` +
        'Remove them from host.provides or stop building them.',
      conflicts
    );
  }

  const delegated = delegatedDependencies(localArtifacts, dependencyModeOf);
  const reinstalled = delegated.filter(({ dependency }) => hostNames.has(normalizePackageName(dependency.name)));
  if (reinstalled.length > 0) {
    throw new ClassificationConflictError(
      'Dependencies provided by the host package manager would be reinstalled by artifacts in full dependency mode: ' +
        `${reinstalled.map(({ artifact, dependency }) => `${dependency.name} (${artifact.name})`).join(', ')}. ` +
        'Set dependencyMode: skip on those artifacts or remove the names from host.provides.',
      reinstalled.map(({ dependency }) => dependency.name)
    );
  }

  const assignments: ChannelAssignment[] = [];
  const hostManaged: DependencyRef[] = [];
  const indexActions: IndexInstallAction[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();

  for (const dependency of declaredDependencies) {
    const name = normalizePackageName(dependency.name);
    if (seen.has(name)) {
      throw new ClassificationConflictError(`Dependency '${dependency.name}' is declared more than once`, [dependency.name]);
    }
    seen.add(name);

    if (hostNames.has(name)) {
      assignments.push({ name, channel: 'HostManaged' });
      hostManaged.push({ ...dependency });
      if (dependency.preferredChannel !== 'host') {
        warnings.push(`${dependency.name}: prefers ${dependency.preferredChannel} but is provided by the host package manager`);
      }
      continue;
    }

    const artifact = artifactsByName.get(name);
    if (artifact) {
      assignments.push({ name, channel: 'LocalArtifactInstall' });
      if (dependency.preferredChannel !== 'bundled' && artifact.role === 'subproject') {
        warnings.push(`${dependency.name}: prefers ${dependency.preferredChannel} but is installed from the locally built ${artifact.name}`);
      }
      continue;
    }

    assignments.push({ name, channel: 'IndexInstall' });
    indexActions.push({ channel: 'IndexInstall', dependency: { ...dependency } });
    if (dependency.preferredChannel !== 'index') {
      warnings.push(`${dependency.name}: prefers ${dependency.preferredChannel} but no matching source exists; installing from the package index`);
    }
  }

  // Installed alongside a full-mode artifact; no action of their own.
  for (const { dependency } of delegated) {
    const name = normalizePackageName(dependency.name);
    if (seen.has(name)) continue;
    seen.add(name);
    assignments.push({ name, channel: artifactsByName.has(name) ? 'LocalArtifactInstall' : 'IndexInstall' });
  }

  const localAction = (artifact: BuiltArtifact): LocalArtifactAction => {
    const dependencyMode = dependencyModeOf(artifact);
    return {
      channel: 'LocalArtifactInstall',
      artifact: { ...artifact, declaredDependencies: artifact.declaredDependencies.map(dep => ({ ...dep })) },
      role: artifact.role,
      dependencyMode,
      dependenciesRouted: dependencyMode === 'skip'
    };
  };

  const plan: InstallPlan = {
    packageName: options.packageName,
    actions: [
      ...localArtifacts.filter(artifact => artifact.role === 'primary').map(localAction),
      ...indexActions,
      ...localArtifacts.filter(artifact => artifact.role === 'subproject').map(localAction)
    ],
    hostManaged,
    assignments,
    warnings
  };

  logger.debug('Classified dependencies', {
    hostManaged: hostManaged.length,
    index: indexActions.length,
    local: localArtifacts.length
  });

  return deepFreeze(plan);
}

/**
 * Dependency mode the recipe configures for a built artifact.
 */
export function dependencyModeFor(recipe: Recipe, artifact: BuiltArtifact): DependencyMode {
  if (artifact.role === 'primary') {
    return recipe.primary.dependencyMode;
  }
  const subproject = recipe.subprojects.find(candidate => candidate.path === artifact.sourceDir);
  return subproject?.dependencyMode ?? 'skip';
}

/**
 * Names the host package manager is trusted to provide: `host.provides`
 * plus every dependency the recipe routes to the host channel.
 */
export function hostSatisfiedSetFor(recipe: Recipe): Set<string> {
  return new Set([
    ...recipe.hostProvides,
    ...recipe.dependencies.filter(dep => dep.preferredChannel === 'host').map(dep => dep.name)
  ]);
}

/**
 * Classify a recipe against the artifacts built for it.
 */
export function buildInstallPlan(recipe: Recipe, artifacts: readonly BuiltArtifact[]): InstallPlan {
  const dependencyModeOf = (artifact: BuiltArtifact): DependencyMode => dependencyModeFor(recipe, artifact);
  const declared = mergeDeclaredDependencies(recipe.dependencies, artifacts, dependencyModeOf);
  return classify(declared, hostSatisfiedSetFor(recipe), artifacts, {
    packageName: recipe.name,
    dependencyModeOf
  });
}

import type { BuiltArtifact, DependencyMode, DependencyRef } from '../../types/index.js';
import { normalizePackageName } from '../../utils/package-name.js';
import { higherMinimum } from '../../utils/version.js';
import { logger } from '../../utils/logger.js';

/**
 * Fold the manifest dependencies of every `skip`-mode artifact into the
 * recipe's dependency list, deduplicated by normalized name.
 *
 * The recipe entry keeps its position and preferred channel; a manifest
 * entry for the same name can only raise the minimum version. A
 * dependency on the artifact itself is dropped. Artifacts in `full` mode
 * keep their dependencies to the installer and contribute nothing here.
 */
export function mergeDeclaredDependencies(
  recipeDependencies: readonly DependencyRef[],
  artifacts: readonly BuiltArtifact[],
  dependencyModeOf: (artifact: BuiltArtifact) => DependencyMode
): DependencyRef[] {
  const merged = new Map<string, DependencyRef>();

  for (const dependency of recipeDependencies) {
    merged.set(normalizePackageName(dependency.name), { ...dependency });
  }

  for (const artifact of artifacts) {
    if (dependencyModeOf(artifact) !== 'skip') continue;
    const self = normalizePackageName(artifact.name);

    for (const dependency of artifact.declaredDependencies) {
      const key = normalizePackageName(dependency.name);
      if (key === self) continue;

      const existing = merged.get(key);
      if (!existing) {
        merged.set(key, { ...dependency });
        continue;
      }

      const versionConstraint = higherMinimum(existing.versionConstraint, dependency.versionConstraint);
      if (versionConstraint !== existing.versionConstraint) {
        logger.debug(`Raising minimum version of ${existing.name} to ${versionConstraint} (required by ${artifact.name})`);
        merged.set(key, { ...existing, versionConstraint });
      }
    }
  }

  return Array.from(merged.values());
}

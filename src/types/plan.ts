/**
 * Artifact and install plan types shared by the builder, the classifier and
 * the orchestrator.
 */

import type { DependencyMode, DependencyRef } from './recipe.js';

export type ArtifactRole = 'primary' | 'subproject';

export interface BuiltArtifact {
  /** Project name from the manifest, else the distribution part of the wheel file name. */
  name: string;
  version: string;
  /** Absolute path of the wheel. */
  path: string;
  role: ArtifactRole;
  /** Source tree the artifact was built from. */
  sourceDir: string;
  /** Dependencies read from the source tree's own manifest. */
  declaredDependencies: DependencyRef[];
}

export type Channel = 'HostManaged' | 'IndexInstall' | 'LocalArtifactInstall';

export interface LocalArtifactAction {
  channel: 'LocalArtifactInstall';
  artifact: BuiltArtifact;
  role: ArtifactRole;
  dependencyMode: DependencyMode;
  /**
   * True when the classifier already placed this artifact's manifest
   * dependencies elsewhere in the plan. Such an artifact must be installed
   * with dependencies suppressed.
   */
  dependenciesRouted: boolean;
}

export interface IndexInstallAction {
  channel: 'IndexInstall';
  dependency: DependencyRef;
}

export type PlanAction = LocalArtifactAction | IndexInstallAction;

export interface ChannelAssignment {
  /** Normalized dependency name. */
  name: string;
  channel: Channel;
}

export interface InstallPlan {
  packageName: string;
  /** Ordered execution list. HostManaged entries never appear here. */
  actions: readonly PlanAction[];
  /** Dependencies trusted to the host package manager; recorded, not executed. */
  hostManaged: readonly DependencyRef[];
  /**
   * One entry per declared dependency, in declaration order, followed by the
   * dependencies left to the installer of full-mode artifacts.
   */
  assignments: readonly ChannelAssignment[];
  warnings: readonly string[];
}

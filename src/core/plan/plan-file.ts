/**
 * Plan files: JSON snapshots of an InstallPlan so a plan can be reviewed
 * before `wheelstage install --plan <file>` executes it.
 *
 * Loading re-validates the whole structure. The orchestrator still re-checks
 * channel exclusivity, since a plan file may have been edited by hand.
 */

import type {
  ArtifactRole,
  BuiltArtifact,
  Channel,
  ChannelAssignment,
  DependencyMode,
  DependencyRef,
  InstallPlan,
  PlanAction
} from '../../types/index.js';
import { DEPENDENCY_MODES, PLAN_FORMAT_VERSION, PREFERRED_CHANNELS } from '../../constants/index.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { ValidationError } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';

interface PlanFileDocument {
  formatVersion: typeof PLAN_FORMAT_VERSION;
  plan: InstallPlan;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(record: JsonRecord, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`plan file: ${where}.${key} must be a non-empty string`);
  }
  return value;
}

function expectArray(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`plan file: ${where} must be an array`);
  }
  return value;
}

function parseDependency(value: unknown, where: string): DependencyRef {
  if (!isRecord(value)) {
    throw new ValidationError(`plan file: ${where} must be an object`);
  }
  const preferredChannel = PREFERRED_CHANNELS.find(channel => channel === value.preferredChannel);
  if (!preferredChannel) {
    throw new ValidationError(`plan file: ${where}.preferredChannel is invalid`);
  }
  const dependency: DependencyRef = { name: expectString(value, 'name', where), preferredChannel };
  if (value.versionConstraint !== undefined) {
    dependency.versionConstraint = expectString(value, 'versionConstraint', where);
  }
  return dependency;
}

function parseRole(value: unknown, where: string): ArtifactRole {
  if (value !== 'primary' && value !== 'subproject') {
    throw new ValidationError(`plan file: ${where} must be 'primary' or 'subproject'`);
  }
  return value;
}

function parseArtifact(value: unknown, where: string): BuiltArtifact {
  if (!isRecord(value)) {
    throw new ValidationError(`plan file: ${where} must be an object`);
  }
  return {
    name: expectString(value, 'name', where),
    version: expectString(value, 'version', where),
    path: expectString(value, 'path', where),
    role: parseRole(value.role, `${where}.role`),
    sourceDir: expectString(value, 'sourceDir', where),
    declaredDependencies: expectArray(value.declaredDependencies ?? [], `${where}.declaredDependencies`)
      .map((dep, index) => parseDependency(dep, `${where}.declaredDependencies[${index}]`))
  };
}

function parseAction(value: unknown, where: string): PlanAction {
  if (!isRecord(value)) {
    throw new ValidationError(`plan file: ${where} must be an object`);
  }

  if (value.channel === 'IndexInstall') {
    return { channel: 'IndexInstall', dependency: parseDependency(value.dependency, `${where}.dependency`) };
  }

  if (value.channel === 'LocalArtifactInstall') {
    const dependencyMode: DependencyMode | undefined = DEPENDENCY_MODES.find(mode => mode === value.dependencyMode);
    if (!dependencyMode) {
      throw new ValidationError(`plan file: ${where}.dependencyMode is invalid`);
    }
    if (typeof value.dependenciesRouted !== 'boolean') {
      throw new ValidationError(`plan file: ${where}.dependenciesRouted must be a boolean`);
    }
    return {
      channel: 'LocalArtifactInstall',
      artifact: parseArtifact(value.artifact, `${where}.artifact`),
      role: parseRole(value.role, `${where}.role`),
      dependencyMode,
      dependenciesRouted: value.dependenciesRouted
    };
  }

  throw new ValidationError(`plan file: ${where}.channel must be IndexInstall or LocalArtifactInstall`);
}

function parseAssignment(value: unknown, where: string): ChannelAssignment {
  if (!isRecord(value)) {
    throw new ValidationError(`plan file: ${where} must be an object`);
  }
  const channels: readonly Channel[] = ['HostManaged', 'IndexInstall', 'LocalArtifactInstall'];
  const channel = channels.find(candidate => candidate === value.channel);
  if (!channel) {
    throw new ValidationError(`plan file: ${where}.channel is invalid`);
  }
  return { name: expectString(value, 'name', where), channel };
}

/**
 * Validate a parsed plan document. The returned plan is frozen.
 */
export function parsePlanDocument(document: unknown): InstallPlan {
  if (!isRecord(document) || document.formatVersion !== PLAN_FORMAT_VERSION) {
    throw new ValidationError(`plan file: unsupported format (expected formatVersion ${PLAN_FORMAT_VERSION})`);
  }
  const plan = document.plan;
  if (!isRecord(plan)) {
    throw new ValidationError('plan file: plan must be an object');
  }

  return deepFreeze({
    packageName: expectString(plan, 'packageName', 'plan'),
    actions: expectArray(plan.actions, 'plan.actions').map((action, index) => parseAction(action, `plan.actions[${index}]`)),
    hostManaged: expectArray(plan.hostManaged, 'plan.hostManaged').map((dep, index) => parseDependency(dep, `plan.hostManaged[${index}]`)),
    assignments: expectArray(plan.assignments, 'plan.assignments').map((entry, index) => parseAssignment(entry, `plan.assignments[${index}]`)),
    warnings: expectArray(plan.warnings ?? [], 'plan.warnings').filter((warning): warning is string => typeof warning === 'string')
  });
}

export function serializePlan(plan: InstallPlan): string {
  const document: PlanFileDocument = { formatVersion: PLAN_FORMAT_VERSION, plan };
  return `${JSON.stringify(document, null, 2)}\n`;
}

export async function savePlan(path: string, plan: InstallPlan): Promise<void> {
  await writeTextFile(path, serializePlan(plan));
}

export async function loadPlan(path: string): Promise<InstallPlan> {
  const content = await readTextFile(path);
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ValidationError(`plan file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parsePlanDocument(document);
}

import type { DependencyRef } from '../../types/index.js';
import { higherMinimum } from '../../utils/version.js';
import { logger } from '../../utils/logger.js';

/**
 * Reduce a PEP 508 requirement string (`httpx[http2]>=0.27,<1; python_version>"3.9"`)
 * to the parts the installer needs: the distribution name and a minimum
 * version. Extras, upper bounds and environment markers are dropped.
 */

const NAME = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/;
const CLAUSE = /^(===|==|~=|>=|<=|!=|>|<)\s*(\S+)$/;
const MINIMUM_OPERATORS = new Set(['===', '==', '~=', '>=']);

export function parseRequirement(requirement: string): DependencyRef | null {
  const [spec] = requirement.split(';');
  const trimmed = spec.trim();
  if (!trimmed) return null;

  const nameMatch = NAME.exec(trimmed);
  if (!nameMatch) {
    logger.debug(`Ignoring unparseable requirement: ${requirement}`);
    return null;
  }

  const name = nameMatch[1];
  let rest = trimmed.slice(name.length).trim();

  // Extras
  if (rest.startsWith('[')) {
    const close = rest.indexOf(']');
    rest = close >= 0 ? rest.slice(close + 1).trim() : '';
  }

  // Direct references carry no version constraint
  if (rest.startsWith('@')) {
    return { name, preferredChannel: 'index' };
  }

  if (rest.startsWith('(') && rest.endsWith(')')) {
    rest = rest.slice(1, -1);
  }

  let minimum: string | undefined;
  for (const clause of rest.split(',')) {
    const match = CLAUSE.exec(clause.trim());
    if (!match || !MINIMUM_OPERATORS.has(match[1])) continue;
    const version = match[2].replace(/\.\*$/, '');
    minimum = higherMinimum(minimum, version);
  }

  return minimum
    ? { name, versionConstraint: minimum, preferredChannel: 'index' }
    : { name, preferredChannel: 'index' };
}

export function parseRequirements(requirements: readonly string[]): DependencyRef[] {
  return requirements
    .map(parseRequirement)
    .filter((dependency): dependency is DependencyRef => dependency !== null);
}

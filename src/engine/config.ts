/**
 * Level configuration validation.
 *
 * Configuration is checked once, before the first step. Out-of-range inputs
 * are rejected, never clamped: only runtime physical quantities get clamped.
 */

import type { LevelParams, UpgradeMultipliers, UpgradeKind } from './types';
import { Difficulty } from './types';

export const MIN_MULTIPLIER = 1.0;
export const MAX_MULTIPLIER = 3.0;

export const UPGRADE_KINDS: readonly UpgradeKind[] = [
  'acceleration',
  'topSpeed',
  'traction',
  'fuelEfficiency',
  'suspension',
];

/** Multipliers for a car with no upgrades bought. */
export const BASE_UPGRADES: Readonly<UpgradeMultipliers> = {
  acceleration: 1,
  topSpeed: 1,
  traction: 1,
  fuelEfficiency: 1,
  suspension: 1,
};

/** Thrown at level start when the configuration cannot be simulated. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid level configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const DIFFICULTIES: readonly string[] = Object.values(Difficulty);

export function isDifficulty(value: unknown): value is Difficulty {
  return typeof value === 'string' && DIFFICULTIES.includes(value);
}

/**
 * Check every field and throw one ConfigError listing all problems.
 * Returns the same object when valid so callers can chain it.
 */
export function validateLevelParams(params: LevelParams): LevelParams {
  const issues: string[] = [];

  if (!Number.isSafeInteger(params.seed)) {
    issues.push(`seed must be an integer, got ${params.seed}`);
  }
  if (!isDifficulty(params.difficulty)) {
    issues.push(`difficulty must be one of ${DIFFICULTIES.join(', ')}, got ${String(params.difficulty)}`);
  }
  if (!Number.isFinite(params.gravityScale) || params.gravityScale <= 0) {
    issues.push(`gravityScale must be > 0, got ${params.gravityScale}`);
  }
  checkUnitRange('frictionCoefficient', params.frictionCoefficient, issues);
  checkUnitRange('airResistance', params.airResistance, issues);
  if (!Number.isFinite(params.targetDistance) || params.targetDistance <= 0) {
    issues.push(`targetDistance must be > 0, got ${params.targetDistance}`);
  }
  if (params.flatStartLength !== undefined
    && (!Number.isFinite(params.flatStartLength) || params.flatStartLength < 0)) {
    issues.push(`flatStartLength must be >= 0, got ${params.flatStartLength}`);
  }

  for (const kind of UPGRADE_KINDS) {
    const value = params.upgrades[kind];
    if (!Number.isFinite(value) || value < MIN_MULTIPLIER || value > MAX_MULTIPLIER) {
      issues.push(`upgrades.${kind} must be in [${MIN_MULTIPLIER}, ${MAX_MULTIPLIER}], got ${value}`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return params;
}

function checkUnitRange(field: string, value: number, issues: string[]): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    issues.push(`${field} must be in [0, 1], got ${value}`);
  }
}

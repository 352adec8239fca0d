import { describe, it, expect } from 'vitest';
import { validateLevelParams, isDifficulty, ConfigError, BASE_UPGRADES } from '../../src/engine/config';
import { Difficulty } from '../../src/engine/types';
import type { LevelParams } from '../../src/engine/types';

const VALID: LevelParams = {
  seed: 42,
  difficulty: Difficulty.Easy,
  gravityScale: 1,
  frictionCoefficient: 0.8,
  airResistance: 0.1,
  targetDistance: 500,
  upgrades: BASE_UPGRADES,
};

function issuesFor(params: LevelParams): readonly string[] {
  try {
    validateLevelParams(params);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('validateLevelParams', () => {
  it('returns valid params unchanged', () => {
    expect(validateLevelParams(VALID)).toBe(VALID);
  });

  it('accepts the edges of every range', () => {
    const edges: LevelParams = {
      ...VALID,
      frictionCoefficient: 0,
      airResistance: 1,
      flatStartLength: 0,
      upgrades: { acceleration: 1, topSpeed: 3, traction: 3, fuelEfficiency: 1, suspension: 3 },
    };
    expect(issuesFor(edges)).toEqual([]);
  });

  it.each([
    ['seed', { seed: 1.5 }, 'seed must be an integer, got 1.5'],
    ['gravityScale', { gravityScale: 0 }, 'gravityScale must be > 0, got 0'],
    ['frictionCoefficient', { frictionCoefficient: 1.2 }, 'frictionCoefficient must be in [0, 1], got 1.2'],
    ['airResistance', { airResistance: -0.1 }, 'airResistance must be in [0, 1], got -0.1'],
    ['targetDistance', { targetDistance: 0 }, 'targetDistance must be > 0, got 0'],
    ['flatStartLength', { flatStartLength: -5 }, 'flatStartLength must be >= 0, got -5'],
    ['non-finite gravity', { gravityScale: Number.NaN }, 'gravityScale must be > 0, got NaN'],
  ])('rejects a bad %s', (_name, patch, message) => {
    expect(issuesFor({ ...VALID, ...patch })).toEqual([message]);
  });

  it('rejects multipliers outside [1, 3]', () => {
    const upgrades = { ...BASE_UPGRADES, topSpeed: 3.5, suspension: 0.5 };
    expect(issuesFor({ ...VALID, upgrades })).toEqual([
      'upgrades.topSpeed must be in [1, 3], got 3.5',
      'upgrades.suspension must be in [1, 3], got 0.5',
    ]);
  });

  it('lists every problem in one error', () => {
    const bad = { ...VALID, seed: 0.5, gravityScale: -1, targetDistance: -10 };
    expect(() => validateLevelParams(bad)).toThrow(
      'Invalid level configuration: seed must be an integer, got 0.5; gravityScale must be > 0, got -1; targetDistance must be > 0, got -10',
    );
  });
});

describe('isDifficulty', () => {
  it('accepts every tier', () => {
    for (const tier of Object.values(Difficulty)) expect(isDifficulty(tier)).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isDifficulty('insane')).toBe(false);
    expect(isDifficulty(3)).toBe(false);
    expect(isDifficulty(undefined)).toBe(false);
  });
});

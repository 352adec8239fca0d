import type { LevelParams, UpgradeMultipliers } from '../engine/types';
import { Difficulty } from '../engine/types';
import { BASE_UPGRADES } from '../engine/config';

export interface LevelInfo {
  id: string;
  name: string;
  description: string;
  difficulty: Difficulty;
  seed: number;
  /** Metres to the right of the start line */
  targetDistance: number;
}

/** Physics every catalogue level runs with. */
export const DEFAULT_PHYSICS = {
  gravityScale: 1.0,
  frictionCoefficient: 0.8,
  airResistance: 0.1,
} as const;

export const LEVELS: LevelInfo[] = [
  {
    id: 'mountain-valley',
    name: 'Mountain Valley',
    description: 'Beginner, long rolling hills, plenty of fuel',
    difficulty: Difficulty.Easy,
    seed: 42,
    targetDistance: 500,
  },
  {
    id: 'rocky-hills',
    name: 'Rocky Hills',
    description: 'Steeper climbs, first spike strips',
    difficulty: Difficulty.Medium,
    seed: 123,
    targetDistance: 800,
  },
  {
    id: 'desert-dunes',
    name: 'Desert Dunes',
    description: 'Short dunes and ledges, fuel gets scarce',
    difficulty: Difficulty.Hard,
    seed: 456,
    targetDistance: 1200,
  },
  {
    id: 'alpine-peak',
    name: 'Alpine Peak',
    description: 'Steep walls, frequent ledges',
    difficulty: Difficulty.VeryHard,
    seed: 789,
    targetDistance: 1500,
  },
  {
    id: 'volcanic-crater',
    name: 'Volcanic Crater',
    description: 'Near-vertical climbs, spikes everywhere',
    difficulty: Difficulty.Extreme,
    seed: 999,
    targetDistance: 2000,
  },
];

export function findLevel(levelId: string): LevelInfo {
  const level = LEVELS.find((l) => l.id === levelId);
  if (!level) {
    throw new Error(`Unknown level "${levelId}". Available: ${LEVELS.map((l) => l.id).join(', ')}`);
  }
  return level;
}

/**
 * Level parameters for a catalogue level with the player's upgrades.
 * Overrides replace individual fields (tests and the bridge use them).
 */
export function createLevelParams(
  levelId: string,
  upgrades: UpgradeMultipliers = BASE_UPGRADES,
  overrides: Partial<LevelParams> = {},
): LevelParams {
  const level = findLevel(levelId);
  return {
    seed: level.seed,
    difficulty: level.difficulty,
    targetDistance: level.targetDistance,
    ...DEFAULT_PHYSICS,
    upgrades: { ...upgrades },
    ...overrides,
  };
}

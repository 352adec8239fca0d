/**
 * Achievements: one-time unlocks with a coin reward.
 *
 * Checked after every run against the run summary and lifetime totals.
 */

import type { RunSummary } from '../engine/GameSession';
import { RunPhase } from '../engine/GameSession';

export type AchievementId =
  | 'first-run'
  | 'speed-demon'
  | 'distance-5k'
  | 'distance-10k'
  | 'distance-20k'
  | 'flip-master'
  | 'eco-driver';

export interface AchievementInfo {
  id: AchievementId;
  title: string;
  description: string;
  reward: number;
}

/** Peak speed for Speed Demon, m/s */
export const SPEED_DEMON_SPEED = 25;
/** Flips in a single run for Flip Master */
export const FLIP_MASTER_FLIPS = 5;
/** Fuel left at the finish line for Eco Driver */
export const ECO_DRIVER_FUEL = 50;

export const ACHIEVEMENTS: readonly AchievementInfo[] = [
  { id: 'first-run',    title: 'First Run',   description: 'Finish your first run', reward: 100 },
  { id: 'speed-demon',  title: 'Speed Demon', description: `Reach ${SPEED_DEMON_SPEED} m/s`, reward: 500 },
  { id: 'distance-5k',  title: '5K Explorer', description: 'Drive 5,000 m in total', reward: 250 },
  { id: 'distance-10k', title: '10K Warrior', description: 'Drive 10,000 m in total', reward: 500 },
  { id: 'distance-20k', title: '20K Legend',  description: 'Drive 20,000 m in total', reward: 1000 },
  { id: 'flip-master',  title: 'Flip Master', description: `Land ${FLIP_MASTER_FLIPS} flips in one run`, reward: 300 },
  { id: 'eco-driver',   title: 'Eco Driver',  description: `Complete a level with ${ECO_DRIVER_FUEL}% fuel left`, reward: 200 },
];

export interface AchievementContext {
  run: RunSummary;
  /** Lifetime distance including this run, m */
  totalDistance: number;
  /** Lifetime runs including this one */
  runs: number;
}

const CONDITIONS: Record<AchievementId, (ctx: AchievementContext) => boolean> = {
  'first-run':    (ctx) => ctx.runs >= 1,
  'speed-demon':  (ctx) => ctx.run.peakSpeed >= SPEED_DEMON_SPEED,
  'distance-5k':  (ctx) => ctx.totalDistance >= 5_000,
  'distance-10k': (ctx) => ctx.totalDistance >= 10_000,
  'distance-20k': (ctx) => ctx.totalDistance >= 20_000,
  'flip-master':  (ctx) => ctx.run.flips >= FLIP_MASTER_FLIPS,
  'eco-driver':   (ctx) => ctx.run.phase === RunPhase.Completed && ctx.run.fuelRemaining >= ECO_DRIVER_FUEL,
};

/** Every achievement whose condition holds, in catalogue order. */
export function earnedAchievements(ctx: AchievementContext): AchievementInfo[] {
  return ACHIEVEMENTS.filter((a) => CONDITIONS[a.id](ctx));
}

export function isAchievementId(value: unknown): value is AchievementId {
  return typeof value === 'string' && ACHIEVEMENTS.some((a) => a.id === value);
}

/**
 * HeadlessDriver — episode-style wrapper around a GameSession.
 *
 * Turns the session into a reset/step interface for scripted or external
 * drivers: actions arrive as plain arrays, results go out as plain JSON-able
 * objects. No rendering, no sockets (the bridge server adds those).
 */

import type { DriverInput, GameEvent, HudSnapshot, UpgradeMultipliers } from '../engine/types';
import { GameSession, RunPhase, type RunSummary } from '../engine/GameSession';
import { BASE_UPGRADES, UPGRADE_KINDS } from '../engine/config';
import { createLevelParams, findLevel } from '../levels/registry';

/** Default episode cap: five minutes of simulated time. */
export const DEFAULT_MAX_STEPS = 18_000;

export interface ResetResult {
  hud: HudSnapshot;
  info: Record<string, unknown>;
}

export interface StepResult {
  hud: HudSnapshot;
  events: GameEvent[];
  /** Run ended (completed, crashed, out of fuel) or hit the step cap */
  done: boolean;
  phase: RunPhase;
  info: Record<string, unknown>;
}

function toFlag(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value >= 0.5;
  throw new Error('action elements must be booleans or finite numbers');
}

/** [accelerate, brake, steerLeft, steerRight]; numbers count as pressed from 0.5 up. */
export function validateAction(raw: unknown): DriverInput {
  if (!Array.isArray(raw) || raw.length !== 4) {
    throw new Error('action must be a 4-element array [accelerate, brake, steerLeft, steerRight]');
  }
  const [accelerate, brake, steerLeft, steerRight] = raw.map(toFlag);
  return { accelerate, brake, steerLeft, steerRight };
}

/**
 * Upgrade multipliers from an untrusted object. Missing kinds default to 1;
 * range checks happen in level validation.
 */
export function parseUpgrades(raw: unknown): UpgradeMultipliers {
  if (raw === undefined || raw === null) return { ...BASE_UPGRADES };
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('upgrades must be an object of multipliers');
  }
  const result = { ...BASE_UPGRADES };
  for (const kind of UPGRADE_KINDS) {
    const value: unknown = Reflect.get(raw, kind);
    if (value === undefined) continue;
    if (typeof value !== 'number') {
      throw new Error(`upgrades.${kind} must be a number`);
    }
    result[kind] = value;
  }
  return result;
}

export class HeadlessDriver {
  readonly levelId: string;
  private readonly upgrades: UpgradeMultipliers;
  private readonly maxSteps: number;
  private session: GameSession | null = null;
  private stepCount = 0;

  constructor(
    levelId = 'mountain-valley',
    upgrades: UpgradeMultipliers = BASE_UPGRADES,
    maxSteps = DEFAULT_MAX_STEPS,
  ) {
    findLevel(levelId);
    this.levelId = levelId;
    this.upgrades = upgrades;
    this.maxSteps = maxSteps;
  }

  reset(): ResetResult {
    if (this.session) {
      this.session.restart();
    } else {
      this.session = new GameSession(
        createLevelParams(this.levelId, this.upgrades),
        { levelId: this.levelId },
      );
    }
    this.stepCount = 0;

    return {
      hud: this.session.snapshot(),
      info: {
        levelId: this.levelId,
        tick: this.session.world.tick,
        stepCount: this.stepCount,
      },
    };
  }

  step(action: unknown): StepResult {
    if (!this.session) {
      throw new Error('step() called before reset()');
    }

    const input = validateAction(action);
    const events = this.session.step(input);
    this.stepCount++;

    const truncated = this.stepCount >= this.maxSteps;
    const { car, tick } = this.session.world;

    return {
      hud: this.session.snapshot(),
      events,
      done: this.session.finished || truncated,
      phase: this.session.phase,
      info: {
        tick,
        stepCount: this.stepCount,
        truncated,
        x: car.position.x,
        y: car.position.y,
        angle: car.angle,
      },
    };
  }

  summary(): RunSummary {
    if (!this.session) {
      throw new Error('summary() called before reset()');
    }
    return this.session.summary();
  }
}

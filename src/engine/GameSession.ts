/**
 * GameSession — Headless Run Controller
 *
 * Owns one run on one level: world, event tracker, fixed-step clock and run
 * phase. Lives in src/engine/ with zero renderer imports; a frontend calls
 * advance() each frame and reads snapshot(), the bridge calls step() once
 * per action. Nothing here is global: every run is its own object.
 */

import type { DriverInput, GameEvent, HudSnapshot, LevelParams, WorldState } from './types';
import { createWorld, stepWorld } from './world';
import { createEventTracker, detectEvents, type EventTrackerState } from './events';
import { FixedStepClock } from './FixedStepClock';
import { ConfigError } from './config';
import { DT, STALL, TERRAIN } from './constants';
import { clamp, length } from './vec2';

// ─────────────────────────────────────────────────────────
// Run phase
// ─────────────────────────────────────────────────────────

export enum RunPhase {
  Running   = 'running',
  Completed = 'completed',
  Crashed   = 'crashed',
  OutOfFuel = 'out-of-fuel',
}

export interface SessionOptions {
  /** Catalogue id, carried into the run summary */
  levelId?: string;
  /** Fuel in the tank at the start, 0 to 100 (default 100) */
  startFuel?: number;
}

/** What a finished (or abandoned) run hands to progression. */
export interface RunSummary {
  levelId: string | null;
  phase: RunPhase;
  distance: number;
  coins: number;
  flips: number;
  /** Highest speed reached, m/s */
  peakSpeed: number;
  fuelRemaining: number;
  timeElapsed: number;
}

// ─────────────────────────────────────────────────────────
// GameSession
// ─────────────────────────────────────────────────────────

export class GameSession {
  readonly params: LevelParams;
  readonly levelId: string | null;
  private readonly startFuel: number;
  private readonly clock = new FixedStepClock();

  private _world: WorldState;
  private _phase = RunPhase.Running;
  private tracker: EventTrackerState = createEventTracker();
  private stallTicks = 0;
  private flips = 0;
  private peakSpeed = 0;

  /** Validates params and builds the level. Throws ConfigError or TerrainError. */
  constructor(params: LevelParams, options: SessionOptions = {}) {
    const startFuel = options.startFuel ?? 100;
    if (!Number.isFinite(startFuel) || startFuel < 0 || startFuel > 100) {
      throw new ConfigError([`startFuel must be in [0, 100], got ${startFuel}`]);
    }
    this.params = params;
    this.levelId = options.levelId ?? null;
    this.startFuel = startFuel;
    this._world = this.buildWorld();
  }

  get world(): Readonly<WorldState> { return this._world; }

  get phase(): RunPhase { return this._phase; }

  get finished(): boolean { return this._phase !== RunPhase.Running; }

  /**
   * Run exactly one fixed tick. No-op once the run has ended.
   * @returns Events raised by this tick, in detection order
   */
  step(input: DriverInput): GameEvent[] {
    if (this.finished) return [];

    const prev = this._world;
    const next = stepWorld(prev, input);
    const detected = detectEvents(prev, next, this.tracker);
    this.tracker = detected.tracker;
    this._world = { ...next, car: detected.car };

    const speed = length(detected.car.velocity);
    this.peakSpeed = Math.max(this.peakSpeed, speed);

    for (const event of detected.events) {
      if (event.type === 'flipped') this.flips++;
      if (event.type === 'levelComplete') this._phase = RunPhase.Completed;
      if (event.type === 'crashed') this._phase = RunPhase.Crashed;
    }

    // Stall detection: empty tank and barely moving
    if (this._phase === RunPhase.Running) {
      if (detected.car.fuel === 0 && speed < STALL.speed) {
        this.stallTicks++;
        if (this.stallTicks >= STALL.ticks) {
          this._phase = RunPhase.OutOfFuel;
        }
      } else {
        this.stallTicks = 0;
      }
    }

    return detected.events;
  }

  /**
   * Advance by real frame time: runs up to MAX_SUBSTEPS ticks, then
   * prefetches terrain ahead of the car.
   */
  advance(frameSeconds: number, input: DriverInput): GameEvent[] {
    const steps = this.clock.advance(frameSeconds);
    const events: GameEvent[] = [];
    for (let i = 0; i < steps && !this.finished; i++) {
      events.push(...this.step(input));
    }
    this._world.terrain.prefetch(
      this._world.car.position.x + TERRAIN.prefetchAhead,
      TERRAIN.prefetchChunksPerFrame,
    );
    return events;
  }

  /** Numbers for the HUD. */
  snapshot(): HudSnapshot {
    const { car, startX, params } = this._world;
    return {
      speed: length(car.velocity),
      fuelPercent: car.fuel,
      healthPercent: car.health,
      distance: car.distance,
      coinsThisRun: car.coins,
      progress: clamp((car.position.x - startX) / params.targetDistance, 0, 1),
    };
  }

  summary(): RunSummary {
    const { car, tick } = this._world;
    return {
      levelId: this.levelId,
      phase: this._phase,
      distance: car.distance,
      coins: car.coins,
      flips: this.flips,
      peakSpeed: this.peakSpeed,
      fuelRemaining: car.fuel,
      timeElapsed: tick * DT,
    };
  }

  /** Rebuild everything from the seed. The new run replays the same terrain. */
  restart(): void {
    this._world = this.buildWorld();
    this._phase = RunPhase.Running;
    this.tracker = createEventTracker();
    this.clock.reset();
    this.stallTicks = 0;
    this.flips = 0;
    this.peakSpeed = 0;
  }

  private buildWorld(): WorldState {
    const world = createWorld(this.params);
    if (this.startFuel === world.car.fuel) return world;
    return { ...world, car: { ...world.car, fuel: this.startFuel } };
  }
}

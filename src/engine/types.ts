/**
 * Engine Type Contracts
 *
 * All interfaces used by the simulation engine: configuration coming in,
 * car and wheel snapshots produced each tick, and the events going out.
 * Snapshots are treated as immutable -- each step produces new objects.
 */

import type { TerrainGenerator } from './terrain';

/** 2D vector as a plain readonly object. Pure functions operate on this. */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/** Terrain difficulty tier. Controls relief, obstacle density and slope cap. */
export enum Difficulty {
  Easy = 'easy',
  Medium = 'medium',
  Hard = 'hard',
  VeryHard = 'very-hard',
  Extreme = 'extreme',
}

/** Boolean level-state input, sampled once per fixed step. */
export interface DriverInput {
  accelerate: boolean;
  brake: boolean;
  /** Counter-clockwise tilt (nose up when facing +x) */
  steerLeft: boolean;
  /** Clockwise tilt */
  steerRight: boolean;
}

/** Upgrade factors, each in [1.0, 3.0]. Read-only to the physics. */
export interface UpgradeMultipliers {
  /** Scales engine force */
  acceleration: number;
  /** Scales the speed at which engine force fades out */
  topSpeed: number;
  /** Scales the tyre friction coefficient */
  traction: number;
  /** Divides fuel burn */
  fuelEfficiency: number;
  /** Scales spring stiffness */
  suspension: number;
}

export type UpgradeKind = keyof UpgradeMultipliers;

/** Level configuration, consumed once when the world is created. */
export interface LevelParams {
  /** Integer terrain seed */
  seed: number;
  difficulty: Difficulty;
  /** Multiplier on 9.81 m/s^2, > 0 */
  gravityScale: number;
  /** Ground friction coefficient in [0, 1] */
  frictionCoefficient: number;
  /** Velocity-proportional drag coefficient in [0, 1] (1/s) */
  airResistance: number;
  /** Metres to the right of the start that complete the level */
  targetDistance: number;
  upgrades: UpgradeMultipliers;
  /** Length of level ground at the start of the level. Defaults to TERRAIN.flatStartLength. */
  flatStartLength?: number;
}

export type PickupKind = 'coin' | 'fuel';

/** Collectable placed above the terrain surface. */
export interface Pickup {
  readonly id: string;
  readonly kind: PickupKind;
  readonly position: Vec2;
  /** Coin value, or fuel percent for a fuel can */
  readonly value: number;
}

export type HazardKind = 'spikes' | 'boost';

/** Ground strip with an extra effect on wheels touching it. */
export interface Hazard {
  readonly id: string;
  readonly kind: HazardKind;
  /** Left edge of the strip */
  readonly x: number;
  readonly width: number;
}

/** Suspension and contact state of one wheel at a single tick. */
export interface WheelState {
  /** Attachment point relative to the chassis centre, in chassis space */
  offset: Vec2;
  /** 0 = fully extended, 1 = fully compressed */
  compression: number;
  /** Whether the wheel touches the terrain */
  contact: boolean;
  /** Terrain surface normal under the wheel (straight up while airborne) */
  normal: Vec2;
  /** True when the suspension ran out of travel this tick */
  bottomedOut: boolean;
}

/**
 * Complete car state at a single simulation tick.
 * Immutable snapshot -- the physics step produces a new CarState each tick.
 */
export interface CarState {
  /** World-space position of the chassis centre */
  position: Vec2;
  /** World-space velocity */
  velocity: Vec2;
  /** Chassis angle in radians, unwrapped (0 = level, positive = CCW) */
  angle: number;
  /** Angular velocity in rad/s */
  angularVelocity: number;
  /** 0 to 100 */
  health: number;
  /** 0 to 100 */
  fuel: number;
  /** Forward horizontal distance travelled this run */
  distance: number;
  /** Coins collected this run */
  coins: number;
  /** Rear wheel, front wheel */
  wheels: readonly [WheelState, WheelState];
  /** Highest inward contact speed absorbed by a hard stop this tick (0 if none) */
  impactSpeed: number;
  /** True while the roof touches the ground */
  roofContact: boolean;
}

/** Full simulation world state at a single tick. */
export interface WorldState {
  tick: number;
  car: CarState;
  /** Lazily extended, but values once returned never change */
  terrain: TerrainGenerator;
  /** Validated level configuration, same reference every tick */
  params: LevelParams;
  /** Chassis x at level start, for level-completion distance */
  startX: number;
}

export type GameEvent =
  | { type: 'crashed'; tick: number; cause: 'impact' | 'damage' }
  | { type: 'flipped'; tick: number; rotations: number; direction: 'forward' | 'backward' }
  | { type: 'coinCollected'; tick: number; id: string; value: number }
  | { type: 'fuelCollected'; tick: number; id: string; amount: number }
  | { type: 'fuelEmpty'; tick: number }
  | { type: 'levelComplete'; tick: number; distance: number; coinsCollected: number; timeElapsed: number };

/** Read-only numbers the HUD draws each frame. */
export interface HudSnapshot {
  /** m/s */
  speed: number;
  fuelPercent: number;
  healthPercent: number;
  distance: number;
  coinsThisRun: number;
  /** Fraction of the target distance covered, 0 to 1 */
  progress: number;
}

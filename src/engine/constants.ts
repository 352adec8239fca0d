/**
 * Physics Constants and Tuning Parameters
 *
 * All physics and terrain tuning lives here. SI units: metres, seconds,
 * kilograms, radians.
 */

import { Difficulty } from './types';

/** Fixed timestep in seconds. 60Hz physics tick. */
export const DT = 1 / 60;

/** Upper bound on physics steps run for one rendered frame. */
export const MAX_SUBSTEPS = 5;

/** Gravity at gravityScale = 1, m/s^2. */
export const GRAVITY = 9.81;

/** Chassis and drivetrain parameters. */
export const CAR = {
  /** Chassis mass in kg */
  mass: 250,
  /** Moment of inertia of a 3 m x 1 m box: mass * (3^2 + 1^2) / 12 */
  inertia: (250 * 10) / 12,
  /** Spawn x of the chassis centre */
  startX: 10,
  /** Total engine force in N, split across the wheels in contact */
  engineForce: 2000,
  /** Total brake force in N */
  brakeForce: 3000,
  /** Speed (m/s) at which engine force fades to zero, before the topSpeed upgrade */
  maxSpeed: 30,
  /** Hard velocity clamp in m/s */
  maxVelocity: 80,
  /** Hard spin clamp in rad/s */
  maxAngularVelocity: 12,
  /** Angular acceleration from steering while airborne, rad/s^2 */
  airSpinAccel: 6,
  /** Fraction of airSpinAccel that steering gives on the ground */
  groundSpinFactor: 0.1,
  /** Fuel percent burned per second of throttle */
  fuelBurnRate: 2,
} as const;

/** Suspension geometry and spring parameters (per wheel). */
export const WHEEL = {
  /** Suspension travel in m */
  restLength: 0.5,
  /** Tyre radius in m */
  radius: 0.35,
  /** Spring stiffness in N/m */
  stiffness: 12000,
  /** Damping in N*s/m */
  damping: 1200,
  /** Grip = frictionCoefficient * traction * gripScale * load */
  gripScale: 1.5,
  /** Attachment offsets in chassis space: rear, front */
  rearOffset: { x: -1.2, y: -0.4 },
  frontOffset: { x: 1.2, y: -0.4 },
} as const;

/** Corners and roof centre of the 3 m x 1 m hull, in chassis space. */
export const HULL_POINTS = [
  { x: -1.5, y: -0.5 },
  { x: 1.5, y: -0.5 },
  { x: -1.5, y: 0.5 },
  { x: 0, y: 0.5 },
  { x: 1.5, y: 0.5 },
] as const;

/** Index into HULL_POINTS from which points belong to the roof. */
export const ROOF_POINT_START = 2;

/** Ground contact response. */
export const GROUND = {
  /** Rolling resistance deceleration at frictionCoefficient = 1, m/s^2 */
  rollingResistance: 1.5,
  /** Tangential velocity kept per tick while the hull scrapes the ground */
  hullScrape: 0.97,
  /** Spin kept per tick while the hull touches the ground */
  hullSpinDamping: 0.9,
  /** Extra tangential force from a boost pad, per wheel, in N */
  boostForce: 1500,
} as const;

/** Damage model. Health is 0-100. */
export const DAMAGE = {
  /** Inward contact speed absorbed without damage, m/s */
  safeImpactSpeed: 6,
  /** Health lost per m/s above safeImpactSpeed */
  perImpactSpeed: 8,
  /** Inward contact speed that destroys the car outright, m/s */
  crashImpactSpeed: 14,
  /** Health lost per second while the roof is on the ground */
  roofDrainPerSecond: 40,
  /** Health lost per second per wheel on spikes */
  spikesPerSecond: 30,
} as const;

/** Flip-versus-crash landing classification. */
export const FLIP = {
  /** Airborne rotation from take-off needed to count as a flip attempt */
  minRotation: Math.PI / 2,
  /** Max difference between chassis and terrain angle at touchdown */
  landingTolerance: 0.6,
  /** Max spin at touchdown, rad/s */
  maxLandingSpin: 4,
} as const;

/** Pickup collection and run-end rules. */
export const PICKUP = {
  /** Chassis centre to pickup distance that collects it */
  radius: 2.5,
  /** Height of pickups above the ground */
  hover: 1.5,
  /** Coins per cluster */
  clusterSize: 5,
  /** Spacing between coins in a cluster */
  clusterSpacing: 3,
  /** Fuel percent restored by a can */
  fuelCanAmount: 35,
} as const;

/** Out-of-fuel stall detection. */
export const STALL = {
  /** Speed below which an empty-tank car counts as stalled */
  speed: 0.5,
  /** Consecutive stalled ticks that end the run (2 seconds) */
  ticks: 120,
} as const;

/** Terrain sampling layout shared by all tiers. */
export const TERRAIN = {
  /** Horizontal distance between height samples, m */
  sampleSpacing: 1,
  /** Samples generated per chunk */
  chunkSamples: 256,
  /** Ground height of the start zone */
  baseHeight: 0,
  /** Default level-ground run-up at the start */
  flatStartLength: 30,
  /** Distance over which relief blends in after the flat start */
  blendLength: 20,
  /** Samples per ledge cell */
  ledgeCellSamples: 20,
  /** How far ahead of the car the session prefetches, m */
  prefetchAhead: 512,
  /** Chunks generated by one prefetch call */
  prefetchChunksPerFrame: 1,
  /** Width of hazard strips, m */
  hazardWidth: 4,
} as const;

/** Per-tier terrain shape and overlay density. */
export interface TerrainBand {
  /** Amplitude of the primary sine layer, m */
  amplitude: number;
  /** Wavelength of the primary sine layer, m */
  wavelength: number;
  /** Per-sample value-noise amplitude, m */
  bumpAmplitude: number;
  /** Max terrain slope in radians */
  maxSlope: number;
  /** Probability that a ledge cell is raised */
  ledgeChance: number;
  /** Ledge height, m */
  ledgeHeight: number;
  /** Spike strips per chunk */
  spikesPerChunk: number;
  /** Probability that a chunk has a fuel can */
  fuelCanChance: number;
}

// Smooth relief (octaves plus bumps) rises at most 2*pi*A*3.055/wavelength
// + 2*bump per metre, kept under tan(maxSlope); only ledges and the blend-in
// reach the cap. Every cap stays under the base car's climb limit (~0.77 rad).
export const TERRAIN_BANDS: Record<Difficulty, TerrainBand> = {
  [Difficulty.Easy]: {
    amplitude: 3, wavelength: 400, bumpAmplitude: 0.04, maxSlope: 0.25,
    ledgeChance: 0, ledgeHeight: 0, spikesPerChunk: 0, fuelCanChance: 0.9,
  },
  [Difficulty.Medium]: {
    amplitude: 4, wavelength: 360, bumpAmplitude: 0.06, maxSlope: 0.35,
    ledgeChance: 0, ledgeHeight: 0, spikesPerChunk: 1, fuelCanChance: 0.8,
  },
  [Difficulty.Hard]: {
    amplitude: 5, wavelength: 320, bumpAmplitude: 0.08, maxSlope: 0.45,
    ledgeChance: 0.03, ledgeHeight: 1.5, spikesPerChunk: 2, fuelCanChance: 0.7,
  },
  [Difficulty.VeryHard]: {
    amplitude: 6, wavelength: 320, bumpAmplitude: 0.08, maxSlope: 0.5,
    ledgeChance: 0.06, ledgeHeight: 2, spikesPerChunk: 3, fuelCanChance: 0.6,
  },
  [Difficulty.Extreme]: {
    amplitude: 7, wavelength: 320, bumpAmplitude: 0.09, maxSlope: 0.55,
    ledgeChance: 0.1, ledgeHeight: 3, spikesPerChunk: 4, fuelCanChance: 0.5,
  },
};

/** Secondary sine octaves: [wavelength divisor, amplitude factor]. */
export const TERRAIN_OCTAVES = [
  [1, 1],
  [2.3, 0.45],
  [5.1, 0.2],
] as const;

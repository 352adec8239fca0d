/**
 * Car Model — Driver Intent to Forces
 *
 * Pure functions turning driver input and upgrade multipliers into the
 * quantities the stepper applies:
 * - Spawn state at static suspension equilibrium
 * - Engine drive force per contacting wheel, capped by tyre grip
 * - Fuel burn while the throttle is held
 * - Braking that never reverses the car in one step
 * - Steering as angular acceleration (strong airborne, near zero grounded)
 *
 * All functions are pure: they return new objects, never mutate input state.
 */

import type {
  CarState,
  DriverInput,
  LevelParams,
  UpgradeMultipliers,
  WheelState,
} from './types';
import type { TerrainGenerator } from './terrain';
import { CAR, WHEEL, GRAVITY } from './constants';
import { vec2, clamp } from './vec2';
import { createWheelState } from './wheel';

/** Input with nothing pressed. */
export const IDLE_INPUT: Readonly<DriverInput> = {
  accelerate: false,
  brake: false,
  steerLeft: false,
  steerRight: false,
};

// ──────────────────────────────────────────────────────────
// createInitialCarState
// ──────────────────────────────────────────────────────────

/**
 * Compression at which both springs together carry the chassis weight.
 * Capped below 1 so very high gravity still leaves some travel.
 */
export function staticCompression(gravityScale: number, suspension: number): number {
  const weightPerWheel = (CAR.mass * GRAVITY * gravityScale) / 2;
  const perUnit = WHEEL.stiffness * suspension * WHEEL.restLength;
  return Math.min(0.95, weightPerWheel / perUnit);
}

/**
 * Create a car at rest, level, sitting on its springs at CAR.startX.
 * The chassis height puts both wheels at static compression on the ground
 * under the chassis centre.
 */
export function createInitialCarState(terrain: TerrainGenerator, params: LevelParams): CarState {
  const compression = staticCompression(params.gravityScale, params.upgrades.suspension);
  const probe = WHEEL.restLength * (1 - compression);
  const ground = terrain.heightAt(CAR.startX);
  const y = ground + WHEEL.radius + probe - WHEEL.rearOffset.y;

  const wheels: [WheelState, WheelState] = [
    createWheelState(WHEEL.rearOffset, compression),
    createWheelState(WHEEL.frontOffset, compression),
  ];

  return {
    position: vec2(CAR.startX, y),
    velocity: vec2(0, 0),
    angle: 0,
    angularVelocity: 0,
    health: 100,
    fuel: 100,
    distance: 0,
    coins: 0,
    wheels,
    impactSpeed: 0,
    roofContact: false,
  };
}

// ──────────────────────────────────────────────────────────
// driveForce
// ──────────────────────────────────────────────────────────

/** Friction limit of one tyre: how much force it passes before slipping. */
export function tyreGrip(load: number, frictionCoefficient: number, traction: number): number {
  return frictionCoefficient * traction * WHEEL.gripScale * load;
}

/**
 * Engine force transmitted by one contacting wheel, along the ground tangent.
 *
 * F = 0.5 * engineForce * acceleration * (1 - v_t / (maxSpeed * topSpeed))
 *
 * Fades to zero at the upgraded top speed and is capped by tyre grip.
 * Returns 0 without throttle or fuel; airborne wheels are never passed here.
 */
export function driveForce(
  input: DriverInput,
  fuel: number,
  tangentialSpeed: number,
  grip: number,
  upgrades: UpgradeMultipliers,
): number {
  if (!input.accelerate || fuel <= 0) return 0;
  const topSpeed = CAR.maxSpeed * upgrades.topSpeed;
  const fade = clamp(1 - tangentialSpeed / topSpeed, 0, 1);
  const force = 0.5 * CAR.engineForce * upgrades.acceleration * fade;
  return Math.min(force, grip);
}

// ──────────────────────────────────────────────────────────
// burnFuel
// ──────────────────────────────────────────────────────────

/** Fuel after one step. Higher efficiency burns slower; never below 0. */
export function burnFuel(
  fuel: number,
  input: DriverInput,
  fuelEfficiency: number,
  dt: number,
): number {
  if (!input.accelerate || fuel <= 0) return fuel;
  return Math.max(0, fuel - (CAR.fuelBurnRate * dt) / fuelEfficiency);
}

// ──────────────────────────────────────────────────────────
// brakeVelocity
// ──────────────────────────────────────────────────────────

/**
 * Tangential speed after braking for one step.
 * Removes at most deceleration*dt and stops at zero rather than reversing.
 */
export function brakeVelocity(tangentialSpeed: number, deceleration: number, dt: number): number {
  const reduced = Math.abs(tangentialSpeed) - deceleration * dt;
  if (reduced <= 0) return 0;
  return Math.sign(tangentialSpeed) * reduced;
}

/**
 * Brake deceleration in m/s^2 given the summed grip of the contacting wheels.
 * Zero while airborne: brakes act through the tyres.
 */
export function brakeDeceleration(input: DriverInput, totalGrip: number): number {
  if (!input.brake) return 0;
  return Math.min(CAR.brakeForce, totalGrip) / CAR.mass;
}

// ──────────────────────────────────────────────────────────
// steerAcceleration
// ──────────────────────────────────────────────────────────

/**
 * Angular acceleration from steering. steerLeft tilts counter-clockwise.
 * Full authority in the air, CAR.groundSpinFactor of it on the ground.
 */
export function steerAcceleration(input: DriverInput, airborne: boolean): number {
  const direction = (input.steerLeft ? 1 : 0) - (input.steerRight ? 1 : 0);
  if (direction === 0) return 0;
  const authority = airborne ? 1 : CAR.groundSpinFactor;
  return direction * CAR.airSpinAccel * authority;
}

/**
 * Car Model Tests
 *
 * Spawn equilibrium, engine force with top-speed fade and grip cap, fuel
 * burn, braking without reversal, and steering authority.
 */

import { describe, it, expect } from 'vitest';
import {
  IDLE_INPUT,
  createInitialCarState,
  staticCompression,
  tyreGrip,
  driveForce,
  burnFuel,
  brakeVelocity,
  brakeDeceleration,
  steerAcceleration,
} from '../../src/engine/car';
import { TerrainGenerator } from '../../src/engine/terrain';
import { BASE_UPGRADES } from '../../src/engine/config';
import { Difficulty } from '../../src/engine/types';
import type { DriverInput, LevelParams } from '../../src/engine/types';
import { DT } from '../../src/engine/constants';

const THROTTLE: DriverInput = { ...IDLE_INPUT, accelerate: true };
const BRAKE: DriverInput = { ...IDLE_INPUT, brake: true };

const PARAMS: LevelParams = {
  seed: 5,
  difficulty: Difficulty.Easy,
  gravityScale: 1,
  frictionCoefficient: 0.8,
  airResistance: 0.1,
  targetDistance: 500,
  upgrades: BASE_UPGRADES,
};

// ──────────────────────────────────────────────────────────
// createInitialCarState
// ──────────────────────────────────────────────────────────
describe('createInitialCarState', () => {
  const terrain = new TerrainGenerator({ seed: 5, difficulty: Difficulty.Easy });

  it('static compression carries half the weight per wheel', () => {
    // 250 kg * 9.81 / 2 = 1226.25 N against 12000 N/m * 0.5 m
    expect(staticCompression(1, 1)).toBeCloseTo(0.204375, 10);
  });

  it('stiffer suspension sags less', () => {
    expect(staticCompression(1, 2)).toBeCloseTo(0.204375 / 2, 10);
  });

  it('caps static compression below full travel', () => {
    expect(staticCompression(100, 1)).toBe(0.95);
  });

  it('spawns at x = 10, level, at rest', () => {
    const car = createInitialCarState(terrain, PARAMS);
    expect(car.position.x).toBe(10);
    expect(car.angle).toBe(0);
    expect(car.velocity).toEqual({ x: 0, y: 0 });
    expect(car.angularVelocity).toBe(0);
  });

  it('sits on its springs above the flat start', () => {
    const car = createInitialCarState(terrain, PARAMS);
    // radius + restLength * (1 - c) + attachment depth
    expect(car.position.y).toBeCloseTo(0.35 + 0.5 * (1 - 0.204375) + 0.4, 10);
    expect(car.wheels[0].compression).toBeCloseTo(0.204375, 10);
    expect(car.wheels[1].contact).toBe(true);
  });

  it('starts with full health and fuel, nothing collected', () => {
    const car = createInitialCarState(terrain, PARAMS);
    expect(car.health).toBe(100);
    expect(car.fuel).toBe(100);
    expect(car.distance).toBe(0);
    expect(car.coins).toBe(0);
  });
});

// ──────────────────────────────────────────────────────────
// driveForce
// ──────────────────────────────────────────────────────────
describe('driveForce', () => {
  const BIG_GRIP = 1e6;

  it('is zero without throttle', () => {
    expect(driveForce(IDLE_INPUT, 100, 0, BIG_GRIP, BASE_UPGRADES)).toBe(0);
  });

  it('is zero with an empty tank', () => {
    expect(driveForce(THROTTLE, 0, 0, BIG_GRIP, BASE_UPGRADES)).toBe(0);
  });

  it('gives half the engine force per wheel from rest', () => {
    expect(driveForce(THROTTLE, 100, 0, BIG_GRIP, BASE_UPGRADES)).toBe(1000);
  });

  it('fades linearly toward top speed', () => {
    expect(driveForce(THROTTLE, 100, 15, BIG_GRIP, BASE_UPGRADES)).toBe(500);
  });

  it('is zero at and above top speed', () => {
    expect(driveForce(THROTTLE, 100, 30, BIG_GRIP, BASE_UPGRADES)).toBe(0);
    expect(driveForce(THROTTLE, 100, 45, BIG_GRIP, BASE_UPGRADES)).toBe(0);
  });

  it('does not fade while rolling backward', () => {
    expect(driveForce(THROTTLE, 100, -10, BIG_GRIP, BASE_UPGRADES)).toBe(1000);
  });

  it('is capped by tyre grip', () => {
    expect(driveForce(THROTTLE, 100, 0, 200, BASE_UPGRADES)).toBe(200);
  });

  it('scales with the acceleration upgrade', () => {
    const upgrades = { ...BASE_UPGRADES, acceleration: 2 };
    expect(driveForce(THROTTLE, 100, 0, BIG_GRIP, upgrades)).toBe(2000);
  });

  it('top speed upgrade moves the fade point', () => {
    const upgrades = { ...BASE_UPGRADES, topSpeed: 2 };
    expect(driveForce(THROTTLE, 100, 30, BIG_GRIP, upgrades)).toBe(500);
  });
});

describe('tyreGrip', () => {
  it('is friction * traction * gripScale * load', () => {
    expect(tyreGrip(1000, 0.8, 1)).toBeCloseTo(1200, 9);
  });

  it('scales with the traction upgrade', () => {
    expect(tyreGrip(1000, 0.8, 2)).toBeCloseTo(2400, 9);
  });

  it('is zero with no load', () => {
    expect(tyreGrip(0, 0.8, 1)).toBe(0);
  });
});

// ──────────────────────────────────────────────────────────
// burnFuel
// ──────────────────────────────────────────────────────────
describe('burnFuel', () => {
  it('burns 2 percent per second of throttle', () => {
    expect(burnFuel(50, THROTTLE, 1, DT)).toBeCloseTo(50 - 2 / 60, 12);
  });

  it('burns half as fast with fuelEfficiency 2', () => {
    expect(burnFuel(50, THROTTLE, 2, DT)).toBeCloseTo(50 - 1 / 60, 12);
  });

  it('does not burn while coasting', () => {
    expect(burnFuel(50, IDLE_INPUT, 1, DT)).toBe(50);
  });

  it('never goes below zero', () => {
    expect(burnFuel(0.01, THROTTLE, 1, DT)).toBe(0);
  });
});

// ──────────────────────────────────────────────────────────
// brakeVelocity / brakeDeceleration
// ──────────────────────────────────────────────────────────
describe('brakeVelocity', () => {
  it('removes deceleration * dt', () => {
    expect(brakeVelocity(10, 5, 1)).toBe(5);
  });

  it('works for backward motion', () => {
    expect(brakeVelocity(-10, 60, 1 / 60)).toBe(-9);
  });

  it('stops at zero instead of reversing', () => {
    expect(brakeVelocity(1, 120, 1 / 60)).toBe(0);
    expect(brakeVelocity(-1, 120, 1 / 60)).toBe(0);
  });
});

describe('brakeDeceleration', () => {
  it('is zero without the brake', () => {
    expect(brakeDeceleration(IDLE_INPUT, 10000)).toBe(0);
  });

  it('is brake force over mass when grip allows', () => {
    expect(brakeDeceleration(BRAKE, 10000)).toBe(12);
  });

  it('is limited by grip', () => {
    expect(brakeDeceleration(BRAKE, 500)).toBe(2);
  });

  it('is zero with no grip (airborne)', () => {
    expect(brakeDeceleration(BRAKE, 0)).toBe(0);
  });
});

// ──────────────────────────────────────────────────────────
// steerAcceleration
// ──────────────────────────────────────────────────────────
describe('steerAcceleration', () => {
  it('steerLeft tilts counter-clockwise in the air', () => {
    expect(steerAcceleration({ ...IDLE_INPUT, steerLeft: true }, true)).toBe(6);
  });

  it('steerRight tilts clockwise in the air', () => {
    expect(steerAcceleration({ ...IDLE_INPUT, steerRight: true }, true)).toBe(-6);
  });

  it('has a tenth of the authority on the ground', () => {
    expect(steerAcceleration({ ...IDLE_INPUT, steerLeft: true }, false)).toBeCloseTo(0.6, 12);
  });

  it('both directions cancel', () => {
    expect(steerAcceleration({ ...IDLE_INPUT, steerLeft: true, steerRight: true }, true)).toBe(0);
  });
});

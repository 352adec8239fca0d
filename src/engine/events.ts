/**
 * Collision and Gameplay Events
 *
 * Compares the world before and after a step and reports what happened:
 * crashes, completed flips, coin and fuel pickups, the tank running dry and
 * reaching the target distance. Pickups are applied to the car here, so the
 * stepper stays free of overlay bookkeeping.
 *
 * Pure: the tracker is replaced, never mutated.
 */

import type { CarState, GameEvent, WorldState } from './types';
import { DT, DAMAGE, FLIP, PICKUP } from './constants';
import { distance, wrapAngle } from './vec2';

/** Airborne phase in progress. */
export interface FlightState {
  /** Chassis angle on the last grounded tick */
  takeoffAngle: number;
}

/** Per-run memory the detector needs between steps. */
export interface EventTrackerState {
  collectedIds: ReadonlySet<string>;
  crashed: boolean;
  levelCompleted: boolean;
  flight: FlightState | null;
}

export interface DetectionResult {
  /** Car with pickups applied */
  car: CarState;
  tracker: EventTrackerState;
  events: GameEvent[];
}

export function createEventTracker(): EventTrackerState {
  return {
    collectedIds: new Set<string>(),
    crashed: false,
    levelCompleted: false,
    flight: null,
  };
}

/** Any wheel or the roof touching the ground. */
export function isGrounded(car: CarState): boolean {
  return car.roofContact || car.wheels.some((w) => w.contact);
}

export function detectEvents(
  prev: WorldState,
  curr: WorldState,
  tracker: EventTrackerState,
): DetectionResult {
  const events: GameEvent[] = [];
  const tick = curr.tick;
  let car = curr.car;

  // ── Pickups ──
  let collectedIds = tracker.collectedIds;
  const { x } = car.position;
  const nearby = curr.terrain.pickupsBetween(x - PICKUP.radius, x + PICKUP.radius);
  for (const pickup of nearby) {
    if (collectedIds.has(pickup.id)) continue;
    if (distance(car.position, pickup.position) > PICKUP.radius) continue;

    collectedIds = new Set(collectedIds).add(pickup.id);
    if (pickup.kind === 'coin') {
      car = { ...car, coins: car.coins + pickup.value };
      events.push({ type: 'coinCollected', tick, id: pickup.id, value: pickup.value });
    } else {
      car = { ...car, fuel: Math.min(100, car.fuel + pickup.value) };
      events.push({ type: 'fuelCollected', tick, id: pickup.id, amount: pickup.value });
    }
  }

  // ── Tank ran dry this step (a can picked up on the same tick refills it) ──
  if (prev.car.fuel > 0 && car.fuel === 0) {
    events.push({ type: 'fuelEmpty', tick });
  }

  // ── Crash ──
  let crashed = tracker.crashed;
  if (!crashed && !tracker.levelCompleted && prev.car.health > 0 && car.health === 0) {
    crashed = true;
    events.push({
      type: 'crashed',
      tick,
      cause: car.impactSpeed >= DAMAGE.crashImpactSpeed ? 'impact' : 'damage',
    });
  }

  // ── Flips ──
  let flight = tracker.flight;
  const grounded = isGrounded(car);

  if (!grounded) {
    if (flight === null) flight = { takeoffAngle: prev.car.angle };
  } else if (flight !== null) {
    if (!crashed) {
      const flip = landedFlip(flight, curr, car);
      if (flip) events.push({ type: 'flipped', tick, ...flip });
    }
    flight = null;
  }

  // ── Level complete ──
  let levelCompleted = tracker.levelCompleted;
  if (!levelCompleted && !crashed && x - curr.startX >= curr.params.targetDistance) {
    levelCompleted = true;
    events.push({
      type: 'levelComplete',
      tick,
      distance: car.distance,
      coinsCollected: car.coins,
      timeElapsed: tick * DT,
    });
  }

  return {
    car,
    tracker: { collectedIds, crashed, levelCompleted, flight },
    events,
  };
}

/**
 * A flip counts when the chassis turned more than FLIP.minRotation since
 * take-off, then came down close to the ground's angle and not spinning hard.
 */
function landedFlip(
  flight: FlightState,
  world: WorldState,
  car: CarState,
): { rotations: number; direction: 'forward' | 'backward' } | null {
  const rotation = car.angle - flight.takeoffAngle;
  if (Math.abs(rotation) <= FLIP.minRotation) return null;

  const ground = world.terrain.slopeAt(car.position.x);
  if (Math.abs(wrapAngle(car.angle - ground)) > FLIP.landingTolerance) return null;
  if (Math.abs(car.angularVelocity) >= FLIP.maxLandingSpin) return null;

  const turns = Math.max(1, Math.round(Math.abs(rotation) / (2 * Math.PI)));
  return {
    rotations: Math.sign(rotation) * turns,
    direction: rotation > 0 ? 'backward' : 'forward',
  };
}

/**
 * World Step Function — Physics Stepper
 *
 * Wires terrain, wheels and car forces into a single pure step function.
 * The session calls it once per fixed tick; headless drivers and tests call
 * it directly.
 *
 * Step sequence per tick (order is fixed; reordering injects energy):
 *   1. Gravity on vertical velocity
 *   2. Resolve both wheels, accumulate spring/drive/boost forces and torques,
 *      then brake and steer
 *   3. Air resistance (velocity-proportional drag, linear and angular)
 *   4. Rolling resistance along the ground tangent while a wheel touches
 *   5. Semi-implicit Euler integration, then contact projection
 *      (bottomed-out wheels and hull points pushed out of the ground)
 *   6. Distance travelled
 *   7. Damage from impacts, roof contact and spikes; health clamped
 *
 * All functions are pure: (state, input) -> newState.
 * No Math.random, no Date.now. DT comes from constants.ts, not real time.
 */

import type { DriverInput, LevelParams, Vec2, WorldState, CarState } from './types';
import { TerrainGenerator } from './terrain';
import { validateLevelParams } from './config';
import {
  createInitialCarState,
  driveForce,
  burnFuel,
  brakeDeceleration,
  brakeVelocity,
  steerAcceleration,
  tyreGrip,
} from './car';
import { resolveWheel, chassisPoint, type WheelContact } from './wheel';
import {
  DT,
  CAR,
  WHEEL,
  GRAVITY,
  GROUND,
  DAMAGE,
  HULL_POINTS,
  ROOF_POINT_START,
} from './constants';
import { add, scale, sub, cross, dot, normalize, tangentOf, clamp } from './vec2';

// ──────────────────────────────────────────────────────────
// createWorld
// ──────────────────────────────────────────────────────────

/**
 * Validate the level configuration and build the initial world.
 * Throws ConfigError or TerrainError before any step can run.
 */
export function createWorld(params: LevelParams): WorldState {
  validateLevelParams(params);
  const terrain = new TerrainGenerator({
    seed: params.seed,
    difficulty: params.difficulty,
    flatStartLength: params.flatStartLength,
  });
  const car = createInitialCarState(terrain, params);
  return {
    tick: 0,
    car,
    terrain,
    params,
    startX: car.position.x,
  };
}

// ──────────────────────────────────────────────────────────
// stepWorld
// ──────────────────────────────────────────────────────────

/**
 * Advance the simulation by one fixed tick.
 *
 * Pure function: (state, input) -> newState. The terrain and params
 * references are passed through unchanged.
 */
export function stepWorld(state: WorldState, input: DriverInput): WorldState {
  const { car, terrain, params } = state;
  const { upgrades } = params;

  // 1. Gravity
  let vx = car.velocity.x;
  let vy = car.velocity.y - GRAVITY * params.gravityScale * DT;
  let omega = car.angularVelocity;

  // 2. Wheels against terrain
  const [rearWheel, frontWheel] = car.wheels;
  const contacts: readonly [WheelContact, WheelContact] = [
    resolveWheel(rearWheel.offset, car.position, car.angle, rearWheel.compression, terrain, upgrades.suspension, DT),
    resolveWheel(frontWheel.offset, car.position, car.angle, frontWheel.compression, terrain, upgrades.suspension, DT),
  ];

  let fx = 0;
  let fy = 0;
  let torque = 0;
  let totalGrip = 0;
  let spikedWheels = 0;
  let normalSum: Vec2 = { x: 0, y: 0 };

  for (const contact of contacts) {
    if (!contact.state.contact) continue;

    const tangent = tangentOf(contact.state.normal);
    const grip = tyreGrip(contact.load, params.frictionCoefficient, upgrades.traction);
    const tangentialSpeed = vx * tangent.x + vy * tangent.y;
    let push = driveForce(input, car.fuel, tangentialSpeed, grip, upgrades);

    for (const hazard of terrain.hazardsAt(contact.anchor.x)) {
      if (hazard.kind === 'boost') {
        push += GROUND.boostForce;
      } else {
        spikedWheels++;
      }
    }

    const force = add(contact.force, scale(tangent, push));
    fx += force.x;
    fy += force.y;
    torque += cross(sub(contact.anchor, car.position), force);
    totalGrip += grip;
    normalSum = add(normalSum, contact.state.normal);
  }

  vx += (fx / CAR.mass) * DT;
  vy += (fy / CAR.mass) * DT;
  omega += (torque / CAR.inertia) * DT;

  const airborne = !contacts.some((c) => c.state.contact);
  const groundTangent = tangentOf(normalize(normalSum));

  if (!airborne) {
    const deceleration = brakeDeceleration(input, totalGrip);
    if (deceleration > 0) {
      const vt = vx * groundTangent.x + vy * groundTangent.y;
      const braked = brakeVelocity(vt, deceleration, DT);
      vx += groundTangent.x * (braked - vt);
      vy += groundTangent.y * (braked - vt);
    }
  }
  omega += steerAcceleration(input, airborne) * DT;

  // 3. Air resistance
  const drag = Math.max(0, 1 - params.airResistance * DT);
  vx *= drag;
  vy *= drag;
  omega *= drag;

  // 4. Ground friction
  if (!airborne) {
    const vt = vx * groundTangent.x + vy * groundTangent.y;
    const rolled = brakeVelocity(vt, params.frictionCoefficient * GROUND.rollingResistance, DT);
    vx += groundTangent.x * (rolled - vt);
    vy += groundTangent.y * (rolled - vt);
  }

  // 5. Integrate, then keep the car out of the ground
  const speed = Math.sqrt(vx * vx + vy * vy);
  if (speed > CAR.maxVelocity) {
    const ratio = CAR.maxVelocity / speed;
    vx *= ratio;
    vy *= ratio;
  }
  omega = clamp(omega, -CAR.maxAngularVelocity, CAR.maxAngularVelocity);

  const angle = car.angle + omega * DT;
  const projected = projectOutOfGround(
    { x: car.position.x + vx * DT, y: car.position.y + vy * DT },
    { x: vx, y: vy },
    omega,
    angle,
    terrain,
  );
  let position = projected.position;
  let velocity = projected.velocity;

  // Left wall at x = 0
  if (position.x < 0) {
    position = { x: 0, y: position.y };
    velocity = { x: Math.max(0, velocity.x), y: velocity.y };
  }

  // 6. Distance
  const distance = car.distance + Math.max(0, position.x - car.position.x);

  // 7. Damage
  let health = car.health;
  if (projected.impactSpeed >= DAMAGE.crashImpactSpeed) {
    health = 0;
  } else if (projected.impactSpeed > DAMAGE.safeImpactSpeed) {
    health -= (projected.impactSpeed - DAMAGE.safeImpactSpeed) * DAMAGE.perImpactSpeed;
  }
  if (projected.roofContact) {
    health -= DAMAGE.roofDrainPerSecond * DT;
  }
  health -= spikedWheels * DAMAGE.spikesPerSecond * DT;

  const nextCar: CarState = {
    position,
    velocity,
    angle,
    angularVelocity: projected.angularVelocity,
    health: clamp(health, 0, 100),
    fuel: clamp(burnFuel(car.fuel, input, upgrades.fuelEfficiency, DT), 0, 100),
    distance,
    coins: car.coins,
    wheels: [contacts[0].state, contacts[1].state],
    impactSpeed: projected.impactSpeed,
    roofContact: projected.roofContact,
  };

  return {
    tick: state.tick + 1,
    car: nextCar,
    terrain, // Same object; chunks already generated are never changed
    params,
    startX: state.startX,
  };
}

// --- Internal helpers ---

interface Projection {
  position: Vec2;
  velocity: Vec2;
  angularVelocity: number;
  /** Largest inward speed removed by a hard stop */
  impactSpeed: number;
  roofContact: boolean;
}

/**
 * Push the chassis up until no wheel anchor sits closer than one tyre radius
 * to the ground (a fully compressed spring) and no hull point is below it. Each hard stop removes the
 * velocity component into the surface; hull contact also scrapes speed and
 * damps spin.
 */
function projectOutOfGround(
  position: Vec2,
  velocity: Vec2,
  angularVelocity: number,
  angle: number,
  terrain: TerrainGenerator,
): Projection {
  let pos = position;
  let vel = velocity;
  let omega = angularVelocity;
  let impactSpeed = 0;
  let roofContact = false;

  const stop = (local: Vec2, clearance: number): boolean => {
    const point = chassisPoint(pos, angle, local);
    const depth = terrain.heightAt(point.x) + clearance - point.y;
    if (depth <= 0) return false;

    pos = { x: pos.x, y: pos.y + depth };
    const normal = terrain.normalAt(point.x);
    const inward = -dot(vel, normal);
    if (inward > 0) {
      vel = add(vel, scale(normal, inward));
      impactSpeed = Math.max(impactSpeed, inward);
    }
    return true;
  };

  stop(WHEEL.rearOffset, WHEEL.radius);
  stop(WHEEL.frontOffset, WHEEL.radius);

  let hullContact = false;
  HULL_POINTS.forEach((local, index) => {
    if (stop(local, 0)) {
      hullContact = true;
      if (index >= ROOF_POINT_START) roofContact = true;
    }
  });

  if (hullContact) {
    vel = scale(vel, GROUND.hullScrape);
    omega *= GROUND.hullSpinDamping;
  }

  return { position: pos, velocity: vel, angularVelocity: omega, impactSpeed, roofContact };
}

/**
 * Wheel Suspension and Ground Contact
 *
 * Each wheel hangs from an attachment point on the chassis. A probe cast
 * straight down from the attachment finds the terrain; if the ground is
 * closer than the suspension travel, the spring compresses and pushes the
 * chassis away from the surface along the terrain normal.
 *
 *   probe       = anchor.y - ground(anchor.x) - radius
 *   raw         = (restLength - probe) / restLength
 *   compression = clamp(raw, 0, 1)
 *   force       = k*s * compression*L + c*sqrt(s) * compressionRate   (>= 0)
 *
 * raw >= 1 means the suspension bottomed out: the stepper turns that into a
 * hard stop and a crash candidate.
 */

import type { Vec2, WheelState } from './types';
import type { TerrainGenerator } from './terrain';
import { WHEEL } from './constants';
import { add, rotate, scale, clamp, UP } from './vec2';

/** Result of resolving one wheel against the terrain for one tick. */
export interface WheelContact {
  state: WheelState;
  /** World-space attachment point */
  anchor: Vec2;
  /** Spring force on the chassis, world space (zero while airborne) */
  force: Vec2;
  /** Magnitude of the spring force, used as the tyre's normal load */
  load: number;
  /** Unclamped compression; >= 1 when bottomed out */
  rawCompression: number;
}

/** World-space position of a chassis-space point. */
export function chassisPoint(position: Vec2, angle: number, local: Vec2): Vec2 {
  return add(position, rotate(local, angle));
}

/** Wheel at rest with the suspension fully extended. */
export function createWheelState(offset: Vec2, compression = 0): WheelState {
  return {
    offset,
    compression,
    contact: compression > 0,
    normal: UP,
    bottomedOut: false,
  };
}

/** Spring force magnitude for a compression and compression rate (per second). */
export function springForce(
  compression: number,
  compressionRate: number,
  suspension: number,
): number {
  const stiffness = WHEEL.stiffness * suspension;
  // Damping scales with sqrt so the damping ratio stays put as stiffness grows.
  const damping = WHEEL.damping * Math.sqrt(suspension);
  const force = stiffness * compression * WHEEL.restLength
    + damping * compressionRate * WHEEL.restLength;
  return Math.max(0, force);
}

/**
 * Resolve one wheel against the terrain.
 *
 * @param offset - Attachment point in chassis space
 * @param position - Chassis centre
 * @param angle - Chassis angle
 * @param prevCompression - Compression from the previous tick, for damping
 * @param suspension - Suspension upgrade multiplier
 */
export function resolveWheel(
  offset: Vec2,
  position: Vec2,
  angle: number,
  prevCompression: number,
  terrain: TerrainGenerator,
  suspension: number,
  dt: number,
): WheelContact {
  const anchor = chassisPoint(position, angle, offset);
  const ground = terrain.heightAt(anchor.x);
  const probe = anchor.y - ground - WHEEL.radius;

  if (probe >= WHEEL.restLength) {
    return {
      state: { offset, compression: 0, contact: false, normal: UP, bottomedOut: false },
      anchor,
      force: { x: 0, y: 0 },
      load: 0,
      rawCompression: 0,
    };
  }

  const rawCompression = (WHEEL.restLength - probe) / WHEEL.restLength;
  const compression = clamp(rawCompression, 0, 1);
  const compressionRate = (compression - prevCompression) / dt;
  const normal = terrain.normalAt(anchor.x);
  const load = springForce(compression, compressionRate, suspension);

  return {
    state: {
      offset,
      compression,
      contact: true,
      normal,
      bottomedOut: rawCompression >= 1,
    },
    anchor,
    force: scale(normal, load),
    load,
    rawCompression,
  };
}

/**
 * 2D Vector Math Module
 *
 * Pure functions operating on the Vec2 interface. No classes, no mutation.
 * Every function returns a new Vec2 (or scalar).
 */

import type { Vec2 } from './types';

export type { Vec2 } from './types';

/** Straight up in world space. */
export const UP: Vec2 = { x: 0, y: 1 };

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

/** 2D cross product (z-component). Torque of force b applied at arm a. */
export function cross(a: Vec2, b: Vec2): number {
  return a.x * b.y - a.y * b.x;
}

export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/** Unit vector in the same direction. Returns {0,0} if length < 1e-10. */
export function normalize(v: Vec2): Vec2 {
  const len = Math.sqrt(v.x * v.x + v.y * v.y);
  if (len < 1e-10) return { x: 0, y: 0 };
  return { x: v.x / len, y: v.y / len };
}

export function distance(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/** Rotate a vector counter-clockwise by an angle in radians. */
export function rotate(v: Vec2, angle: number): Vec2 {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return {
    x: v.x * cos - v.y * sin,
    y: v.x * sin + v.y * cos,
  };
}

/**
 * Surface tangent pointing toward +x for an upward surface normal.
 * Rotates the normal clockwise: {x: n.y, y: -n.x}.
 */
export function tangentOf(normal: Vec2): Vec2 {
  return { x: normal.y, y: -normal.x };
}

/** Unit normal of a surface inclined at the given angle. */
export function normalFromSlope(slope: number): Vec2 {
  return { x: -Math.sin(slope), y: Math.cos(slope) };
}

/** Wrap an angle into [-PI, PI]. */
export function wrapAngle(angle: number): number {
  let a = angle % (2 * Math.PI);
  if (a > Math.PI) a -= 2 * Math.PI;
  if (a < -Math.PI) a += 2 * Math.PI;
  return a;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

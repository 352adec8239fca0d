import { describe, it, expect } from 'vitest';
import {
  vec2,
  add,
  sub,
  scale,
  dot,
  cross,
  length,
  normalize,
  rotate,
  distance,
  tangentOf,
  normalFromSlope,
  wrapAngle,
  clamp,
} from '../../src/engine/vec2';

const PI = Math.PI;

describe('vec2', () => {
  it('creates a vector from x and y', () => {
    const v = vec2(3, 4);
    expect(v.x).toBe(3);
    expect(v.y).toBe(4);
  });
});

describe('add / sub / scale', () => {
  it('adds two vectors', () => {
    expect(add({ x: 1, y: 2 }, { x: 3, y: 4 })).toEqual({ x: 4, y: 6 });
  });

  it('subtracts two vectors', () => {
    expect(sub({ x: 5, y: 7 }, { x: 2, y: 3 })).toEqual({ x: 3, y: 4 });
  });

  it('scales a vector', () => {
    expect(scale({ x: 2, y: -3 }, 2)).toEqual({ x: 4, y: -6 });
  });

  it('does not mutate its inputs', () => {
    const a = { x: 1, y: 1 };
    add(a, { x: 2, y: 2 });
    scale(a, 10);
    expect(a).toEqual({ x: 1, y: 1 });
  });
});

describe('dot / cross', () => {
  it('dot of perpendicular vectors is 0', () => {
    expect(dot({ x: 1, y: 0 }, { x: 0, y: 1 })).toBe(0);
  });

  it('cross of x by y is +1 (counter-clockwise)', () => {
    expect(cross({ x: 1, y: 0 }, { x: 0, y: 1 })).toBe(1);
  });

  it('upward force at a rear arm gives clockwise (negative) torque', () => {
    expect(cross({ x: -1.2, y: -0.4 }, { x: 0, y: 100 })).toBeCloseTo(-120, 10);
  });
});

describe('length / normalize / distance', () => {
  it('length of 3-4-5 triangle', () => {
    expect(length({ x: 3, y: 4 })).toBe(5);
  });

  it('normalize gives a unit vector', () => {
    const n = normalize({ x: 3, y: 4 });
    expect(n.x).toBeCloseTo(0.6, 12);
    expect(n.y).toBeCloseTo(0.8, 12);
  });

  it('normalize of zero vector is zero', () => {
    expect(normalize({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
  });

  it('distance between two points', () => {
    expect(distance({ x: 1, y: 1 }, { x: 4, y: 5 })).toBe(5);
  });
});

describe('rotate', () => {
  it('rotates +x by 90 degrees counter-clockwise onto +y', () => {
    const r = rotate({ x: 1, y: 0 }, PI / 2);
    expect(r.x).toBeCloseTo(0, 12);
    expect(r.y).toBeCloseTo(1, 12);
  });
});

describe('surface helpers', () => {
  it('flat ground has an upward normal and a +x tangent', () => {
    const n = normalFromSlope(0);
    expect(n.y).toBe(1);
    const t = tangentOf(n);
    expect(t.x).toBe(1);
    expect(Math.abs(t.y)).toBe(0);
  });

  it('a 45 degree uphill normal leans back toward -x', () => {
    const n = normalFromSlope(PI / 4);
    expect(n.x).toBeCloseTo(-Math.SQRT1_2, 12);
    expect(n.y).toBeCloseTo(Math.SQRT1_2, 12);
    const t = tangentOf(n);
    expect(t.x).toBeCloseTo(Math.SQRT1_2, 12);
    expect(t.y).toBeCloseTo(Math.SQRT1_2, 12);
  });
});

describe('wrapAngle / clamp', () => {
  it('wraps 3*PI/2 to -PI/2', () => {
    expect(wrapAngle(1.5 * PI)).toBeCloseTo(-0.5 * PI, 12);
  });

  it('leaves small angles unchanged', () => {
    expect(wrapAngle(0.3)).toBe(0.3);
  });

  it('clamps into range', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
  });
});

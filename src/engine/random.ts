/**
 * Seeded randomness for terrain generation.
 *
 * The engine never calls Math.random: every random draw is derived from the
 * level seed so the same seed always yields the same level.
 */

/**
 * Fold a safe-integer seed into 32 bits, mixing in the high word so seeds
 * that differ only above bit 31 still give different levels. Seeds in
 * [0, 2^32) map to themselves.
 */
export function seedKey(seed: number): number {
  const low = seed >>> 0;
  const high = Math.floor(seed / 4294967296);
  return (low ^ Math.imul(high, 0x85ebca6b)) >>> 0;
}

/** Sequential PRNG (mulberry32). Returns floats in [0, 1). */
export function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Order-independent hash of (seed, index, channel) to [0, 1).
 * Lets any sample be computed without replaying earlier draws.
 */
export function hash01(seed: number, index: number, channel = 0): number {
  const mixed = (seed ^ Math.imul(index, 0x9e3779b1) ^ Math.imul(channel + 1, 0x85ebca6b)) >>> 0;
  return mulberry32(mixed)();
}

/** Same as hash01, mapped to [-1, 1). */
export function hashSigned(seed: number, index: number, channel = 0): number {
  return hash01(seed, index, channel) * 2 - 1;
}

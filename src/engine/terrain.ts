/**
 * Procedural Terrain Generator
 *
 * Produces a continuous, single-valued height function over x >= 0 for one
 * level. Heights are sampled every TERRAIN.sampleSpacing metres and linearly
 * interpolated, so the surface is continuous everywhere.
 *
 * Pipeline per sample i:
 *   1. Layered sines (three octaves, phases drawn from the seed)
 *   2. Per-sample value noise (order-independent hash of seed and index)
 *   3. Ledges on the harder tiers (raised cells, hashed per cell)
 *   4. Smoothstep blend-in after the flat start zone
 *   5. Slope cap against the previous sample, so sharp features stay drivable
 *
 * Samples are produced lazily in chunks, always in order, the first time a
 * query reaches them. A chunk is never regenerated, so any value returned
 * once is returned again for the rest of the run.
 *
 * Obstacles and pickups are a sparse overlay placed per chunk with a
 * chunk-seeded RNG; they never affect the height function.
 */

import type { Vec2, Pickup, Hazard, Difficulty } from './types';
import {
  TERRAIN,
  TERRAIN_BANDS,
  TERRAIN_OCTAVES,
  PICKUP,
  type TerrainBand,
} from './constants';
import { mulberry32, hash01, hashSigned, seedKey } from './random';
import { normalFromSlope, clamp } from './vec2';

/** Gap kept between overlay items and chunk edges, m. */
const OVERLAY_MARGIN = 5;

/** Noise channels so each hashed quantity is independent. */
const BUMP_CHANNEL = 0;
const LEDGE_CHANNEL = 1;

export interface TerrainOptions {
  seed: number;
  difficulty: Difficulty;
  /** Level ground at the start of the level, m */
  flatStartLength?: number;
}

/** Generator could not be built from its options. Fatal to level start. */
export class TerrainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerrainError';
  }
}

export class TerrainGenerator {
  readonly seed: number;
  readonly difficulty: Difficulty;
  readonly flatStartLength: number;
  readonly band: Readonly<TerrainBand>;

  /** 32-bit key every random draw derives from */
  private readonly key: number;
  private readonly phases: readonly number[];
  private readonly maxRise: number;
  /** Contiguous: chunks[c] holds samples c*chunkSamples .. (c+1)*chunkSamples - 1 */
  private readonly chunks: number[][] = [];
  private readonly pickups: Pickup[] = [];
  private readonly hazards: Hazard[] = [];

  constructor(options: TerrainOptions) {
    const { seed, difficulty } = options;
    const flatStartLength = options.flatStartLength ?? TERRAIN.flatStartLength;

    if (!Number.isSafeInteger(seed)) {
      throw new TerrainError(`Cannot seed terrain with ${seed}: seed must be a safe integer`);
    }
    const band = TERRAIN_BANDS[difficulty];
    if (band === undefined) {
      throw new TerrainError(`Unknown difficulty "${String(difficulty)}"`);
    }
    if (!Number.isFinite(flatStartLength) || flatStartLength < 0) {
      throw new TerrainError(`flatStartLength must be >= 0, got ${flatStartLength}`);
    }

    this.seed = seed;
    this.difficulty = difficulty;
    this.flatStartLength = flatStartLength;
    this.band = band;
    this.maxRise = Math.tan(band.maxSlope) * TERRAIN.sampleSpacing;

    this.key = seedKey(seed);
    const rng = mulberry32(this.key);
    this.phases = TERRAIN_OCTAVES.map(() => rng() * 2 * Math.PI);
  }

  /** x up to which heights exist without generating more. */
  get generatedUntil(): number {
    return (this.chunks.length * TERRAIN.chunkSamples - 1) * TERRAIN.sampleSpacing;
  }

  get chunkCount(): number {
    return this.chunks.length;
  }

  /** Ground height at x. x < 0 reads as x = 0. */
  heightAt(x: number): number {
    const pos = Math.max(0, x) / TERRAIN.sampleSpacing;
    const i = Math.floor(pos);
    const t = pos - i;
    const h0 = this.sample(i);
    const h1 = this.sample(i + 1);
    return h0 + (h1 - h0) * t;
  }

  /** Surface angle at x in radians, positive = rising toward +x. */
  slopeAt(x: number): number {
    const i = Math.floor(Math.max(0, x) / TERRAIN.sampleSpacing);
    const rise = this.sample(i + 1) - this.sample(i);
    const slope = Math.atan2(rise, TERRAIN.sampleSpacing);
    return clamp(slope, -this.band.maxSlope, this.band.maxSlope);
  }

  /** Unit surface normal at x. */
  normalAt(x: number): Vec2 {
    return normalFromSlope(this.slopeAt(x));
  }

  /** Generate synchronously so that every height up to x is available. */
  ensureRange(x: number): void {
    this.ensureChunk(this.chunkIndexFor(x));
  }

  /**
   * Generate at most maxChunks chunks toward x. Returns how many were made.
   * Cost is bounded per call; a later query still generates on demand.
   */
  prefetch(x: number, maxChunks: number): number {
    const target = this.chunkIndexFor(x);
    let generated = 0;
    while (this.chunks.length <= target && generated < maxChunks) {
      this.generateChunk(this.chunks.length);
      generated++;
    }
    return generated;
  }

  /** Pickups whose x lies in [x0, x1]. */
  pickupsBetween(x0: number, x1: number): Pickup[] {
    this.ensureRange(x1);
    return this.pickups.filter((p) => p.position.x >= x0 && p.position.x <= x1);
  }

  /** Hazard strips covering x. */
  hazardsAt(x: number): Hazard[] {
    this.ensureRange(x);
    return this.hazards.filter((h) => x >= h.x && x <= h.x + h.width);
  }

  // --- Internal helpers ---

  /** Chunk holding the sample right of x (interpolation needs both neighbours). */
  private chunkIndexFor(x: number): number {
    const i = Math.floor(Math.max(0, x) / TERRAIN.sampleSpacing) + 1;
    return Math.floor(i / TERRAIN.chunkSamples);
  }

  private sample(i: number): number {
    const c = Math.floor(i / TERRAIN.chunkSamples);
    this.ensureChunk(c);
    return this.chunks[c][i - c * TERRAIN.chunkSamples];
  }

  private ensureChunk(c: number): void {
    while (this.chunks.length <= c) {
      this.generateChunk(this.chunks.length);
    }
  }

  private generateChunk(c: number): void {
    const n = TERRAIN.chunkSamples;
    const samples: number[] = [];
    const previousChunk = c > 0 ? this.chunks[c - 1] : undefined;
    let prev = previousChunk ? previousChunk[n - 1] : TERRAIN.baseHeight;

    for (let k = 0; k < n; k++) {
      const i = c * n + k;
      const raw = this.rawHeight(i);
      const h = i === 0 ? raw : prev + clamp(raw - prev, -this.maxRise, this.maxRise);
      samples.push(h);
      prev = h;
    }

    this.chunks.push(samples);
    this.placeOverlay(c);
  }

  /** Unclamped height of sample i. */
  private rawHeight(i: number): number {
    const x = i * TERRAIN.sampleSpacing;
    const weight = this.reliefWeight(x);
    if (weight === 0) return TERRAIN.baseHeight;

    const { amplitude, wavelength, bumpAmplitude } = this.band;
    let relief = 0;
    for (let o = 0; o < TERRAIN_OCTAVES.length; o++) {
      const [divisor, ampFactor] = TERRAIN_OCTAVES[o];
      relief += amplitude * ampFactor
        * Math.sin((2 * Math.PI * x * divisor) / wavelength + this.phases[o]);
    }
    relief += bumpAmplitude * hashSigned(this.key, i, BUMP_CHANNEL);
    relief += this.ledgeAt(i);

    return TERRAIN.baseHeight + weight * relief;
  }

  private ledgeAt(i: number): number {
    if (this.band.ledgeChance <= 0) return 0;
    const cell = Math.floor(i / TERRAIN.ledgeCellSamples);
    return hash01(this.key, cell, LEDGE_CHANNEL) < this.band.ledgeChance
      ? this.band.ledgeHeight
      : 0;
  }

  /** 0 inside the flat start, smoothstep to 1 over TERRAIN.blendLength. */
  private reliefWeight(x: number): number {
    if (x <= this.flatStartLength) return 0;
    const t = (x - this.flatStartLength) / TERRAIN.blendLength;
    if (t >= 1) return 1;
    return t * t * (3 - 2 * t);
  }

  private placeOverlay(c: number): void {
    const chunkLength = TERRAIN.chunkSamples * TERRAIN.sampleSpacing;
    const chunkStart = c * chunkLength;
    const clusterSpan = (PICKUP.clusterSize - 1) * PICKUP.clusterSpacing;
    const minX = Math.max(chunkStart, this.flatStartLength + TERRAIN.blendLength) + OVERLAY_MARGIN;
    const maxX = chunkStart + chunkLength - OVERLAY_MARGIN - clusterSpan;
    if (maxX <= minX) return;

    const rng = mulberry32((this.key ^ Math.imul(c + 1, 0x27d4eb2d)) >>> 0);
    const pick = (): number => minX + rng() * (maxX - minX);

    const clusterX = pick();
    for (let k = 0; k < PICKUP.clusterSize; k++) {
      const x = clusterX + k * PICKUP.clusterSpacing;
      this.pickups.push({
        id: `coin-${c}-${k}`,
        kind: 'coin',
        position: { x, y: this.heightAt(x) + PICKUP.hover },
        value: 1,
      });
    }

    if (rng() < this.band.fuelCanChance) {
      const x = pick();
      this.pickups.push({
        id: `fuel-${c}`,
        kind: 'fuel',
        position: { x, y: this.heightAt(x) + PICKUP.hover },
        value: PICKUP.fuelCanAmount,
      });
    }

    for (let s = 0; s < this.band.spikesPerChunk; s++) {
      this.hazards.push({ id: `spikes-${c}-${s}`, kind: 'spikes', x: pick(), width: TERRAIN.hazardWidth });
    }
    this.hazards.push({ id: `boost-${c}`, kind: 'boost', x: pick(), width: TERRAIN.hazardWidth });
  }
}

/**
 * Converts variable frame time into fixed physics ticks.
 *
 * Same accumulator pattern as a render loop's ticker callback, without the
 * renderer: the caller passes elapsed seconds and runs as many DT steps as
 * the clock returns. At most maxSubsteps per frame; leftover time beyond
 * that is dropped.
 */

import { DT, MAX_SUBSTEPS } from './constants';

export class FixedStepClock {
  private accumulator = 0;

  constructor(
    readonly dt: number = DT,
    readonly maxSubsteps: number = MAX_SUBSTEPS,
  ) {}

  /** Add frame time and return the number of steps to run now. */
  advance(frameSeconds: number): number {
    if (!Number.isFinite(frameSeconds) || frameSeconds <= 0) return 0;

    this.accumulator += frameSeconds;
    let steps = 0;
    while (this.accumulator >= this.dt && steps < this.maxSubsteps) {
      this.accumulator -= this.dt;
      steps++;
    }
    if (this.accumulator >= this.dt) {
      this.accumulator = 0;
    }
    return steps;
  }

  /** Fraction of a step left over, for render interpolation. */
  get alpha(): number {
    return this.accumulator / this.dt;
  }

  reset(): void {
    this.accumulator = 0;
  }
}

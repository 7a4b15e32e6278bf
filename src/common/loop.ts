/**
 * Fixed-timestep accumulator.
 *
 * Wall-clock time is added to a lag accumulator every frame, then drained in
 * whole ticks. Whatever is left (always less than one tick) is handed to the
 * renderer for extrapolation. Physics therefore runs identically at any
 * display rate.
 *
 * By default every due tick runs, so a long stall replays as a burst of
 * ticks. Setting `maxTicksPerFrame` caps the burst and drops the rest of the
 * backlog, keeping only the fractional remainder as lag.
 */

import type { FrameLoop, FrameResult, GasConfig, Physics } from '../types.ts';

export class FrameLoopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameLoopError';
  }
}

/**
 * Creates the accumulator loop driving `physics`.
 *
 * @param physics - Engine whose `update` runs once per tick
 * @param config - Supplies `tickDuration` and `maxTicksPerFrame`
 */
export function createFrameLoop(
  physics: Pick<Physics, 'update'>,
  config: Pick<GasConfig, 'tickDuration' | 'maxTicksPerFrame'>
): FrameLoop {
  let lag = 0;
  let totalTicks = 0;
  let advancing = false;

  /**
   * Consumes `elapsed` ms and runs every tick that became due.
   *
   * Non-finite or negative deltas count as zero.
   *
   * @throws FrameLoopError if called from inside a tick
   */
  function advance(elapsed: number): FrameResult {
    if (advancing) {
      throw new FrameLoopError('advance() is not reentrant');
    }

    advancing = true;
    try {
      const tick = config.tickDuration;
      const cap = config.maxTicksPerFrame ?? Number.POSITIVE_INFINITY;

      lag += Number.isFinite(elapsed) && elapsed > 0 ? elapsed : 0;

      let ticks = 0;
      while (lag >= tick && ticks < cap) {
        physics.update();
        lag -= tick;
        ticks += 1;
      }

      // Backlog left over by the cap
      let dropped = 0;
      while (lag >= tick) {
        lag -= tick;
        dropped += 1;
      }

      totalTicks += ticks;
      return { ticks, dropped, lag };
    } finally {
      advancing = false;
    }
  }

  function reset(): void {
    lag = 0;
    totalTicks = 0;
  }

  return {
    advance,
    lag: () => lag,
    ticks: () => totalTicks,
    reset,
  };
}

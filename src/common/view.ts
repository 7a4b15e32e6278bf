/**
 * Render-side view of the body store.
 *
 * The renderer receives positions and velocities as of the last tick plus
 * the leftover lag, and draws each body at `position + velocity * lag`.
 */

import type { FrameView, GasConfig, GasState, Vec2 } from '../types.ts';

export function createFrameView(state: GasState, config: GasConfig, lag: number): FrameView {
  return {
    positions: state.positions,
    velocities: state.velocities,
    count: state.count,
    lag,
    radius: config.radius,
    width: config.width,
    height: config.height,
  };
}

/**
 * Extrapolated on-screen position of body `i`.
 */
export function extrapolate(view: FrameView, i: number): Vec2 {
  const idx = i * 2;
  return {
    x: view.positions[idx] + view.velocities[idx] * view.lag,
    y: view.positions[idx + 1] + view.velocities[idx + 1] * view.lag,
  };
}

/**
 * Writes every extrapolated position into `out` (interleaved, length
 * `2 * count`). Lets the renderer reuse one buffer across frames.
 */
export function extrapolateAll(view: FrameView, out: Float64Array): Float64Array {
  const n = view.count * 2;
  for (let idx = 0; idx < n; idx += 1) {
    out[idx] = view.positions[idx] + view.velocities[idx] * view.lag;
  }
  return out;
}

/**
 * Wall handling for the rectangular playfield.
 *
 * A body touching or crossing a wall has the matching velocity component
 * reflected with no energy loss, and its position is clamped back inside
 * [radius, dimension - radius]. The clamp runs even without a reflection so
 * a fast body cannot end a tick outside the box.
 */

import type { GasConfig, GasState } from '../types.ts';
import { clamp } from './vector.ts';

/**
 * Reflects and clamps body `i` against all four walls.
 */
export function keepInBounds(state: GasState, config: GasConfig, i: number): void {
  const { positions, velocities } = state;
  const { radius, width, height } = config;
  const idx = i * 2;

  const px = positions[idx];
  const py = positions[idx + 1];

  // X walls
  if (px <= radius || px >= width - radius) {
    velocities[idx] = -velocities[idx];
  }

  // Y walls
  if (py <= radius || py >= height - radius) {
    velocities[idx + 1] = -velocities[idx + 1];
  }

  positions[idx] = clamp(px, radius, width - radius);
  positions[idx + 1] = clamp(py, radius, height - radius);
}

/**
 * Clamps body `i` into the playfield without touching its velocity.
 */
export function clampToBounds(state: GasState, config: GasConfig, i: number): void {
  const { positions } = state;
  const { radius, width, height } = config;
  const idx = i * 2;

  positions[idx] = clamp(positions[idx], radius, width - radius);
  positions[idx + 1] = clamp(positions[idx + 1], radius, height - radius);
}

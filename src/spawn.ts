/**
 * Body spawning utilities.
 *
 * Bodies start at independent uniform-random positions inside the playfield
 * with independent uniform-random velocities. The random source is passed in
 * so a fixed seed reproduces the same initial conditions.
 */

import type { GasConfig, SpawnData } from './types.ts';

/**
 * Random source returning reals in [0, 1).
 */
export type Rng = () => number;

/**
 * Creates a deterministic pseudo-random number generator.
 *
 * Uses a Linear Congruential Generator (LCG) algorithm, which produces
 * a sequence of pseudo-random numbers based on a seed value. The same
 * seed always produces the same sequence.
 *
 * LCG formula: next = (a * current + c) mod m
 * - a = 1664525 (multiplier)
 * - c = 1013904223 (increment)
 * - m = 2^32 (modulus, implicit via >>> 0)
 *
 * @param seed - Initial seed value (integer)
 * @returns Function that returns next random number in [0, 1)
 */
export function createRng(seed: number): Rng {
  let state = seed >>> 0; // Convert to unsigned 32-bit integer

  return () => {
    state = (Math.imul(1664525, state) + 1013904223) >>> 0;
    return state / 4294967296; // 2^32
  };
}

/**
 * Draws a real from [low, high).
 */
export function uniform(rng: Rng, low: number, high: number): number {
  return low + rng() * (high - low);
}

/**
 * Creates initial body data for the simulation.
 *
 * Every position is drawn before any velocity: two draws per body for
 * (x, y) within [radius, dimension - radius], then two draws per body for
 * (vx, vy) within [-maxSpeed, maxSpeed].
 *
 * @param config - Simulation configuration
 * @param rng - Random source
 *
 * @example
 * const config = createConfig({ seed: 7 })
 * const spawn = createSpawnData(config, createRng(7))
 * console.info(`Spawned ${spawn.count} bodies`)
 */
export function createSpawnData(config: GasConfig, rng: Rng): SpawnData {
  const count = config.bodyCount;
  const { radius, width, height, maxSpeed } = config;

  // Interleaved [x0, y0, x1, y1, ...]
  const positions = new Float64Array(count * 2);
  const velocities = new Float64Array(count * 2);

  for (let i = 0; i < count; i += 1) {
    positions[i * 2] = uniform(rng, radius, width - radius);
    positions[i * 2 + 1] = uniform(rng, radius, height - radius);
  }

  for (let i = 0; i < count; i += 1) {
    velocities[i * 2] = uniform(rng, -maxSpeed, maxSpeed);
    velocities[i * 2 + 1] = uniform(rng, -maxSpeed, maxSpeed);
  }

  return { positions, velocities, count };
}

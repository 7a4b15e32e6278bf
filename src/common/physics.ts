/**
 * Fixed-step physics engine for the ideal gas.
 *
 * === Tick Overview ===
 *
 * Each call to `update` advances the simulation by exactly one
 * `tickDuration` and runs these phases in order:
 *
 * 1. INTEGRATION & WALLS
 *    - position += velocity * tickDuration for every body
 *    - Reflect and clamp each body against the walls
 *
 * 2. COLLISIONS
 *    - Visit every unordered pair once (i over all bodies, j < i)
 *    - Apply the elastic response to each colliding pair
 *
 * 3. CONTAINMENT
 *    - The positional push of phase 2 can move a body past a wall, so every
 *      body touched by a collision is clamped back into the playfield
 *
 * Phase 1 finishes for all bodies before any collision check, so collision
 * response always sees post-wall, pre-collision state for the tick.
 *
 * Pair checks are exhaustive, O(N^2) per tick.
 */

import type { GasConfig, GasState, Physics } from '../types.ts';
import { clampToBounds, keepInBounds } from './boundary.ts';
import { collideUpdate, isCollide } from './collision.ts';

/**
 * Creates the physics engine bound to one state and config.
 *
 * @param state - Body store, mutated in place
 * @param config - Simulation configuration
 */
export function createPhysics(state: GasState, config: GasConfig): Physics {
  // Bodies pushed by a collision during the current tick
  const touched = new Uint8Array(state.count);

  function integrate(): void {
    const positions = state.positions;
    const velocities = state.velocities;
    const dt = config.tickDuration;

    for (let i = 0; i < state.count; i += 1) {
      const idx = i * 2;
      positions[idx] += velocities[idx] * dt;
      positions[idx + 1] += velocities[idx + 1] * dt;
      keepInBounds(state, config, i);
    }
  }

  function resolveCollisions(): boolean {
    let collided = false;

    for (let i = 0; i < state.count; i += 1) {
      for (let j = 0; j < i; j += 1) {
        if (isCollide(state, config, i, j)) {
          collideUpdate(state, config, i, j);
          touched[i] = 1;
          touched[j] = 1;
          collided = true;
        }
      }
    }

    return collided;
  }

  function contain(): void {
    for (let i = 0; i < state.count; i += 1) {
      if (touched[i] === 1) {
        clampToBounds(state, config, i);
        touched[i] = 0;
      }
    }
  }

  function update(): void {
    integrate();
    if (resolveCollisions()) {
      contain();
    }
  }

  return {
    update,
    keepInBounds: (i) => keepInBounds(state, config, i),
    isCollide: (i, j) => isCollide(state, config, i, j),
    collideUpdate: (i, j) => collideUpdate(state, config, i, j),
  };
}

/**
 * Simulation factory and state management.
 *
 * This module assembles the simulation from its parts:
 * - Configuration (validated once)
 * - Initial body data from an injected random source
 * - Physics engine and fixed-timestep frame loop
 *
 * The simulation uses a factory pattern rather than classes, keeping state
 * inside closures. It has no DOM dependency, so the same core runs in the
 * browser and under tests.
 */

import type { FrameView, GasConfig, GasState, Sim, SpawnData } from './types.ts';
import { createConfig, validateConfig } from './common/config.ts';
import { createFrameLoop } from './common/loop.ts';
import { createPhysics } from './common/physics.ts';
import { createFrameView } from './common/view.ts';
import { createRng, createSpawnData, type Rng } from './spawn.ts';

/**
 * Creates the body store from spawn data.
 * The arrays are taken over, not copied.
 */
export function createState(spawn: SpawnData): GasState {
  return {
    positions: spawn.positions,
    velocities: spawn.velocities,
    count: spawn.count,
  };
}

/**
 * Creates a complete simulation instance.
 *
 * @param overrides - Config fields replacing the defaults
 * @param rng - Random source for spawning; defaults to an LCG seeded with
 *   `config.seed`, or the current time when no seed is set
 * @throws GasConfigError if the resulting config is invalid
 *
 * @example
 * const sim = createSim({ seed: 1 })
 *
 * function frame(now) {
 *   const { view } = sim.frame(now - last)
 *   renderer.draw(view)
 *   last = now
 *   requestAnimationFrame(frame)
 * }
 */
export function createSim(overrides: Partial<GasConfig> = {}, rng?: Rng): Sim {
  const config: GasConfig = createConfig(overrides);
  validateConfig(config);

  const random = rng ?? createRng(config.seed ?? Date.now());
  const state = createState(createSpawnData(config, random));
  const physics = createPhysics(state, config);
  const loop = createFrameLoop(physics, config);

  function view(): FrameView {
    return createFrameView(state, config, loop.lag());
  }

  /**
   * Runs every tick due after `elapsed` ms and returns the view to draw.
   */
  function frame(elapsed: number) {
    const result = loop.advance(elapsed);
    return { ...result, view: createFrameView(state, config, result.lag) };
  }

  return {
    config,
    state,
    physics,
    frame,
    view,
    lag: loop.lag,
    ticks: loop.ticks,
  };
}

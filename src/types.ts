/**
 * Type definitions for the ideal gas simulation.
 *
 * The simulation advances a fixed set of circular bodies in discrete ticks.
 * Each tick integrates positions, reflects bodies off the walls, and resolves
 * every colliding pair. Rendering happens at display rate and extrapolates
 * positions by the time not yet consumed by ticks (the "lag").
 */

/**
 * 2D vector representation used throughout the simulation.
 * Used for positions, velocities, and separation axes.
 */
export interface Vec2 {
  x: number;
  y: number;
}

/**
 * Complete configuration for the simulation.
 * Built once at startup by `createConfig` and never changed afterwards.
 */
export interface GasConfig {
  /** Playfield width in world units */
  width: number;

  /** Playfield height in world units */
  height: number;

  /** Radius shared by every body */
  radius: number;

  /**
   * Collision threshold.
   * Compared against the squared distance between two bodies, so the
   * effective interaction distance is its square root.
   */
  collisionRadius: number;

  /** Number of bodies spawned at startup */
  bodyCount: number;

  /** Initial velocity bound per axis (world units per ms) */
  maxSpeed: number;

  /** Fixed tick duration in ms */
  tickDuration: number;

  /** Fraction of the collision radius used for the positional push */
  separationFactor: number;

  /** Added to the separation length to keep the divisor away from zero */
  smooth: number;

  /** Added to the x component of the separation before normalizing */
  offset: number;

  /**
   * Upper bound on ticks per frame.
   * `null` runs every tick the lag allows.
   */
  maxTicksPerFrame: number | null;

  /** RNG seed, or `null` to seed from the clock */
  seed: number | null;
}

/**
 * Mutable simulation state: the body store.
 *
 * Arrays are interleaved [x0, y0, x1, y1, ...] and allocated once.
 * Only the integrator writes to them.
 */
export interface GasState {
  /** Current body positions */
  positions: Float64Array;

  /** Current body velocities */
  velocities: Float64Array;

  /** Number of bodies */
  count: number;
}

/**
 * Data returned from body spawning.
 */
export interface SpawnData {
  positions: Float64Array;
  velocities: Float64Array;
  count: number;
}

/**
 * Read-only snapshot handed to the render adapter once per frame.
 */
export interface FrameView {
  readonly positions: Float64Array;
  readonly velocities: Float64Array;
  readonly count: number;

  /** Time not yet consumed by ticks, in ms */
  readonly lag: number;

  readonly radius: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Outcome of one `advance` call on the frame loop.
 */
export interface FrameResult {
  /** Ticks run during this frame */
  ticks: number;

  /** Whole ticks discarded by the per-frame cap */
  dropped: number;

  /** Remaining lag after the frame, in [0, tickDuration) */
  lag: number;
}

/**
 * Physics engine interface.
 * Every operation is bound to one state and config.
 */
export interface Physics {
  /** Advance every body by exactly one tick */
  update: () => void;

  /** Reflect and clamp body `i` against the walls */
  keepInBounds: (i: number) => void;

  /** Whether bodies `i` and `j` are within the collision threshold */
  isCollide: (i: number, j: number) => boolean;

  /** Apply the elastic response to the pair `(i, j)` */
  collideUpdate: (i: number, j: number) => void;
}

/**
 * Accumulator loop converting wall-clock deltas into ticks.
 */
export interface FrameLoop {
  /** Consume `elapsed` ms of wall-clock time */
  advance: (elapsed: number) => FrameResult;

  /** Current lag in ms */
  lag: () => number;

  /** Total ticks run since creation or the last reset */
  ticks: () => number;

  /** Clear the lag and the tick counter */
  reset: () => void;
}

/**
 * Main simulation interface exposed to the frame driver.
 */
export interface Sim {
  config: Readonly<GasConfig>;
  state: GasState;
  physics: Physics;

  /** Per-frame entry point: run due ticks and return the view to draw */
  frame: (elapsed: number) => FrameResult & { view: FrameView };

  /** View of the current state with the current lag */
  view: () => FrameView;

  lag: () => number;
  ticks: () => number;
}

/**
 * Renderer interface for drawing the simulation.
 */
export interface Renderer {
  /** Draw every body at its extrapolated position */
  draw: (view: FrameView) => void;

  /** Remove listeners installed by the renderer */
  dispose: () => void;
}

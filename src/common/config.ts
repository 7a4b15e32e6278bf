/**
 * Configuration factory for the ideal gas simulation.
 *
 * The defaults describe a 300 x 300 box of 400 bodies with radius 5,
 * advanced in 20 ms ticks. Time is measured in milliseconds and distance in
 * world units, which the canvas renderer maps one-to-one to CSS pixels.
 */

import type { GasConfig } from '../types.ts';

/**
 * Ratio between the collision threshold and the body radius.
 */
export const COLLISION_RADIUS_FACTOR = 5;

export class GasConfigError extends Error {
  constructor(
    readonly field: keyof GasConfig,
    message: string
  ) {
    super(`Invalid config.${field}: ${message}`);
    this.name = 'GasConfigError';
  }
}

/**
 * Creates a new configuration object with default simulation parameters.
 *
 * Overriding `radius` without `collisionRadius` keeps the collision
 * threshold at `COLLISION_RADIUS_FACTOR * radius`.
 *
 * @param overrides - Fields replacing the defaults
 */
export function createConfig(overrides: Partial<GasConfig> = {}): GasConfig {
  const radius = overrides.radius ?? 5;

  return {
    // === World ===
    width: 300,
    height: 300,
    radius,
    collisionRadius: COLLISION_RADIUS_FACTOR * radius,

    // === Bodies ===
    bodyCount: 400,
    maxSpeed: 0.03, // Units per ms, per axis

    // === Time Integration ===
    tickDuration: 20,
    maxTicksPerFrame: null, // Unbounded: a stall replays every missed tick

    // === Collision Response ===
    separationFactor: 0.7,
    smooth: 1e-4,
    offset: 5e-4,

    seed: null,

    ...overrides,
  };
}

function requireFinite(config: GasConfig, field: keyof GasConfig): number {
  const value = config[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new GasConfigError(field, `expected a finite number, got ${String(value)}`);
  }
  return value;
}

/**
 * Checks the contract the simulation core relies on.
 * The core itself never re-checks these values while running.
 *
 * @throws GasConfigError for the first field that violates it
 */
export function validateConfig(config: GasConfig): void {
  const radius = requireFinite(config, 'radius');
  if (radius <= 0) {
    throw new GasConfigError('radius', 'must be positive');
  }

  if (requireFinite(config, 'width') <= 2 * radius) {
    throw new GasConfigError('width', `must exceed 2 * radius (${2 * radius})`);
  }
  if (requireFinite(config, 'height') <= 2 * radius) {
    throw new GasConfigError('height', `must exceed 2 * radius (${2 * radius})`);
  }

  const bodyCount = requireFinite(config, 'bodyCount');
  if (!Number.isInteger(bodyCount) || bodyCount < 0) {
    throw new GasConfigError('bodyCount', 'must be a non-negative integer');
  }

  if (requireFinite(config, 'maxSpeed') < 0) {
    throw new GasConfigError('maxSpeed', 'must not be negative');
  }
  if (requireFinite(config, 'tickDuration') <= 0) {
    throw new GasConfigError('tickDuration', 'must be positive');
  }
  if (requireFinite(config, 'collisionRadius') <= 0) {
    throw new GasConfigError('collisionRadius', 'must be positive');
  }
  if (requireFinite(config, 'smooth') <= 0) {
    throw new GasConfigError('smooth', 'must be positive');
  }
  requireFinite(config, 'offset');
  requireFinite(config, 'separationFactor');

  const cap = config.maxTicksPerFrame;
  if (cap !== null && (!Number.isInteger(cap) || cap < 1)) {
    throw new GasConfigError('maxTicksPerFrame', 'must be null or a positive integer');
  }

  const seed = config.seed;
  if (seed !== null && !Number.isInteger(seed)) {
    throw new GasConfigError('seed', 'must be null or an integer');
  }
}

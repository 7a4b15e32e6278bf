import { describe, expect, it } from 'vitest';
import type { GasConfig } from '../types.ts';
import { COLLISION_RADIUS_FACTOR, GasConfigError, createConfig, validateConfig } from './config.ts';

describe('createConfig', () => {
  it('returns the default world', () => {
    const config = createConfig();
    expect(config).toEqual({
      width: 300,
      height: 300,
      radius: 5,
      collisionRadius: 25,
      bodyCount: 400,
      maxSpeed: 0.03,
      tickDuration: 20,
      maxTicksPerFrame: null,
      separationFactor: 0.7,
      smooth: 1e-4,
      offset: 5e-4,
      seed: null,
    });
    expect(() => validateConfig(config)).not.toThrow();
  });

  it('derives the collision radius from an overridden radius', () => {
    expect(createConfig({ radius: 2 }).collisionRadius).toBe(2 * COLLISION_RADIUS_FACTOR);
    expect(createConfig({ radius: 2, collisionRadius: 9 }).collisionRadius).toBe(9);
  });
});

describe('validateConfig', () => {
  const cases: [keyof GasConfig, Partial<GasConfig>][] = [
    ['radius', { radius: 0 }],
    ['radius', { radius: Number.NaN }],
    ['width', { width: 10 }],
    ['height', { height: 8 }],
    ['bodyCount', { bodyCount: 2.5 }],
    ['bodyCount', { bodyCount: -1 }],
    ['maxSpeed', { maxSpeed: -0.1 }],
    ['tickDuration', { tickDuration: 0 }],
    ['collisionRadius', { collisionRadius: -3 }],
    ['smooth', { smooth: 0 }],
    ['offset', { offset: Number.POSITIVE_INFINITY }],
    ['maxTicksPerFrame', { maxTicksPerFrame: 0 }],
    ['maxTicksPerFrame', { maxTicksPerFrame: 1.5 }],
    ['seed', { seed: 0.25 }],
  ];

  it.each(cases)('rejects an invalid %s', (field, overrides) => {
    const config = createConfig(overrides);
    expect(() => validateConfig(config)).toThrow(GasConfigError);

    try {
      validateConfig(config);
    } catch (error) {
      expect(error).toBeInstanceOf(GasConfigError);
      expect(error instanceof GasConfigError && error.field).toBe(field);
    }
  });

  it('accepts a cap and a seed', () => {
    expect(() => validateConfig(createConfig({ maxTicksPerFrame: 4, seed: 9 }))).not.toThrow();
  });

  it('names the field in the message', () => {
    expect(() => validateConfig(createConfig({ tickDuration: -20 }))).toThrow(
      'Invalid config.tickDuration: must be positive'
    );
  });
});

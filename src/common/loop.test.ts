import { describe, expect, it, vi } from 'vitest';
import { FrameLoopError, createFrameLoop } from './loop.ts';

describe('createFrameLoop', () => {
  it('drains whole ticks and keeps the remainder as lag', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: null });

    expect(loop.advance(5)).toEqual({ ticks: 0, dropped: 0, lag: 5 });
    expect(loop.advance(15)).toEqual({ ticks: 1, dropped: 0, lag: 0 });
    expect(loop.advance(45)).toEqual({ ticks: 2, dropped: 0, lag: 5 });
    expect(physics.update).toHaveBeenCalledTimes(3);
    expect(loop.ticks()).toBe(3);
    expect(loop.lag()).toBe(5);
  });

  it('conserves time across irregular frames', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: null });
    const deltas = [5, 13.3, 40, 0, 7.7, 100, 16.6, 3.1, 61.9];
    const total = deltas.reduce((sum, dt) => sum + dt, 0);

    for (const dt of deltas) {
      const { lag } = loop.advance(dt);
      expect(lag).toBeGreaterThanOrEqual(0);
      expect(lag).toBeLessThan(20);
    }

    expect(physics.update).toHaveBeenCalledTimes(loop.ticks());
    expect(loop.ticks() * 20 + loop.lag()).toBeCloseTo(total, 9);
  });

  it('replays a long stall as a burst of ticks when uncapped', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: null });

    expect(loop.advance(1010)).toEqual({ ticks: 50, dropped: 0, lag: 10 });
  });

  it('drops whole ticks beyond the per-frame cap', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: 3 });

    expect(loop.advance(130)).toEqual({ ticks: 3, dropped: 3, lag: 10 });
    expect(physics.update).toHaveBeenCalledTimes(3);
    expect(loop.ticks()).toBe(3);
  });

  it('ignores negative and non-finite deltas', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: null });

    loop.advance(-50);
    loop.advance(Number.NaN);
    loop.advance(Number.POSITIVE_INFINITY);

    expect(loop.lag()).toBe(0);
    expect(physics.update).not.toHaveBeenCalled();
  });

  it('rejects a nested advance from inside a tick', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: null });
    physics.update.mockImplementation(() => {
      loop.advance(1);
    });

    expect(() => loop.advance(20)).toThrow(FrameLoopError);

    // The lag of the failed frame is still pending
    physics.update.mockReset();
    expect(loop.advance(0)).toEqual({ ticks: 1, dropped: 0, lag: 0 });
  });

  it('resets lag and tick count', () => {
    const physics = { update: vi.fn<() => void>() };
    const loop = createFrameLoop(physics, { tickDuration: 20, maxTicksPerFrame: null });
    loop.advance(55);
    loop.reset();

    expect(loop.lag()).toBe(0);
    expect(loop.ticks()).toBe(0);
  });
});

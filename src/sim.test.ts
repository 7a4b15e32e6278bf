import { describe, expect, it } from 'vitest';
import { GasConfigError } from './common/config.ts';
import { createSim } from './sim.ts';

describe('createSim', () => {
  it('spawns the configured bodies from the seed', () => {
    const a = createSim({ seed: 42, bodyCount: 32 });
    const b = createSim({ seed: 42, bodyCount: 32 });

    expect(a.state.count).toBe(32);
    expect(a.state.positions).toHaveLength(64);
    expect(Array.from(a.state.positions)).toEqual(Array.from(b.state.positions));
    expect(Array.from(a.state.velocities)).toEqual(Array.from(b.state.velocities));
  });

  it('spawns from an injected random source', () => {
    const sim = createSim({ bodyCount: 3 }, () => 0.5);

    expect(Array.from(sim.state.positions)).toEqual([150, 150, 150, 150, 150, 150]);
    expect(Array.from(sim.state.velocities)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it('runs due ticks per frame and reports the lag in the view', () => {
    const sim = createSim({ seed: 3, bodyCount: 10 });

    const first = sim.frame(50);
    expect(first).toMatchObject({ ticks: 2, dropped: 0, lag: 10 });
    expect(first.view.lag).toBe(10);
    expect(first.view.positions).toBe(sim.state.positions);

    const second = sim.frame(12);
    expect(second).toMatchObject({ ticks: 1, lag: 2 });
    expect(sim.ticks()).toBe(3);
    expect(sim.lag()).toBe(2);
    expect(sim.view().lag).toBe(2);
  });

  it('matches direct updates tick for tick', () => {
    const viaFrames = createSim({ seed: 11, bodyCount: 50 });
    const viaUpdates = createSim({ seed: 11, bodyCount: 50 });

    for (const dt of [16.5, 16.5, 33.25, 8, 45.75]) {
      viaFrames.frame(dt);
    }
    for (let i = 0; i < viaFrames.ticks(); i += 1) {
      viaUpdates.physics.update();
    }

    expect(viaFrames.ticks()).toBe(6);
    expect(Array.from(viaFrames.state.positions)).toEqual(Array.from(viaUpdates.state.positions));
    expect(Array.from(viaFrames.state.velocities)).toEqual(Array.from(viaUpdates.state.velocities));
  });

  it('rejects an invalid configuration', () => {
    expect(() => createSim({ radius: 200 })).toThrow(GasConfigError);
  });
});

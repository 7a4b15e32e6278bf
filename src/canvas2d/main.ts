/**
 * Application entry point and frame driver.
 *
 * This module creates the simulation, the canvas renderer and the GUI, then
 * runs the animation loop:
 * 1. Measure wall-clock time since the previous frame
 * 2. Let the simulation run every tick that became due
 * 3. Draw the bodies extrapolated by the leftover lag
 *
 * The loop stops when the GUI stop button is pressed or Escape is hit.
 * Stopping releases the renderer and GUI on every exit path.
 */

import './style.css';
import { createSim } from '../sim.ts';
import { setupGui } from '../common/gui.ts';
import { createRenderer } from './renderer.ts';

function start(): void {
  const app = document.querySelector<HTMLDivElement>('#app');
  if (!app) throw new Error('Missing #app container');

  app.innerHTML = '<canvas id="sim-canvas" aria-label="Ideal gas simulation"></canvas>';
  const canvas = document.querySelector<HTMLCanvasElement>('#sim-canvas');
  if (!canvas) throw new Error('Failed to create canvas');

  const seed = Date.now() >>> 0;
  const sim = createSim({ seed });
  console.info(`Spawned ${sim.state.count} bodies (seed ${seed})`);

  const renderer = createRenderer(canvas, sim.config);

  let stopRequested = false;
  const requestStop = (): void => {
    stopRequested = true;
  };

  const { stats, refresh, dispose: disposeGui } = setupGui(sim.config, { onStop: requestStop });

  const onKeyDown = (event: KeyboardEvent): void => {
    if (event.key === 'Escape') requestStop();
  };
  window.addEventListener('keydown', onKeyDown);

  function teardown(): void {
    window.removeEventListener('keydown', onKeyDown);
    renderer.dispose();
    disposeGui();
    console.info(`Stopped after ${sim.ticks()} ticks`);
  }

  let lastTime = performance.now();

  function frame(now: number): void {
    if (stopRequested) {
      teardown();
      return;
    }

    let keepRunning = false;
    try {
      stats.begin();

      const elapsed = now - lastTime;
      lastTime = now;

      const { view, dropped } = sim.frame(elapsed);
      if (dropped > 0) {
        console.warn(`Dropped ${dropped} ticks after a ${elapsed.toFixed(0)} ms frame`);
      }

      renderer.draw(view);
      refresh({ lag: view.lag, ticks: sim.ticks() });

      stats.end();
      stats.update();
      keepRunning = true;
    } finally {
      if (keepRunning) {
        requestAnimationFrame(frame);
      } else {
        teardown();
      }
    }
  }

  requestAnimationFrame(frame);
}

try {
  start();
} catch (error) {
  console.error(error);
  const app = document.querySelector<HTMLDivElement>('#app');
  if (app) {
    const message = error instanceof Error ? error.message : String(error);
    app.textContent = `Failed to start the simulation: ${message}`;
  }
}

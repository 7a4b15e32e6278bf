/**
 * GUI panel and stats display for the browser shell.
 *
 * The physics constants are fixed at startup, so the panel only reports
 * them. Its one control is the stop button, which raises the termination
 * signal for the frame driver.
 */

import GUI, { Controller } from 'lil-gui';
import Stats from 'stats-gl';
import type { GasConfig } from '../types.ts';

export interface GuiCallbacks {
  onStop: () => void;
}

export interface GuiReadout {
  lag: number;
  ticks: number;
}

export interface GuiSetup {
  gui: GUI;
  stats: Stats;
  uiState: { showStats: boolean };

  /** Copy the latest lag and tick count into the panel */
  refresh: (readout: GuiReadout) => void;

  /** Remove the panel and the stats overlay from the page */
  dispose: () => void;
}

export function setupGui(config: Readonly<GasConfig>, callbacks: GuiCallbacks): GuiSetup {
  const gui = new GUI({ title: 'Ideal Gas' });
  const stats = new Stats({ trackGPU: false, horizontal: true });
  stats.domElement.style.display = 'none';
  document.body.appendChild(stats.domElement);

  const uiState = { showStats: false };

  // === World Folder (read-only) ===
  const worldFolder = gui.addFolder('World');
  const world = {
    bodies: config.bodyCount,
    size: `${config.width} x ${config.height}`,
    radius: config.radius,
    collisionRadius: config.collisionRadius,
  };
  worldFolder.add(world, 'bodies').name('Bodies').disable();
  worldFolder.add(world, 'size').name('Size').disable();
  worldFolder.add(world, 'radius').name('Radius').disable();
  worldFolder.add(world, 'collisionRadius').name('Collision Radius').disable();

  // === Timing Folder ===
  const timingFolder = gui.addFolder('Timing');
  const timing = { tickDuration: config.tickDuration, lag: 0, ticks: 0 };
  timingFolder.add(timing, 'tickDuration').name('Tick (ms)').disable();
  const lagController: Controller = timingFolder.add(timing, 'lag').name('Lag (ms)').disable();
  const ticksController: Controller = timingFolder.add(timing, 'ticks').name('Ticks').disable();

  timingFolder
    .add(uiState, 'showStats')
    .name('Show FPS')
    .onChange((value: boolean) => {
      stats.domElement.style.display = value ? 'block' : 'none';
    });

  gui.add({ stop: callbacks.onStop }, 'stop').name('Stop');

  function refresh(readout: GuiReadout): void {
    timing.lag = Math.round(readout.lag * 10) / 10;
    timing.ticks = readout.ticks;
    lagController.updateDisplay();
    ticksController.updateDisplay();
  }

  function dispose(): void {
    gui.destroy();
    stats.domElement.remove();
  }

  return { gui, stats, uiState, refresh, dispose };
}

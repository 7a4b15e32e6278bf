/**
 * Canvas 2D renderer for the gas.
 *
 * The renderer draws straight into an ImageData pixel buffer. Each body is a
 * filled circle stamped from a precomputed list of pixel offsets, placed at
 * its position extrapolated by the frame's lag.
 *
 * Coordinate System:
 * - World coordinates: origin at top-left, Y-down, one unit per CSS pixel
 * - Canvas coordinates: the same, multiplied by the device pixel ratio
 */

import type { FrameView, GasConfig, Renderer } from '../types.ts';
import { extrapolateAll } from '../common/view.ts';

const BACKGROUND: readonly [number, number, number] = [50, 50, 50];
const BODY: readonly [number, number, number] = [200, 200, 200];

function getContext2d(canvas: HTMLCanvasElement): CanvasRenderingContext2D {
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('Unable to create a 2D canvas context.');
  }
  return ctx;
}

/**
 * Creates a renderer sized to the playfield.
 *
 * @param canvas - HTML canvas element to render to
 * @param config - Supplies the playfield size and body radius
 */
export function createRenderer(canvas: HTMLCanvasElement, config: GasConfig): Renderer {
  const ctx = getContext2d(canvas);

  let dpr = 1;
  let imageData = ctx.createImageData(1, 1);
  let pixelBuffer = imageData.data;

  // Reused across frames
  const extrapolated = new Float64Array(config.bodyCount * 2);

  let stampOffsets: [number, number][] = [];

  function rebuildStamp(): void {
    const stampRadius = Math.max(1, Math.round(config.radius * dpr));
    const r2 = stampRadius * stampRadius;
    const offsets: [number, number][] = [];

    for (let oy = -stampRadius; oy <= stampRadius; oy += 1) {
      for (let ox = -stampRadius; ox <= stampRadius; ox += 1) {
        if (ox * ox + oy * oy <= r2) {
          offsets.push([ox, oy]);
        }
      }
    }

    stampOffsets = offsets;
  }

  /**
   * Matches the backing store to the playfield at the current pixel ratio.
   * The CSS size stays fixed at width x height.
   */
  function resizeCanvas(): void {
    dpr = window.devicePixelRatio || 1;

    canvas.style.width = `${config.width}px`;
    canvas.style.height = `${config.height}px`;

    const nextWidth = Math.max(1, Math.round(config.width * dpr));
    const nextHeight = Math.max(1, Math.round(config.height * dpr));

    if (imageData.width !== nextWidth || imageData.height !== nextHeight) {
      canvas.width = nextWidth;
      canvas.height = nextHeight;
      imageData = ctx.createImageData(nextWidth, nextHeight);
      pixelBuffer = imageData.data;
    }

    rebuildStamp();
  }

  function draw(view: FrameView): void {
    const width = canvas.width;
    const height = canvas.height;

    for (let i = 0; i < pixelBuffer.length; i += 4) {
      pixelBuffer[i] = BACKGROUND[0];
      pixelBuffer[i + 1] = BACKGROUND[1];
      pixelBuffer[i + 2] = BACKGROUND[2];
      pixelBuffer[i + 3] = 255;
    }

    const positions = extrapolateAll(view, extrapolated);

    for (let i = 0; i < view.count; i += 1) {
      const px = Math.round(positions[i * 2] * dpr);
      const py = Math.round(positions[i * 2 + 1] * dpr);

      for (let j = 0; j < stampOffsets.length; j += 1) {
        const offset = stampOffsets[j];
        const yy = py + offset[1];
        if (yy < 0 || yy >= height) continue;

        const xx = px + offset[0];
        if (xx < 0 || xx >= width) continue;

        const pixelIndex = (yy * width + xx) * 4;
        pixelBuffer[pixelIndex] = BODY[0];
        pixelBuffer[pixelIndex + 1] = BODY[1];
        pixelBuffer[pixelIndex + 2] = BODY[2];
        pixelBuffer[pixelIndex + 3] = 255;
      }
    }

    ctx.putImageData(imageData, 0, 0);
  }

  resizeCanvas();
  window.addEventListener('resize', resizeCanvas);

  return {
    draw,
    dispose: () => window.removeEventListener('resize', resizeCanvas),
  };
}

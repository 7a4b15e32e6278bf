/**
 * Minimal 2D vector math.
 *
 * Vectors are plain `{ x, y }` objects. Body data lives in interleaved
 * typed arrays, so `readVec`/`writeVec` bridge the two representations.
 */

import type { Vec2 } from '../types.ts';

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(a: Vec2, s: number): Vec2 {
  return { x: a.x * s, y: a.y * s };
}

export function dot(a: Vec2, b: Vec2): number {
  return a.x * b.x + a.y * b.y;
}

/**
 * 2D wedge product. Zero when `a` and `b` are parallel.
 */
export function cross(a: Vec2, b: Vec2): number {
  return a.x * b.y - a.y * b.x;
}

/** Squared length */
export function norm2(a: Vec2): number {
  return a.x * a.x + a.y * a.y;
}

export function length(a: Vec2): number {
  return Math.sqrt(norm2(a));
}

export function clamp(value: number, low: number, high: number): number {
  return Math.max(low, Math.min(high, value));
}

/**
 * Reads entry `i` of an interleaved [x0, y0, x1, y1, ...] array.
 */
export function readVec(array: Float64Array, i: number): Vec2 {
  return { x: array[i * 2], y: array[i * 2 + 1] };
}

export function writeVec(array: Float64Array, i: number, v: Vec2): void {
  array[i * 2] = v.x;
  array[i * 2 + 1] = v.y;
}

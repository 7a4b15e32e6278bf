/**
 * Pairwise collision detection and response.
 *
 * Two bodies collide when their squared distance is at most the collision
 * radius. Note the comparison is squared distance against a linear radius:
 * with the default radius of 25 bodies interact once their centers are
 * within 5 units of each other.
 *
 * The response removes the relative velocity along the separation axis,
 * scaled by the unnormalized separation `d`, so closer pairs exchange less
 * momentum than distant ones. Each body is then pushed out along the unit
 * axis by a fixed fraction of the collision radius (a soft correction, not
 * an exact contact resolution).
 */

import type { GasConfig, GasState, Vec2 } from '../types.ts';
import { add, dot, length, norm2, readVec, scale, sub, writeVec } from './vector.ts';

interface PairResponse {
  velocity: Vec2;
  position: Vec2;
}

/**
 * Whether bodies `i` and `j` are within the collision threshold.
 */
export function isCollide(state: GasState, config: GasConfig, i: number, j: number): boolean {
  const d = sub(readVec(state.positions, i), readVec(state.positions, j));
  return norm2(d) <= config.collisionRadius;
}

/**
 * Response of the first body of a pair, given the pre-collision state of
 * both.
 *
 *   d  = p1 - p2
 *   u  = (d + (offset, 0)) / (|d| + smooth)
 *   v1' = v1 - dot(v1 - v2, u) * d
 *   p1' = p1 + u * collisionRadius * separationFactor
 *
 * `smooth` and `offset` keep `u` finite and non-zero for coincident bodies.
 */
function respond(config: GasConfig, v1: Vec2, v2: Vec2, p1: Vec2, p2: Vec2): PairResponse {
  const d = sub(p1, p2);
  const u = scale({ x: d.x + config.offset, y: d.y }, 1 / (length(d) + config.smooth));

  return {
    velocity: sub(v1, scale(d, dot(sub(v1, v2), u))),
    position: add(p1, scale(u, config.collisionRadius * config.separationFactor)),
  };
}

/**
 * Applies the symmetric elastic response to the pair `(i, j)`.
 *
 * Both responses are computed from the same pre-state before either is
 * written, so `(i, j)` and `(j, i)` produce the same result.
 */
export function collideUpdate(state: GasState, config: GasConfig, i: number, j: number): void {
  const { positions, velocities } = state;

  const vi = readVec(velocities, i);
  const vj = readVec(velocities, j);
  const pi = readVec(positions, i);
  const pj = readVec(positions, j);

  const first = respond(config, vi, vj, pi, pj);
  const second = respond(config, vj, vi, pj, pi);

  writeVec(velocities, i, first.velocity);
  writeVec(positions, i, first.position);
  writeVec(velocities, j, second.velocity);
  writeVec(positions, j, second.position);
}

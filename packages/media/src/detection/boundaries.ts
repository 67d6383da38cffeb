/**
 * Boundary sequence helpers shared by the detection strategies.
 */

import { TIME_EPSILON } from '@scenecut/core';
import type { BoundaryTimestamp } from '../types.js';

/**
 * Greedy left-to-right coalescing.
 *
 * Starts from 0, accepts a candidate when it is at least `minSceneDuration`
 * after the previously accepted boundary, ignores candidates at or past the
 * end, then closes the sequence with `duration`. The closing gap may be
 * shorter than `minSceneDuration`.
 */
export function coalesceBoundaries(
  candidates: readonly number[],
  duration: number,
  minSceneDuration: number
): BoundaryTimestamp[] {
  const accepted: BoundaryTimestamp[] = [0];
  let last = 0;

  const sorted = [...candidates]
    .filter(t => Number.isFinite(t))
    .sort((a, b) => a - b);

  for (const t of sorted) {
    if (t >= duration - TIME_EPSILON) break;
    if (t - last + TIME_EPSILON >= minSceneDuration && t - last > TIME_EPSILON) {
      accepted.push(t);
      last = t;
    }
  }

  if (duration - last > TIME_EPSILON) {
    accepted.push(duration);
  }

  return accepted;
}

/**
 * Clamp to [0, duration], sort, drop near-duplicates and make sure both
 * endpoints are present. Returns [] when `duration` is not positive.
 */
export function normalizeBoundaries(
  boundaries: readonly number[],
  duration: number
): BoundaryTimestamp[] {
  if (!(duration > 0)) return [];

  const interior = boundaries
    .filter(t => Number.isFinite(t))
    .map(t => Math.min(Math.max(t, 0), duration))
    .filter(t => t > TIME_EPSILON && t < duration - TIME_EPSILON)
    .sort((a, b) => a - b);

  const result: BoundaryTimestamp[] = [0];
  for (const t of interior) {
    const prev = result[result.length - 1] ?? 0;
    if (t - prev > TIME_EPSILON) {
      result.push(t);
    }
  }
  result.push(duration);

  return result;
}

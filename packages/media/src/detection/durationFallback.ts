/**
 * Duration-based fallback
 *
 * Deterministic equal split. Chooses a part count from the duration band and
 * lowers it when parts would be shorter than the minimum scene duration.
 */

import { logger } from '@scenecut/utils';
import type { BoundaryStrategy, BoundaryTimestamp } from '../types.js';

export function chooseClipCount(duration: number, minSceneDuration: number): number {
  let count: number;
  if (duration <= 30) {
    count = 2;
  } else if (duration <= 60) {
    count = 3;
  } else {
    count = 4;
  }

  if (duration / count < minSceneDuration) {
    count = Math.max(2, Math.floor(duration / minSceneDuration));
  }

  return count;
}

export function durationFallbackBoundaries(
  duration: number,
  minSceneDuration: number
): BoundaryTimestamp[] {
  if (!(duration > 0)) return [];

  const count = chooseClipCount(duration, minSceneDuration);
  const step = duration / count;

  const boundaries: BoundaryTimestamp[] = [0];
  for (let i = 1; i < count; i++) {
    boundaries.push(i * step);
  }
  boundaries.push(duration);

  return boundaries;
}

export const durationFallbackStrategy: BoundaryStrategy = async (filePath, metadata, minSceneDuration) => {
  const boundaries = durationFallbackBoundaries(metadata.duration, minSceneDuration);

  logger.debug({
    component: 'duration-fallback',
    filePath,
    parts: Math.max(0, boundaries.length - 1),
  }, 'Split by duration');

  return boundaries;
};

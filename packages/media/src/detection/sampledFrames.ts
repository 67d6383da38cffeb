/**
 * Sampled frame strategy
 *
 * Content-blind: walks the timeline every 0.5s of source time, snapped to
 * the frame grid, and keeps samples that respect the minimum scene duration.
 * Gives geometric coverage, not real cut accuracy.
 */

import { SAMPLE_INTERVAL_SECONDS, TIME_EPSILON } from '@scenecut/core';
import { logger } from '@scenecut/utils';
import { coalesceBoundaries } from './boundaries.js';
import type { BoundaryStrategy, BoundaryTimestamp } from '../types.js';

/**
 * Sample times strictly inside (0, duration)
 */
export function sampleTimeline(
  duration: number,
  frameRate: number,
  interval: number = SAMPLE_INTERVAL_SECONDS
): number[] {
  if (!(duration > 0) || !(frameRate > 0) || !(interval > 0)) return [];

  const samples: number[] = [];
  for (let k = 1; k * interval < duration - TIME_EPSILON; k++) {
    const snapped = Math.round(k * interval * frameRate) / frameRate;
    if (snapped > TIME_EPSILON && snapped < duration - TIME_EPSILON) {
      samples.push(snapped);
    }
  }
  return samples;
}

export function sampledFrameBoundaries(
  duration: number,
  frameRate: number,
  minSceneDuration: number,
  interval: number = SAMPLE_INTERVAL_SECONDS
): BoundaryTimestamp[] {
  const samples = sampleTimeline(duration, frameRate, interval);
  const boundaries = coalesceBoundaries(samples, duration, minSceneDuration);

  // [0, duration] means no sample qualified
  return boundaries.length > 2 ? boundaries : [];
}

export function createSampledFrameStrategy(interval: number = SAMPLE_INTERVAL_SECONDS): BoundaryStrategy {
  return async (filePath, metadata, minSceneDuration) => {
    if (!(metadata.frameRate > 0)) {
      logger.warn({ component: 'sampled-frames', filePath }, 'Unknown frame rate, cannot sample');
      return [];
    }

    const boundaries = sampledFrameBoundaries(metadata.duration, metadata.frameRate, minSceneDuration, interval);

    logger.debug({
      component: 'sampled-frames',
      filePath,
      interval,
      boundaries: boundaries.length,
    }, 'Sampled timeline');

    return boundaries;
  };
}

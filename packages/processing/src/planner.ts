/**
 * Clip Planner
 *
 * Turns a boundary sequence into the intervals that will be extracted.
 * Each side of a cut is trimmed by the padding so a clip does not open or
 * close on the frame where the scene changes.
 */

import {
  DEFAULT_MIN_CLIP_DURATION,
  TIME_EPSILON,
  ValidationError,
} from '@scenecut/core';
import { isFiniteNonNegative, logger } from '@scenecut/utils';
import type { ClipInterval, ClipPlan, SkippedInterval } from './types.js';

export interface PlanOptions {
  /** Intervals shorter than this after padding are skipped, in seconds */
  minClipDuration?: number;
}

/**
 * Plan one clip per adjacent boundary pair.
 *
 * Pure: the same arguments always produce a deep-equal plan.
 */
export function planClips(
  boundaries: readonly number[],
  duration: number,
  paddingSeconds: number,
  options: PlanOptions = {}
): ClipPlan {
  const minClipDuration = options.minClipDuration ?? DEFAULT_MIN_CLIP_DURATION;

  if (!isFiniteNonNegative(paddingSeconds)) {
    throw new ValidationError('paddingSeconds', `must be a finite number >= 0, got ${paddingSeconds}`);
  }
  if (!isFiniteNonNegative(minClipDuration)) {
    throw new ValidationError('minClipDuration', `must be a finite number >= 0, got ${minClipDuration}`);
  }

  const intervals: ClipInterval[] = [];
  const skipped: SkippedInterval[] = [];

  for (let i = 0; i + 1 < boundaries.length; i++) {
    const from = boundaries[i];
    const to = boundaries[i + 1];
    if (from === undefined || to === undefined) break;

    const start = Math.max(0, from + paddingSeconds);
    const end = Math.min(duration, to - paddingSeconds);

    if (end - start + TIME_EPSILON >= minClipDuration && end > start) {
      intervals.push({ index: intervals.length + 1, start, end });
      continue;
    }

    skipped.push({ pairIndex: i, start, end, reason: 'too-short' });
    logger.warn({
      component: 'clip-planner',
      pairIndex: i,
      start,
      end,
      minClipDuration,
    }, 'Skipping interval shorter than the minimum clip duration');
  }

  return { intervals, skipped };
}

/**
 * Total source time covered by the kept intervals
 */
export function plannedDuration(plan: ClipPlan): number {
  return plan.intervals.reduce((sum, interval) => sum + (interval.end - interval.start), 0);
}

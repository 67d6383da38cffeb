/**
 * Manual Split Modes
 *
 * Boundaries and intervals for the two modes that bypass detection:
 * a fixed number of equal parts, and explicit start,end ranges.
 */

import { TIME_EPSILON, ValidationError } from '@scenecut/core';
import { logger } from '@scenecut/utils';
import type { ClipInterval, ClipPlan, SkippedInterval, TimeRange } from './types.js';

const NUMBER_PATTERN = /^\d+(?:\.\d+)?$/;

/**
 * Parse a single "start,end" range in seconds.
 * Ordering against the file duration is checked later, when it is known.
 */
export function parseTimeRange(text: string): TimeRange {
  const parts = text.split(',').map(part => part.trim());

  if (parts.length !== 2) {
    throw new ValidationError('timestamps', `"${text}" is not a start,end pair`);
  }

  const [startText = '', endText = ''] = parts;
  if (!NUMBER_PATTERN.test(startText) || !NUMBER_PATTERN.test(endText)) {
    throw new ValidationError('timestamps', `"${text}" must contain two non-negative numbers of seconds`);
  }

  return [parseFloat(startText), parseFloat(endText)];
}

export function parseTimeRanges(texts: readonly string[]): TimeRange[] {
  if (texts.length === 0) {
    throw new ValidationError('timestamps', 'at least one start,end range is required');
  }
  return texts.map(parseTimeRange);
}

/**
 * Turn explicit ranges into clip intervals.
 * Ranges outside [0, duration] or with start >= end are skipped.
 */
export function intervalsFromRanges(ranges: readonly TimeRange[], duration: number): ClipPlan {
  const intervals: ClipInterval[] = [];
  const skipped: SkippedInterval[] = [];

  ranges.forEach(([start, end], pairIndex) => {
    let reason: SkippedInterval['reason'] | undefined;

    if (start < 0 || end > duration + TIME_EPSILON) {
      reason = 'out-of-range';
    } else if (start >= end) {
      reason = 'empty-range';
    }

    if (reason === undefined) {
      intervals.push({ index: intervals.length + 1, start, end: Math.min(end, duration) });
      return;
    }

    skipped.push({ pairIndex, start, end, reason });
    logger.warn({ component: 'manual-split', pairIndex, start, end, duration, reason }, 'Skipping invalid time range');
  });

  return { intervals, skipped };
}

/**
 * Boundaries that cut the file into `parts` equal pieces
 */
export function equalPartBoundaries(duration: number, parts: number): number[] {
  if (!Number.isInteger(parts) || parts < 1) {
    throw new ValidationError('parts', `must be a positive integer, got ${parts}`);
  }
  if (parts > duration) {
    throw new ValidationError('parts', `cannot split a ${duration}s file into ${parts} parts`);
  }

  const step = duration / parts;
  const boundaries = [0];
  for (let k = 1; k < parts; k++) {
    boundaries.push(k * step);
  }
  boundaries.push(duration);
  return boundaries;
}

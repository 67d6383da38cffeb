/**
 * Processing Types
 */

/**
 * A planned [start, end) span of source time destined to become one clip
 */
export interface ClipInterval {
  /** 1-based rank among the intervals kept for one input */
  readonly index: number;
  readonly start: number;
  readonly end: number;
}

export type SkipReason = 'too-short' | 'out-of-range' | 'empty-range';

export interface SkippedInterval {
  /** Position of the source pair or range, 0-based */
  readonly pairIndex: number;
  readonly start: number;
  readonly end: number;
  readonly reason: SkipReason;
}

export interface ClipPlan {
  intervals: ClipInterval[];
  skipped: SkippedInterval[];
}

export type ClipResult =
  | {
      interval: ClipInterval;
      succeeded: true;
      outputPath: string;
      sizeBytes: number;
    }
  | {
      interval: ClipInterval;
      succeeded: false;
      sizeBytes: 0;
      error: string;
    };

/** Explicit [start, end] pair in seconds, as typed on the command line */
export type TimeRange = readonly [start: number, end: number];

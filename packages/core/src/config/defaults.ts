/**
 * Pipeline Defaults
 *
 * Values used when neither the environment nor the caller overrides them.
 */

/** Tolerance for comparing timestamps and interval lengths, in seconds */
export const TIME_EPSILON = 1e-6;

/** Roughly one frame at 25 fps, trimmed from each side of a detected cut */
export const DEFAULT_PADDING_SECONDS = 0.04;

/** Intervals shorter than this after padding are dropped */
export const DEFAULT_MIN_CLIP_DURATION = 0.1;

export const DEFAULT_MIN_SCENE_DURATION = 2.0;

/** ffmpeg `scene` score a frame must exceed to count as a cut */
export const DEFAULT_SCENE_THRESHOLD = 0.4;

/** Cadence of the content-blind sampling strategy, in seconds of source time */
export const SAMPLE_INTERVAL_SECONDS = 0.5;

export const DEFAULT_OUTPUT_ROOT = 'smart_split';

export const DEFAULT_CLIP_PREFIX = 'clip';

export const DEFAULT_CLIP_EXTENSION = 'mp4';

export const TIMEOUTS = {
  probeMs: 60000, // 1 minute
  detectionMs: 600000, // 10 minutes
  extractionMs: 3600000, // 1 hour
  versionCheckMs: 5000,
} as const;

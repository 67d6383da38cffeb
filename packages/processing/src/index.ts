/**
 * @scenecut/processing
 * 
 * Turns boundaries into clips.
 * 
 * Responsibilities:
 * - Plan padded intervals from boundaries
 * - Build intervals for the equal-parts and explicit-range modes
 * - Extract each interval with ffmpeg
 */

export { planClips, plannedDuration, type PlanOptions } from './planner.js';
export {
  parseTimeRange,
  parseTimeRanges,
  intervalsFromRanges,
  equalPartBoundaries,
} from './manualSplit.js';
export { ClipExtractor, clipFileName, type ClipExtractorOptions } from './extractor.js';
export {
  FFmpegCommandBuilder,
  type InputOptions,
  type OutputOptions,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';
export {
  CLIP_PRESETS,
  DEFAULT_CLIP_PRESET,
  getClipPreset,
  isClipPresetName,
  type ClipEncodingPreset,
  type ClipPresetName,
} from './presets.js';
export type {
  ClipInterval,
  ClipPlan,
  ClipResult,
  SkippedInterval,
  SkipReason,
  TimeRange,
} from './types.js';

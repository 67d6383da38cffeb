/**
 * @scenecut/media
 * 
 * Media analysis layer.
 * 
 * Responsibilities:
 * - Probe files with ffprobe (duration, resolution, frame rate, audio)
 * - Detect scene boundaries with a cascade of fallback strategies
 */

// Probing
export {
  FFProbe,
  ffprobeOutputSchema,
  type FFProbeResult,
  type FFProbeStream,
  type FFProbeOutcome,
  type FFProbeOptions,
} from './probes/ffprobe.js';
export { MediaProbe, toMediaMetadata, parseFrameRate } from './probes/mediaProbe.js';

// Boundary detection
export {
  BoundaryDetector,
  createDefaultStrategies,
  type BoundaryDetectorOptions,
} from './detection/cascade.js';
export {
  coalesceBoundaries,
  normalizeBoundaries,
} from './detection/boundaries.js';
export {
  createContentChangeStrategy,
  parseShowinfoTimestamps,
  buildSceneFilterArgs,
  type ContentChangeOptions,
} from './detection/contentChange.js';
export {
  createSampledFrameStrategy,
  sampledFrameBoundaries,
  sampleTimeline,
} from './detection/sampledFrames.js';
export {
  durationFallbackStrategy,
  durationFallbackBoundaries,
  chooseClipCount,
} from './detection/durationFallback.js';

// Types
export type {
  MediaMetadata,
  BoundaryTimestamp,
  BoundaryStrategy,
  NamedStrategy,
  StrategyName,
  DetectionResult,
} from './types.js';

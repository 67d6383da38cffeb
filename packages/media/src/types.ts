/**
 * Media Types
 */

/**
 * Snapshot of a probed file. Built once per probe call and never mutated.
 */
export interface MediaMetadata {
  readonly filePath: string;
  readonly formatName: string;

  /** Seconds, >= 0 */
  readonly duration: number;

  /** Pixels, 0 when there is no video stream */
  readonly width: number;
  readonly height: number;

  /** Frames per second; 0 when there is no video stream */
  readonly frameRate: number;

  /** Absent when the file has no audio stream */
  readonly audioSampleRate?: number;

  readonly fileSizeBytes: number;
}

/** Seconds from the start of the file */
export type BoundaryTimestamp = number;

export type StrategyName = 'content-change' | 'sampled-frames' | 'duration-fallback';

/**
 * Every strategy shares this shape; the cascade only looks at how many
 * boundaries come back.
 */
export type BoundaryStrategy = (
  filePath: string,
  metadata: MediaMetadata,
  minSceneDuration: number
) => Promise<BoundaryTimestamp[]>;

export interface NamedStrategy {
  name: StrategyName;
  run: BoundaryStrategy;
}

export interface DetectionResult {
  /** Strictly increasing, starts at 0, ends at the file duration */
  boundaries: BoundaryTimestamp[];
  strategy: StrategyName;
}

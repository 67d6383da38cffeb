/**
 * Pipeline Types
 */

import type { DetectionResult, MediaMetadata } from '@scenecut/media';
import type { ClipResult, TimeRange } from '@scenecut/processing';

export type SplitMode =
  | { kind: 'auto' }
  | { kind: 'equal'; parts: number }
  | { kind: 'timestamps'; ranges: TimeRange[] };

export interface SplitOptions {
  mode: SplitMode;
  /** Minimum spacing between detected boundaries, in seconds */
  minSceneDuration: number;
  /** Trim applied to each side of a detected cut (auto mode only) */
  paddingSeconds: number;
  minClipDuration: number;
}

export type PipelineStage = 'validate' | 'probe' | 'detect' | 'plan' | 'extract';

export interface FileReport {
  inputPath: string;
  outputDir?: string;
  metadata?: MediaMetadata;
  detection?: DetectionResult;
  plannedClips: number;
  clips: ClipResult[];
  /** At least one clip was written */
  succeeded: boolean;
  failedStage?: PipelineStage;
  error?: string;
  durationMs: number;
}

export interface BatchSummary {
  succeeded: number;
  failed: number;
  /** Inputs never started because the batch was cancelled */
  skipped: number;
  total: number;
  cancelled: boolean;
  reports: FileReport[];
}

export type PipelineEvent =
  | { type: 'batch-start'; total: number }
  | { type: 'file-start'; inputPath: string; position: number; total: number }
  | { type: 'stage'; inputPath: string; stage: PipelineStage }
  | { type: 'clip'; inputPath: string; result: ClipResult; plannedClips: number }
  | { type: 'file-complete'; report: FileReport }
  | { type: 'batch-complete'; summary: BatchSummary };

export type PipelineEventListener = (event: PipelineEvent) => void;

/**
 * @scenecut/pipeline
 * 
 * Batch orchestration: runs each input through probing, boundary
 * detection, planning and extraction, and reports per-file outcomes.
 */

export {
  SplitOrchestrator,
  type SplitOrchestratorOptions,
  type MetadataProbe,
  type BoundarySource,
  type ClipWriter,
} from './orchestrator.js';
export { ProcessingSession } from './session.js';
export { validateInput, outputDirFor, uniqueOutputDir } from './validate.js';
export type {
  SplitMode,
  SplitOptions,
  PipelineStage,
  FileReport,
  BatchSummary,
  PipelineEvent,
  PipelineEventListener,
} from './types.js';

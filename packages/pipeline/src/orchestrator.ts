/**
 * Split Orchestrator
 * 
 * Drives each input through validate → probe → detect → plan → extract.
 * Inputs and clips are processed strictly one at a time. A failure is
 * recorded on the input's report and never stops the batch.
 */

import { errorMessage, getBinaryPath } from '@scenecut/core';
import {
  BoundaryDetector,
  MediaProbe,
  type DetectionResult,
  type MediaMetadata,
} from '@scenecut/media';
import {
  ClipExtractor,
  equalPartBoundaries,
  intervalsFromRanges,
  planClips,
  type ClipEncodingPreset,
  type ClipInterval,
  type ClipPlan,
  type ClipResult,
} from '@scenecut/processing';
import { createLogger, ensureDir, type CommandRunner, type Logger } from '@scenecut/utils';
import { ProcessingSession } from './session.js';
import { uniqueOutputDir, validateInput } from './validate.js';
import type { BatchSummary, FileReport, PipelineStage, SplitOptions } from './types.js';

export interface MetadataProbe {
  probe(filePath: string): Promise<MediaMetadata>;
}

export interface BoundarySource {
  detect(filePath: string, metadata: MediaMetadata, minSceneDuration: number): Promise<DetectionResult>;
}

export interface ClipWriter {
  extractAll(
    inputPath: string,
    intervals: readonly ClipInterval[],
    outputDir: string,
    onClip?: (result: ClipResult) => void
  ): Promise<ClipResult[]>;
}

export interface SplitOrchestratorOptions {
  probe?: MetadataProbe;
  detector?: BoundarySource;
  extractor?: ClipWriter;

  // Used to build whichever of the above are not supplied
  runner?: CommandRunner;
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Scene score threshold for content-change detection */
  threshold?: number;
  prefix?: string;
  extension?: string;
  encoding?: ClipEncodingPreset;
}

interface StageTracker {
  current: PipelineStage;
}

export class SplitOrchestrator {
  private probe: MetadataProbe;
  private detector: BoundarySource;
  private extractor: ClipWriter;
  private log: Logger;

  constructor(options: SplitOrchestratorOptions = {}) {
    const { runner } = options;

    this.probe = options.probe ?? new MediaProbe({
      ffprobePath: options.ffprobePath ?? getBinaryPath('ffprobe'),
      runner,
    });
    this.detector = options.detector ?? new BoundaryDetector({
      ffmpegPath: options.ffmpegPath ?? getBinaryPath('ffmpeg'),
      threshold: options.threshold,
      runner,
    });
    this.extractor = options.extractor ?? new ClipExtractor({
      ffmpegPath: options.ffmpegPath ?? getBinaryPath('ffmpeg'),
      prefix: options.prefix,
      extension: options.extension,
      encoding: options.encoding,
      runner,
    });
    this.log = createLogger({ component: 'orchestrator' });
  }

  /**
   * Split one input. Never rejects: every failure lands on the report.
   */
  async processOne(
    inputPath: string,
    outputRoot: string,
    options: SplitOptions,
    session?: ProcessingSession
  ): Promise<FileReport> {
    return this.runOne(inputPath, outputRoot, options, new Set(), session);
  }

  /**
   * `claimedDirs` holds the output directories already used in this batch;
   * the one chosen here is added to it.
   */
  private async runOne(
    inputPath: string,
    outputRoot: string,
    options: SplitOptions,
    claimedDirs: Set<string>,
    session?: ProcessingSession
  ): Promise<FileReport> {
    const startTime = Date.now();
    const report: FileReport = {
      inputPath,
      plannedClips: 0,
      clips: [],
      succeeded: false,
      durationMs: 0,
    };
    const tracker: StageTracker = { current: 'validate' };

    this.log.info({ inputPath, mode: options.mode.kind }, 'Processing input');

    try {
      this.enterStage(tracker, 'validate', inputPath, session);
      await validateInput(inputPath);

      this.enterStage(tracker, 'probe', inputPath, session);
      const metadata = await this.probe.probe(inputPath);
      report.metadata = metadata;

      const plan = await this.planFor(inputPath, metadata, options, report, tracker, session);
      report.plannedClips = plan.intervals.length;

      if (plan.intervals.length === 0) {
        report.failedStage = 'plan';
        report.error = plan.skipped.length > 0
          ? `all ${plan.skipped.length} intervals were too short or out of range`
          : 'no intervals to extract';
      } else {
        this.enterStage(tracker, 'extract', inputPath, session);
        const outputDir = uniqueOutputDir(outputRoot, inputPath, claimedDirs);
        claimedDirs.add(outputDir);
        await ensureDir(outputDir);
        report.outputDir = outputDir;

        report.clips = await this.extractor.extractAll(inputPath, plan.intervals, outputDir, (result) => {
          session?.emitEvent({ type: 'clip', inputPath, result, plannedClips: plan.intervals.length });
        });
        report.succeeded = report.clips.some(clip => clip.succeeded);

        if (!report.succeeded) {
          report.failedStage = 'extract';
          report.error = `all ${report.clips.length} clips failed to extract`;
        }
      }
    } catch (error) {
      report.failedStage = tracker.current;
      report.error = errorMessage(error);
    }

    report.durationMs = Date.now() - startTime;

    if (report.succeeded) {
      this.log.info({
        inputPath,
        clips: report.clips.filter(c => c.succeeded).length,
        planned: report.plannedClips,
        durationMs: report.durationMs,
      }, 'Input complete');
    } else {
      this.log.error({
        inputPath,
        stage: report.failedStage,
        error: report.error,
      }, 'Input failed');
    }

    session?.emitEvent({ type: 'file-complete', report });
    return report;
  }

  /**
   * Split every input in order. Rejects with SessionBusyError if the
   * session is already running a batch; nothing else rejects.
   */
  async processMany(
    inputPaths: readonly string[],
    outputRoot: string,
    options: SplitOptions,
    session: ProcessingSession = new ProcessingSession()
  ): Promise<BatchSummary> {
    session.begin();

    try {
      const total = inputPaths.length;
      const reports: FileReport[] = [];
      const claimedDirs = new Set<string>();
      let skipped = 0;

      session.emitEvent({ type: 'batch-start', total });
      this.log.info({ sessionId: session.id, total, outputRoot }, 'Batch started');

      for (const [position, inputPath] of inputPaths.entries()) {
        if (session.isCancelRequested) {
          skipped = total - position;
          this.log.warn({ sessionId: session.id, skipped }, 'Batch cancelled');
          break;
        }

        session.emitEvent({ type: 'file-start', inputPath, position: position + 1, total });
        reports.push(await this.runOne(inputPath, outputRoot, options, claimedDirs, session));
      }

      const succeeded = reports.filter(r => r.succeeded).length;
      const summary: BatchSummary = {
        succeeded,
        failed: reports.length - succeeded,
        skipped,
        total,
        cancelled: session.isCancelRequested,
        reports,
      };

      this.log.info({
        sessionId: session.id,
        succeeded: summary.succeeded,
        failed: summary.failed,
        skipped: summary.skipped,
      }, 'Batch complete');

      session.emitEvent({ type: 'batch-complete', summary });
      return summary;
    } finally {
      session.end();
    }
  }

  private async planFor(
    inputPath: string,
    metadata: MediaMetadata,
    options: SplitOptions,
    report: FileReport,
    tracker: StageTracker,
    session?: ProcessingSession
  ): Promise<ClipPlan> {
    const { mode } = options;
    const planOptions = { minClipDuration: options.minClipDuration };

    switch (mode.kind) {
      case 'auto': {
        this.enterStage(tracker, 'detect', inputPath, session);
        const detection = await this.detector.detect(inputPath, metadata, options.minSceneDuration);
        report.detection = detection;
        this.log.info({
          inputPath,
          strategy: detection.strategy,
          boundaries: detection.boundaries.length,
        }, 'Boundaries detected');

        this.enterStage(tracker, 'plan', inputPath, session);
        return planClips(detection.boundaries, metadata.duration, options.paddingSeconds, planOptions);
      }

      case 'equal': {
        this.enterStage(tracker, 'plan', inputPath, session);
        const boundaries = equalPartBoundaries(metadata.duration, mode.parts);
        return planClips(boundaries, metadata.duration, 0, planOptions);
      }

      case 'timestamps':
        this.enterStage(tracker, 'plan', inputPath, session);
        return intervalsFromRanges(mode.ranges, metadata.duration);
    }
  }

  private enterStage(
    tracker: StageTracker,
    stage: PipelineStage,
    inputPath: string,
    session?: ProcessingSession
  ): void {
    tracker.current = stage;
    this.log.debug({ inputPath, stage }, 'Entering stage');
    session?.emitEvent({ type: 'stage', inputPath, stage });
  }
}

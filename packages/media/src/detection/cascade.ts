/**
 * Boundary Detector
 * 
 * Runs the detection strategies in order, from most accurate to always
 * available, and stops at the first one that yields at least two boundaries.
 */

import {
  DetectionInsufficientError,
  ValidationError,
  SAMPLE_INTERVAL_SECONDS,
} from '@scenecut/core';
import { createLogger, isFiniteNonNegative, type CommandRunner, type Logger } from '@scenecut/utils';
import { normalizeBoundaries } from './boundaries.js';
import { createContentChangeStrategy } from './contentChange.js';
import { createSampledFrameStrategy } from './sampledFrames.js';
import { durationFallbackStrategy } from './durationFallback.js';
import type { DetectionResult, MediaMetadata, NamedStrategy, StrategyName } from '../types.js';

export interface BoundaryDetectorOptions {
  /** Scene score threshold for the content-change strategy (0-1) */
  threshold?: number;
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** Timeout for the scene filter run, in ms */
  timeout?: number;
  sampleInterval?: number;
  /** Replace the default cascade entirely */
  strategies?: NamedStrategy[];
}

/**
 * The default cascade: content-change → sampled-frames → duration-fallback
 */
export function createDefaultStrategies(options: BoundaryDetectorOptions = {}): NamedStrategy[] {
  return [
    {
      name: 'content-change',
      run: createContentChangeStrategy({
        threshold: options.threshold,
        ffmpegPath: options.ffmpegPath,
        runner: options.runner,
        timeout: options.timeout,
      }),
    },
    {
      name: 'sampled-frames',
      run: createSampledFrameStrategy(options.sampleInterval ?? SAMPLE_INTERVAL_SECONDS),
    },
    {
      name: 'duration-fallback',
      run: durationFallbackStrategy,
    },
  ];
}

export class BoundaryDetector {
  private strategies: NamedStrategy[];
  private log: Logger;

  constructor(options: BoundaryDetectorOptions = {}) {
    this.strategies = options.strategies ?? createDefaultStrategies(options);
    this.log = createLogger({ component: 'boundary-detector' });
  }

  get strategyNames(): StrategyName[] {
    return this.strategies.map(s => s.name);
  }

  /**
   * Detect scene boundaries for a probed file.
   *
   * Resolves with a strictly increasing sequence from 0 to the file duration,
   * or rejects with DetectionInsufficientError when the cascade is exhausted.
   */
  async detect(
    filePath: string,
    metadata: MediaMetadata,
    minSceneDuration: number
  ): Promise<DetectionResult> {
    if (!isFiniteNonNegative(minSceneDuration)) {
      throw new ValidationError('minSceneDuration', 'must be a finite number >= 0');
    }

    this.log.info({ filePath, duration: metadata.duration, minSceneDuration }, 'Starting scene detection');

    const attempted: StrategyName[] = [];

    for (const strategy of this.strategies) {
      attempted.push(strategy.name);

      let raw: number[];
      try {
        raw = await strategy.run(filePath, metadata, minSceneDuration);
      } catch (error) {
        this.log.warn({
          filePath,
          strategy: strategy.name,
          error: error instanceof Error ? error.message : String(error),
        }, 'Detection strategy threw, trying next');
        continue;
      }

      if (raw.length < 2) {
        this.log.warn({ filePath, strategy: strategy.name, found: raw.length }, 'Too few boundaries, trying next strategy');
        continue;
      }

      const boundaries = normalizeBoundaries(raw, metadata.duration);
      if (boundaries.length < 2) {
        continue;
      }

      this.log.info({
        filePath,
        strategy: strategy.name,
        scenes: boundaries.length - 1,
      }, 'Scene detection complete');

      return { boundaries, strategy: strategy.name };
    }

    throw new DetectionInsufficientError(filePath, metadata.duration, attempted);
  }
}

/**
 * Content-change strategy
 *
 * Uses ffmpeg's scene score (`select='gt(scene,T)'`) with `showinfo` to list
 * the frames whose visual change exceeds the threshold, then coalesces those
 * timestamps against the minimum scene duration.
 */

import { executeCommand, logger, tailOutput, type CommandRunner } from '@scenecut/utils';
import { DEFAULT_SCENE_THRESHOLD, TIMEOUTS } from '@scenecut/core';
import { coalesceBoundaries } from './boundaries.js';
import type { BoundaryStrategy } from '../types.js';

export interface ContentChangeOptions {
  /** Scene score threshold (0-1) */
  threshold?: number;
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** Timeout in ms */
  timeout?: number;
}

// [Parsed_showinfo_1 @ 0x...] n:   1 pts:   1001 pts_time:0.041708 ...
const SHOWINFO_PATTERN = /n:\s*\d+\s+pts:\s*-?\d+\s+pts_time:\s*(-?[0-9.]+)/g;

/**
 * Extract `pts_time` values from showinfo lines in ffmpeg's stderr
 */
export function parseShowinfoTimestamps(stderr: string): number[] {
  const timestamps: number[] = [];

  for (const match of stderr.matchAll(SHOWINFO_PATTERN)) {
    const value = parseFloat(match[1] ?? '');
    if (Number.isFinite(value) && value >= 0) {
      timestamps.push(value);
    }
  }

  return timestamps;
}

export function buildSceneFilterArgs(filePath: string, threshold: number): string[] {
  return [
    '-hide_banner',
    '-nostats',
    '-i', filePath,
    '-vf', `select='gt(scene,${threshold})',showinfo`,
    '-an',
    '-f', 'null',
    '-',
  ];
}

export function createContentChangeStrategy(options: ContentChangeOptions = {}): BoundaryStrategy {
  const threshold = options.threshold ?? DEFAULT_SCENE_THRESHOLD;
  const ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  const runner = options.runner ?? executeCommand;
  const timeout = options.timeout ?? TIMEOUTS.detectionMs;

  return async (filePath, metadata, minSceneDuration) => {
    const args = buildSceneFilterArgs(filePath, threshold);
    logger.debug({ component: 'content-change', filePath, args }, 'Running scene filter');

    try {
      const result = await runner(ffmpegPath, args, { timeout });

      if (result.exitCode !== 0) {
        logger.warn({
          component: 'content-change',
          filePath,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          stderr: tailOutput(result.stderr, 500),
        }, 'Scene filter failed');
        return [];
      }

      const candidates = parseShowinfoTimestamps(result.stderr);
      const boundaries = coalesceBoundaries(candidates, metadata.duration, minSceneDuration);

      logger.debug({
        component: 'content-change',
        filePath,
        candidates: candidates.length,
        boundaries: boundaries.length,
      }, 'Scene filter complete');

      return boundaries;
    } catch (error) {
      logger.warn({
        component: 'content-change',
        filePath,
        error: error instanceof Error ? error.message : String(error),
      }, 'Scene filter could not run');
      return [];
    }
  };
}

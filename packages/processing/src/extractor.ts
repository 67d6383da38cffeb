/**
 * Clip Extractor
 *
 * Cuts one planned interval out of the source file with ffmpeg. Tool
 * failures come back as failed ClipResults; nothing here rejects because
 * ffmpeg misbehaved.
 */

import { join } from 'node:path';
import {
  DEFAULT_CLIP_EXTENSION,
  DEFAULT_CLIP_PREFIX,
  TIMEOUTS,
  errorMessage,
} from '@scenecut/core';
import {
  createLogger,
  executeCommand,
  getFileSizeBytes,
  removeFileIfExists,
  tailOutput,
  type CommandRunner,
  type Logger,
} from '@scenecut/utils';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { CLIP_PRESETS, DEFAULT_CLIP_PRESET, type ClipEncodingPreset } from './presets.js';
import type { ClipInterval, ClipResult } from './types.js';

export interface ClipExtractorOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  /** File name prefix, `clip` by default */
  prefix?: string;
  /** File extension without the dot, `mp4` by default */
  extension?: string;
  encoding?: ClipEncodingPreset;
  /** Per-clip timeout in ms */
  timeout?: number;
}

export function clipFileName(index: number, prefix: string = DEFAULT_CLIP_PREFIX, extension: string = DEFAULT_CLIP_EXTENSION): string {
  return `${prefix}_${index.toString().padStart(2, '0')}.${extension}`;
}

export class ClipExtractor {
  private ffmpegPath: string;
  private runner: CommandRunner;
  private prefix: string;
  private extension: string;
  private encoding: ClipEncodingPreset;
  private timeout: number;
  private log: Logger;

  constructor(options: ClipExtractorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? executeCommand;
    this.prefix = options.prefix ?? DEFAULT_CLIP_PREFIX;
    this.extension = options.extension ?? DEFAULT_CLIP_EXTENSION;
    this.encoding = options.encoding ?? CLIP_PRESETS[DEFAULT_CLIP_PRESET];
    this.timeout = options.timeout ?? TIMEOUTS.extractionMs;
    this.log = createLogger({ component: 'clip-extractor' });
  }

  outputPathFor(interval: ClipInterval, outputDir: string): string {
    return join(outputDir, clipFileName(interval.index, this.prefix, this.extension));
  }

  buildArgs(inputPath: string, interval: ClipInterval, outputPath: string): string[] {
    return new FFmpegCommandBuilder()
      .addGlobalArg('-hide_banner', '-y')
      .addInput(inputPath, { seekTo: interval.start })
      .setOutputOptions({
        duration: interval.end - interval.start,
        extraArgs: ['-shortest', '-avoid_negative_ts', '1'],
      })
      .map(0, 'v:0')
      .map(0, 'a:0', true)
      .setVideoCodec(this.encoding.video)
      .setAudioCodec(this.encoding.audio)
      // pad short audio so -shortest ends on the video
      .addAudioFilter('apad')
      .setOutput(outputPath)
      .build();
  }

  /**
   * Extract one interval into `outputDir`, which must already exist.
   */
  async extract(inputPath: string, interval: ClipInterval, outputDir: string): Promise<ClipResult> {
    const outputPath = this.outputPathFor(interval, outputDir);
    const args = this.buildArgs(inputPath, interval, outputPath);

    this.log.debug({ inputPath, index: interval.index, args }, 'Extracting clip');

    let failure = await this.runFFmpeg(args);
    let sizeBytes = 0;

    if (failure === undefined) {
      try {
        sizeBytes = await getFileSizeBytes(outputPath);
      } catch (error) {
        failure = `ffmpeg exited cleanly but ${outputPath} is missing: ${errorMessage(error)}`;
      }
    }

    if (failure !== undefined) {
      this.log.warn({ inputPath, index: interval.index, error: failure }, 'Clip extraction failed');
      await this.cleanup(outputPath);
      return { interval, succeeded: false, sizeBytes: 0, error: failure };
    }

    this.log.debug({ outputPath, sizeBytes }, 'Clip written');
    return { interval, succeeded: true, outputPath, sizeBytes };
  }

  /**
   * Extract intervals strictly in order. `onClip` sees each result as it lands.
   */
  async extractAll(
    inputPath: string,
    intervals: readonly ClipInterval[],
    outputDir: string,
    onClip?: (result: ClipResult) => void
  ): Promise<ClipResult[]> {
    const results: ClipResult[] = [];

    for (const interval of intervals) {
      const result = await this.extract(inputPath, interval, outputDir);
      results.push(result);
      onClip?.(result);
    }

    return results;
  }

  /** Returns a failure description, or undefined when ffmpeg exited with 0 */
  private async runFFmpeg(args: string[]): Promise<string | undefined> {
    try {
      const result = await this.runner(this.ffmpegPath, args, { timeout: this.timeout });

      if (result.timedOut) {
        return `ffmpeg timed out after ${this.timeout}ms`;
      }
      if (result.exitCode !== 0) {
        const stderr = tailOutput(result.stderr, 500).trim();
        return stderr ? `ffmpeg exited with code ${result.exitCode}: ${stderr}` : `ffmpeg exited with code ${result.exitCode}`;
      }
      return undefined;
    } catch (error) {
      return `ffmpeg could not be started: ${errorMessage(error)}`;
    }
  }

  private async cleanup(outputPath: string): Promise<void> {
    try {
      if (await removeFileIfExists(outputPath)) {
        this.log.debug({ outputPath }, 'Removed partial clip');
      }
    } catch (error) {
      this.log.warn({ outputPath, error: errorMessage(error) }, 'Could not remove partial clip');
    }
  }
}

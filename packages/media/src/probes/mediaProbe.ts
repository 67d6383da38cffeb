/**
 * Media Probe
 * 
 * Turns ffprobe's stream/format document into a MediaMetadata snapshot.
 */

import { ProbeError } from '@scenecut/core';
import { createLogger, type Logger } from '@scenecut/utils';
import { FFProbe, type FFProbeOptions, type FFProbeResult, type FFProbeStream } from './ffprobe.js';
import type { MediaMetadata } from '../types.js';

export class MediaProbe {
  private ffprobe: FFProbe;
  private log: Logger;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobe = new FFProbe(options);
    this.log = createLogger({ component: 'media-probe' });
  }

  /**
   * Probe a file for duration, resolution, frame rate and audio presence.
   * Rejects with ProbeError when metadata cannot be obtained.
   */
  async probe(filePath: string): Promise<MediaMetadata> {
    this.log.debug({ filePath }, 'Probing media file');

    const outcome = await this.ffprobe.probe(filePath);
    if (!outcome.ok) {
      throw new ProbeError(filePath, outcome.reason, outcome.stderr);
    }

    const metadata = toMediaMetadata(filePath, outcome.result);

    this.log.debug({
      filePath,
      duration: metadata.duration,
      resolution: `${metadata.width}x${metadata.height}`,
      frameRate: metadata.frameRate,
      audioSampleRate: metadata.audioSampleRate,
    }, 'Probe complete');

    return metadata;
  }
}

/**
 * Build metadata from a validated ffprobe document
 */
export function toMediaMetadata(filePath: string, result: FFProbeResult): MediaMetadata {
  const video = result.streams.find(s => s.codec_type === 'video');
  const audio = result.streams.find(s => s.codec_type === 'audio');

  const frameRate = video ? parseFrameRate(filePath, video.r_frame_rate ?? '0/1') : 0;
  const audioSampleRate = audio ? parsePositiveInt(audio.sample_rate) : undefined;

  const metadata: MediaMetadata = {
    filePath,
    formatName: result.format?.format_name ?? 'unknown',
    duration: parseDuration(filePath, result.format?.duration, video),
    width: nonNegativeInt(video?.width),
    height: nonNegativeInt(video?.height),
    frameRate,
    fileSizeBytes: parsePositiveInt(result.format?.size) ?? 0,
    ...(audioSampleRate !== undefined ? { audioSampleRate } : {}),
  };

  return Object.freeze(metadata);
}

/**
 * Parse an ffprobe rational such as "30000/1001".
 * A zero denominator is an error rather than an infinite rate.
 */
export function parseFrameRate(filePath: string, rational: string): number {
  const [numText, denText = '1'] = rational.split('/');
  const num = Number(numText);
  const den = Number(denText);

  if (numText === undefined || numText.trim() === '' || !Number.isFinite(num) || !Number.isFinite(den)) {
    throw new ProbeError(filePath, `invalid frame rate "${rational}"`);
  }
  if (den === 0) {
    throw new ProbeError(filePath, `frame rate "${rational}" has a zero denominator`);
  }

  const fps = num / den;
  if (fps < 0) {
    throw new ProbeError(filePath, `negative frame rate "${rational}"`);
  }
  return fps;
}

function parseDuration(
  filePath: string,
  formatDuration: string | undefined,
  video: FFProbeStream | undefined
): number {
  const text = formatDuration ?? video?.duration;
  if (text === undefined) {
    return 0;
  }

  const duration = Number(text);
  if (!Number.isFinite(duration) || duration < 0) {
    throw new ProbeError(filePath, `invalid duration "${text}"`);
  }
  return duration;
}

function parsePositiveInt(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const value = parseInt(text, 10);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function nonNegativeInt(value: number | undefined): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : 0;
}

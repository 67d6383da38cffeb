/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building the clip extraction command.
 */

import { toFFmpegTime } from '@scenecut/utils';

export interface InputOptions {
  seekTo?: number;        // -ss before input (fast seek)
}

export interface OutputOptions {
  duration?: number;      // -t, output duration
  extraArgs?: string[];   // Additional output args
}

export interface VideoCodecOptions {
  codec: 'libx264';
  preset?: string;
  crf?: number;
}

export interface AudioCodecOptions {
  codec: 'aac';
  bitrate?: string;
}

interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., 'v:0', 'a:0'
  optional: boolean;      // Add ? for optional
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private audioFilters: string[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string, optional: boolean = false): this {
    this.mappings.push({ inputIndex, streamSpec, optional });
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  addAudioFilter(filter: string): this {
    this.audioFilters.push(filter);
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    args.push(...this.globalArgs);

    for (const input of this.inputs) {
      if (input.options.seekTo !== undefined) {
        args.push('-ss', toFFmpegTime(input.options.seekTo));
      }
      args.push('-i', input.file);
    }

    if (this.outputOpts.duration !== undefined) {
      args.push('-t', toFFmpegTime(this.outputOpts.duration));
    }

    for (const mapping of this.mappings) {
      const opt = mapping.optional ? '?' : '';
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}${opt}`);
    }

    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
      if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
      if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
    }

    if (this.audioFilters.length > 0) {
      args.push('-af', this.audioFilters.join(','));
    }

    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

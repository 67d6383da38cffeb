import { describe, it, expect } from 'vitest';
import { FFmpegCommandBuilder } from './commandBuilder.js';

describe('FFmpegCommandBuilder', () => {
  it('requires an output file', () => {
    expect(() => new FFmpegCommandBuilder().addInput('in.mp4').build()).toThrow('Output file not specified');
  });

  it('orders seek, input, duration, maps, codecs and filters before the output', () => {
    const args = new FFmpegCommandBuilder()
      .addGlobalArg('-y')
      .addInput('/videos/my reel.mp4', { seekTo: 1.25 })
      .setOutputOptions({ duration: 4, extraArgs: ['-shortest'] })
      .map(0, 'v:0')
      .map(0, 'a:0', true)
      .setVideoCodec({ codec: 'libx264', preset: 'veryfast', crf: 23 })
      .setAudioCodec({ codec: 'aac', bitrate: '128k' })
      .addAudioFilter('apad')
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual([
      '-y',
      '-ss', '1.250',
      '-i', '/videos/my reel.mp4',
      '-t', '4.000',
      '-map', '0:v:0',
      '-map', '0:a:0?',
      '-c:v', 'libx264', '-preset', 'veryfast', '-crf', '23',
      '-c:a', 'aac', '-b:a', '128k',
      '-af', 'apad',
      '-shortest',
      'out.mp4',
    ]);
  });

  it('omits the options that were not set', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mp4')
      .setVideoCodec({ codec: 'libx264' })
      .setAudioCodec({ codec: 'aac' })
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual(['-i', 'in.mp4', '-c:v', 'libx264', '-c:a', 'aac', 'out.mp4']);
  });

  it('joins audio filters into one chain', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mp4')
      .addAudioFilter('apad')
      .addAudioFilter('volume=0.5')
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual(['-i', 'in.mp4', '-af', 'apad,volume=0.5', 'out.mp4']);
  });

  it('merges output options set more than once', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mp4')
      .setOutputOptions({ duration: 2.5 })
      .setOutputOptions({ extraArgs: ['-shortest'] })
      .setOutput('out.mp4')
      .build();

    expect(args).toEqual(['-i', 'in.mp4', '-t', '2.500', '-shortest', 'out.mp4']);
  });
});

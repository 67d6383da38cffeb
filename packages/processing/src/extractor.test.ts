import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@scenecut/utils';
import { ClipExtractor, clipFileName } from './extractor.js';
import { CLIP_PRESETS } from './presets.js';
import type { ClipInterval, ClipResult } from './types.js';

function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 5, timedOut: false, ...overrides };
}

function outputArg(args: string[]): string {
  const last = args[args.length - 1];
  if (last === undefined) throw new Error('no output argument');
  return last;
}

/** Runner that writes `content` to the output path, then exits with `exitCode` */
function writingRunner(content: string, exitCode: number = 0, stderr: string = ''): CommandRunner {
  return vi.fn<CommandRunner>(async (_command, args) => {
    await writeFile(outputArg(args), content);
    return commandResult({ exitCode, stderr });
  });
}

const interval: ClipInterval = { index: 3, start: 12.5, end: 20.25 };

describe('clipFileName', () => {
  it('zero-pads the index to two digits', () => {
    expect(clipFileName(1)).toBe('clip_01.mp4');
    expect(clipFileName(7, 'reel', 'mov')).toBe('reel_07.mov');
    expect(clipFileName(123)).toBe('clip_123.mp4');
  });
});

describe('ClipExtractor', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scenecut-extract-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('builds a re-encoding command for the interval', () => {
    const extractor = new ClipExtractor();
    const output = join(dir, 'clip_03.mp4');

    expect(extractor.buildArgs('/videos/in.mp4', interval, output)).toEqual([
      '-hide_banner', '-y',
      '-ss', '12.500',
      '-i', '/videos/in.mp4',
      '-t', '7.750',
      '-map', '0:v:0',
      '-map', '0:a:0?',
      '-c:v', 'libx264', '-preset', 'medium', '-crf', '18',
      '-c:a', 'aac', '-b:a', '192k',
      '-af', 'apad',
      '-shortest',
      '-avoid_negative_ts', '1',
      output,
    ]);
  });

  it('uses the configured encoding preset', () => {
    const extractor = new ClipExtractor({ encoding: CLIP_PRESETS.fast });
    const args = extractor.buildArgs('/videos/in.mp4', interval, join(dir, 'out.mp4'));

    expect(args).toContain('veryfast');
    expect(args[args.indexOf('-crf') + 1]).toBe('23');
    expect(args[args.indexOf('-b:a') + 1]).toBe('128k');
  });

  it('reports the written clip and its size', async () => {
    const runner = writingRunner('abc');
    const extractor = new ClipExtractor({ runner, ffmpegPath: '/opt/ffmpeg', timeout: 5000 });

    const result = await extractor.extract('/videos/in.mp4', interval, dir);

    expect(result).toEqual({
      interval,
      succeeded: true,
      outputPath: join(dir, 'clip_03.mp4'),
      sizeBytes: 3,
    });
    expect(runner).toHaveBeenCalledWith('/opt/ffmpeg', expect.any(Array), { timeout: 5000 });
  });

  it('names clips with the configured prefix and extension', async () => {
    const extractor = new ClipExtractor({ runner: writingRunner('x'), prefix: 'scene', extension: 'mkv' });

    const result = await extractor.extract('/videos/in.mp4', interval, dir);

    expect(result.succeeded && result.outputPath).toBe(join(dir, 'scene_03.mkv'));
  });

  it('removes the partial clip when ffmpeg fails', async () => {
    const extractor = new ClipExtractor({ runner: writingRunner('partial', 1, 'Conversion failed!\n') });

    const result = await extractor.extract('/videos/in.mp4', interval, dir);

    expect(result).toEqual({
      interval,
      succeeded: false,
      sizeBytes: 0,
      error: 'ffmpeg exited with code 1: Conversion failed!',
    });
    expect(await readdir(dir)).toEqual([]);
  });

  it('fails when ffmpeg exits cleanly without writing the clip', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(commandResult());
    const extractor = new ClipExtractor({ runner });

    const result = await extractor.extract('/videos/in.mp4', interval, dir);

    expect(result.succeeded).toBe(false);
    expect(!result.succeeded && result.error).toContain('clip_03.mp4 is missing');
  });

  it('reports a timeout', async () => {
    const runner = vi.fn<CommandRunner>().mockResolvedValue(commandResult({ exitCode: -1, timedOut: true }));
    const extractor = new ClipExtractor({ runner, timeout: 5000 });

    const result = await extractor.extract('/videos/in.mp4', interval, dir);

    expect(!result.succeeded && result.error).toBe('ffmpeg timed out after 5000ms');
  });

  it('reports a spawn failure without rejecting', async () => {
    const runner = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ffmpeg ENOENT'));
    const extractor = new ClipExtractor({ runner });

    const result = await extractor.extract('/videos/in.mp4', interval, dir);

    expect(!result.succeeded && result.error).toBe('ffmpeg could not be started: spawn ffmpeg ENOENT');
  });

  it('extracts every interval in order', async () => {
    const runner = writingRunner('clip');
    const extractor = new ClipExtractor({ runner });
    const seen: ClipResult[] = [];

    const results = await extractor.extractAll(
      '/videos/in.mp4',
      [
        { index: 1, start: 0, end: 4 },
        { index: 2, start: 4, end: 9 },
      ],
      dir,
      result => seen.push(result)
    );

    expect(results.map(r => r.succeeded)).toEqual([true, true]);
    expect(seen).toEqual(results);
    expect(vi.mocked(runner).mock.calls.map(([, args]) => outputArg(args))).toEqual([
      join(dir, 'clip_01.mp4'),
      join(dir, 'clip_02.mp4'),
    ]);
  });
});

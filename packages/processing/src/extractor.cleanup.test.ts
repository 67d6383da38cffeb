import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { removeFileIfExists, type CommandRunner } from '@scenecut/utils';
import { ClipExtractor } from './extractor.js';
import type { ClipInterval } from './types.js';

vi.mock('@scenecut/utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@scenecut/utils')>();
  return { ...actual, removeFileIfExists: vi.fn(actual.removeFileIfExists) };
});

const first: ClipInterval = { index: 1, start: 0, end: 4 };
const second: ClipInterval = { index: 2, start: 4, end: 9 };
const busy = new Error('EBUSY: resource busy or locked');

/** Writes a partial clip, then fails */
const failingRunner = vi.fn<CommandRunner>(async (_command, args) => {
  const output = args[args.length - 1];
  if (output === undefined) throw new Error('no output argument');
  await writeFile(output, 'partial');
  return { exitCode: 1, stdout: '', stderr: 'Conversion failed!\n', duration: 5, timedOut: false };
});

describe('ClipExtractor partial clip removal', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scenecut-cleanup-'));
    vi.mocked(removeFileIfExists).mockClear();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps the ffmpeg failure when the partial clip cannot be removed', async () => {
    vi.mocked(removeFileIfExists).mockRejectedValueOnce(busy);
    const extractor = new ClipExtractor({ runner: failingRunner });

    const result = await extractor.extract('/videos/in.mp4', first, dir);

    expect(result).toEqual({
      interval: first,
      succeeded: false,
      sizeBytes: 0,
      error: 'ffmpeg exited with code 1: Conversion failed!',
    });
    expect(removeFileIfExists).toHaveBeenCalledWith(join(dir, 'clip_01.mp4'));
    expect(await readdir(dir)).toEqual(['clip_01.mp4']);
  });

  it('moves on to the next clip after a removal failure', async () => {
    vi.mocked(removeFileIfExists).mockRejectedValueOnce(busy).mockRejectedValueOnce(busy);
    const extractor = new ClipExtractor({ runner: failingRunner });

    const results = await extractor.extractAll('/videos/in.mp4', [first, second], dir);

    expect(results.map(r => r.interval.index)).toEqual([1, 2]);
    expect(results.every(r => !r.succeeded)).toBe(true);
    expect(removeFileIfExists).toHaveBeenCalledTimes(2);
    expect((await readdir(dir)).sort()).toEqual(['clip_01.mp4', 'clip_02.mp4']);
  });
});

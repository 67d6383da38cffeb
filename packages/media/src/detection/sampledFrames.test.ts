import { describe, it, expect } from 'vitest';
import { createSampledFrameStrategy, sampledFrameBoundaries, sampleTimeline } from './sampledFrames.js';
import { makeMetadata } from './fixtures.js';

describe('sampleTimeline', () => {
  it('samples every half second strictly inside the file', () => {
    expect(sampleTimeline(2, 30)).toEqual([0.5, 1, 1.5]);
  });

  it('snaps samples to the frame grid', () => {
    // 0.5s at 5 fps is frame 2.5 -> rounds to frame 3 -> 0.6s
    expect(sampleTimeline(1.2, 5)).toEqual([0.6, 1]);
  });

  it('yields nothing without a frame rate', () => {
    expect(sampleTimeline(10, 0)).toEqual([]);
  });
});

describe('sampledFrameBoundaries', () => {
  it('keeps samples at least minSceneDuration apart', () => {
    expect(sampledFrameBoundaries(10, 30, 3)).toEqual([0, 3, 6, 9, 10]);
  });

  it('reports nothing when no sample reaches the minimum', () => {
    expect(sampledFrameBoundaries(2, 30, 5)).toEqual([]);
  });
});

describe('createSampledFrameStrategy', () => {
  it('fails soft on an unknown frame rate', async () => {
    const strategy = createSampledFrameStrategy();
    await expect(strategy('/videos/a.mp4', makeMetadata({ frameRate: 0 }), 2)).resolves.toEqual([]);
  });

  it('uses metadata duration and frame rate', async () => {
    const strategy = createSampledFrameStrategy();
    const boundaries = await strategy('/videos/a.mp4', makeMetadata({ duration: 10, frameRate: 30 }), 3);
    expect(boundaries).toEqual([0, 3, 6, 9, 10]);
  });
});

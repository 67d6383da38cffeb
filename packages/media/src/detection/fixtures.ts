import type { MediaMetadata } from '../types.js';

export function makeMetadata(overrides: Partial<MediaMetadata> = {}): MediaMetadata {
  return {
    filePath: '/videos/reel.mp4',
    formatName: 'mov,mp4,m4a,3gp,3g2,mj2',
    duration: 60,
    width: 1080,
    height: 1920,
    frameRate: 30,
    audioSampleRate: 48000,
    fileSizeBytes: 8_000_000,
    ...overrides,
  };
}

/**
 * Clip Encoding Presets
 *
 * Clips are always re-encoded; there is no stream-copy preset.
 */

import { ValidationError } from '@scenecut/core';
import type { AudioCodecOptions, VideoCodecOptions } from './commandBuilder.js';

export interface ClipEncodingPreset {
  name: string;
  description: string;
  video: VideoCodecOptions;
  audio: AudioCodecOptions;
}

export const CLIP_PRESETS = {
  quality: {
    name: 'quality',
    description: 'H.264 CRF 18, AAC 192k',
    video: { codec: 'libx264', preset: 'medium', crf: 18 },
    audio: { codec: 'aac', bitrate: '192k' },
  },
  fast: {
    name: 'fast',
    description: 'H.264 CRF 23 veryfast, AAC 128k',
    video: { codec: 'libx264', preset: 'veryfast', crf: 23 },
    audio: { codec: 'aac', bitrate: '128k' },
  },
} as const satisfies Record<string, ClipEncodingPreset>;

export type ClipPresetName = keyof typeof CLIP_PRESETS;

export const DEFAULT_CLIP_PRESET: ClipPresetName = 'quality';

export function isClipPresetName(name: string): name is ClipPresetName {
  return Object.prototype.hasOwnProperty.call(CLIP_PRESETS, name);
}

export function getClipPreset(name: string): ClipEncodingPreset {
  if (!isClipPresetName(name)) {
    throw new ValidationError('preset', `unknown preset "${name}" (expected one of: ${Object.keys(CLIP_PRESETS).join(', ')})`);
  }
  return CLIP_PRESETS[name];
}

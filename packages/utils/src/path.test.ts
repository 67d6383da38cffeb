import { describe, it, expect } from 'vitest';
import { getBasename, getExtension, isVideoFile, sanitizeFilename } from './path.js';

describe('path utilities', () => {
  it('returns the stem without extension', () => {
    expect(getBasename('/videos/reel.final.mp4')).toBe('reel.final');
    expect(getBasename('clip')).toBe('clip');
  });

  it('lowercases extensions', () => {
    expect(getExtension('Holiday.MOV')).toBe('mov');
    expect(getExtension('README')).toBe('');
  });

  it('recognises video containers case-insensitively', () => {
    expect(isVideoFile('a.mp4')).toBe(true);
    expect(isVideoFile('b.MKV')).toBe(true);
    expect(isVideoFile('c.webm')).toBe(true);
    expect(isVideoFile('notes.txt')).toBe(false);
    expect(isVideoFile('mp4')).toBe(false);
  });

  it('replaces reserved characters and trims dots', () => {
    expect(sanitizeFilename('my:reel?')).toBe('my_reel_');
    expect(sanitizeFilename('..hidden..')).toBe('hidden');
  });
});

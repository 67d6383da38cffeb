import { describe, it, expect } from 'vitest';
import {
  DetectionInsufficientError,
  ProbeError,
  SceneCutError,
  SessionBusyError,
  ValidationError,
  errorMessage,
} from './index.js';

describe('error taxonomy', () => {
  it('carries code and details on validation errors', () => {
    const error = new ValidationError('paddingSeconds', 'must be a finite number >= 0');

    expect(error).toBeInstanceOf(SceneCutError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.message).toBe('Validation failed for paddingSeconds: must be a finite number >= 0');
    expect(error.details).toEqual({ field: 'paddingSeconds', message: 'must be a finite number >= 0' });
  });

  it('truncates stderr captured by probe errors', () => {
    const error = new ProbeError('/v/a.mp4', 'ffprobe exited with code 1', 'x'.repeat(1500));

    expect(error.code).toBe('PROBE_ERROR');
    expect(error.message).toBe('Failed to probe /v/a.mp4: ffprobe exited with code 1');
    expect(String(error.details?.['stderr']).length).toBe(1000);
  });

  it('names detection and session errors', () => {
    expect(new DetectionInsufficientError('/v/a.mp4', 0, ['content-change']).code).toBe('DETECTION_INSUFFICIENT');
    expect(new SessionBusyError('s1').message).toBe('Session s1 is already processing');
  });

  it('formats unknown thrown values', () => {
    expect(errorMessage(new Error('bad'))).toBe('bad');
    expect(errorMessage('plain')).toBe('plain');
  });
});

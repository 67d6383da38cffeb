/**
 * Input validation and output layout
 */

import { join } from 'node:path';
import { ValidationError } from '@scenecut/core';
import {
  VIDEO_EXTENSIONS,
  getBasename,
  isRegularFile,
  isVideoFile,
  sanitizeFilename,
} from '@scenecut/utils';

/**
 * Reject anything that is not an existing regular file with a video extension
 */
export async function validateInput(inputPath: string): Promise<void> {
  if (!(await isRegularFile(inputPath))) {
    throw new ValidationError('input', `${inputPath} does not exist or is not a regular file`);
  }
  if (!isVideoFile(inputPath)) {
    throw new ValidationError(
      'input',
      `${inputPath} is not a supported video file (${VIDEO_EXTENSIONS.map(ext => `.${ext}`).join(' ')})`
    );
  }
}

/**
 * Clips for `inputPath` go under `outputRoot/<sanitized stem>/`
 */
export function outputDirFor(outputRoot: string, inputPath: string): string {
  const stem = sanitizeFilename(getBasename(inputPath)) || 'video';
  return join(outputRoot, stem);
}

/**
 * Like {@link outputDirFor}, but a directory already in `taken` gets a
 * numeric suffix (`reel`, `reel_2`, `reel_3`, ...)
 */
export function uniqueOutputDir(
  outputRoot: string,
  inputPath: string,
  taken: ReadonlySet<string>
): string {
  const base = outputDirFor(outputRoot, inputPath);
  let candidate = base;
  for (let n = 2; taken.has(candidate); n++) {
    candidate = `${base}_${n}`;
  }
  return candidate;
}

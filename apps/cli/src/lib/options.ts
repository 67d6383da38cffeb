/**
 * Option parsing
 *
 * Turns raw split flags into a pipeline mode. Commander hands the values
 * over as strings; numeric flags go through the parsers below.
 */

import { InvalidArgumentError } from 'commander';
import { ValidationError } from '@scenecut/core';
import { parseTimeRanges } from '@scenecut/processing';
import type { SplitMode } from '@scenecut/pipeline';

export interface ModeFlags {
  autoDetect?: boolean;
  equalParts?: string;
  timestamps?: string[];
}

const INTEGER_PATTERN = /^\d+$/;

/**
 * Exactly one of --auto-detect, --equal-parts or --timestamps must be given
 */
export function resolveSplitMode(flags: ModeFlags): SplitMode {
  const selected = [
    flags.autoDetect === true,
    flags.equalParts !== undefined,
    flags.timestamps !== undefined,
  ].filter(Boolean).length;

  if (selected !== 1) {
    throw new ValidationError(
      'mode',
      selected === 0
        ? 'choose one of --auto-detect, --equal-parts or --timestamps'
        : 'only one of --auto-detect, --equal-parts or --timestamps may be used'
    );
  }

  if (flags.equalParts !== undefined) {
    const text = flags.equalParts.trim();
    const parts = INTEGER_PATTERN.test(text) ? parseInt(text, 10) : Number.NaN;
    if (!(parts >= 1)) {
      throw new ValidationError('equal-parts', `expected a positive integer, got "${flags.equalParts}"`);
    }
    return { kind: 'equal', parts };
  }

  if (flags.timestamps !== undefined) {
    return { kind: 'timestamps', ranges: parseTimeRanges(flags.timestamps) };
  }

  return { kind: 'auto' };
}

/**
 * Commander parser for second values such as --padding 0.04
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return parsed;
}

/**
 * Commander parser for the 0-1 scene score threshold
 */
export function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

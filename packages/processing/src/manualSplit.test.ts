import { describe, it, expect } from 'vitest';
import { ValidationError } from '@scenecut/core';
import {
  equalPartBoundaries,
  intervalsFromRanges,
  parseTimeRange,
  parseTimeRanges,
} from './manualSplit.js';

describe('parseTimeRange', () => {
  it('parses start,end pairs', () => {
    expect(parseTimeRange('10,20')).toEqual([10, 20]);
    expect(parseTimeRange(' 1.5 , 3 ')).toEqual([1.5, 3]);
  });

  it('rejects malformed ranges', () => {
    expect(() => parseTimeRange('abc')).toThrow(ValidationError);
    expect(() => parseTimeRange('1,2,3')).toThrow(ValidationError);
    expect(() => parseTimeRange('-1,2')).toThrow(ValidationError);
    expect(() => parseTimeRange('1,')).toThrow(ValidationError);
  });

  it('names the offending range', () => {
    expect(() => parseTimeRange('5;9')).toThrow('Validation failed for timestamps: "5;9" is not a start,end pair');
  });
});

describe('parseTimeRanges', () => {
  it('requires at least one range', () => {
    expect(() => parseTimeRanges([])).toThrow(ValidationError);
  });

  it('keeps the given order', () => {
    expect(parseTimeRanges(['30,40', '0,10'])).toEqual([[30, 40], [0, 10]]);
  });
});

describe('intervalsFromRanges', () => {
  it('keeps valid ranges and skips the rest', () => {
    const plan = intervalsFromRanges([[0, 10], [5, 70], [20, 15], [30, 40]], 60);

    expect(plan.intervals).toEqual([
      { index: 1, start: 0, end: 10 },
      { index: 2, start: 30, end: 40 },
    ]);
    expect(plan.skipped).toEqual([
      { pairIndex: 1, start: 5, end: 70, reason: 'out-of-range' },
      { pairIndex: 2, start: 20, end: 15, reason: 'empty-range' },
    ]);
  });

  it('accepts a range ending exactly at the duration', () => {
    expect(intervalsFromRanges([[50, 60]], 60).intervals).toEqual([{ index: 1, start: 50, end: 60 }]);
  });
});

describe('equalPartBoundaries', () => {
  it('divides the duration evenly', () => {
    expect(equalPartBoundaries(60, 3)).toEqual([0, 20, 40, 60]);
    expect(equalPartBoundaries(10, 4)).toEqual([0, 2.5, 5, 7.5, 10]);
    expect(equalPartBoundaries(8, 1)).toEqual([0, 8]);
  });

  it('rejects part counts that are not positive integers', () => {
    expect(() => equalPartBoundaries(60, 0)).toThrow(ValidationError);
    expect(() => equalPartBoundaries(60, 2.5)).toThrow(ValidationError);
  });

  it('rejects more parts than seconds', () => {
    expect(() => equalPartBoundaries(5, 6)).toThrow('Validation failed for parts: cannot split a 5s file into 6 parts');
  });
});

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@scenecut/core';
import { planClips, plannedDuration } from './planner.js';

describe('planClips', () => {
  it('pads both sides of every cut', () => {
    const plan = planClips([0, 5, 30], 30, 0.04);

    expect(plan.skipped).toEqual([]);
    expect(plan.intervals).toHaveLength(2);
    expect(plan.intervals[0]?.index).toBe(1);
    expect(plan.intervals[0]?.start).toBeCloseTo(0.04, 9);
    expect(plan.intervals[0]?.end).toBeCloseTo(4.96, 9);
    expect(plan.intervals[1]?.index).toBe(2);
    expect(plan.intervals[1]?.start).toBeCloseTo(5.04, 9);
    expect(plan.intervals[1]?.end).toBeCloseTo(29.96, 9);
  });

  it('keeps an interval that lands exactly on the minimum after padding', () => {
    // 0.18 - 2 * 0.04 = 0.1
    const plan = planClips([0, 0.18], 0.18, 0.04, { minClipDuration: 0.1 });

    expect(plan.intervals).toHaveLength(1);
    expect(plan.skipped).toEqual([]);
  });

  it('skips an interval just under the minimum after padding', () => {
    // 0.17 - 2 * 0.04 = 0.09
    const plan = planClips([0, 0.17], 0.17, 0.04, { minClipDuration: 0.1 });

    expect(plan.intervals).toEqual([]);
    expect(plan.skipped).toHaveLength(1);
    expect(plan.skipped[0]?.pairIndex).toBe(0);
    expect(plan.skipped[0]?.reason).toBe('too-short');
  });

  it('plans one near-full clip when only the endpoints are known', () => {
    const plan = planClips([0, 60], 60, 0.04);

    expect(plan.intervals).toHaveLength(1);
    expect(plan.intervals[0]?.start).toBeCloseTo(0.04, 9);
    expect(plan.intervals[0]?.end).toBeCloseTo(59.96, 9);
  });

  it('numbers kept intervals consecutively around a skipped pair', () => {
    const plan = planClips([0, 5, 5.1, 30, 60], 60, 0.04);

    expect(plan.intervals.map(i => i.index)).toEqual([1, 2, 3]);
    expect(plan.skipped.map(s => s.pairIndex)).toEqual([1]);
  });

  it('clamps to the file bounds', () => {
    expect(planClips([0, 10], 10, 0).intervals).toEqual([{ index: 1, start: 0, end: 10 }]);
    expect(planClips([0, 12], 10, 0).intervals).toEqual([{ index: 1, start: 0, end: 10 }]);
  });

  it('returns an empty plan for fewer than two boundaries', () => {
    expect(planClips([], 10, 0.04)).toEqual({ intervals: [], skipped: [] });
    expect(planClips([0], 10, 0.04)).toEqual({ intervals: [], skipped: [] });
  });

  it('rejects negative or non-finite padding', () => {
    expect(() => planClips([0, 10], 10, -0.01)).toThrow(ValidationError);
    expect(() => planClips([0, 10], 10, Number.NaN)).toThrow(ValidationError);
    expect(() => planClips([0, 10], 10, Number.POSITIVE_INFINITY)).toThrow(ValidationError);
  });

  it('produces deep-equal plans for identical inputs', () => {
    const boundaries = [0, 3.2, 7.9, 8, 15.5, 40];
    expect(planClips(boundaries, 40, 0.04)).toEqual(planClips(boundaries, 40, 0.04));
  });

  it('yields ordered, non-overlapping intervals', () => {
    const plan = planClips([0, 2, 2.05, 6.5, 9, 9.1, 14, 20], 20, 0.04);

    for (const interval of plan.intervals) {
      expect(interval.end).toBeGreaterThan(interval.start);
    }
    for (let i = 1; i < plan.intervals.length; i++) {
      const previous = plan.intervals[i - 1];
      const current = plan.intervals[i];
      if (!previous || !current) throw new Error('missing interval');
      expect(current.start).toBeGreaterThanOrEqual(previous.end);
      expect(current.index).toBe(previous.index + 1);
    }
  });

  it('accounts for the whole duration through padding and skipped spans', () => {
    const boundaries = [0, 5, 5.1, 30, 60];
    const padding = 0.04;
    const plan = planClips(boundaries, 60, padding);

    const skippedSpan = plan.skipped.reduce((sum, s) => {
      const from = boundaries[s.pairIndex] ?? 0;
      const to = boundaries[s.pairIndex + 1] ?? 0;
      return sum + (to - from);
    }, 0);

    const total = plannedDuration(plan) + 2 * padding * plan.intervals.length + skippedSpan;
    expect(total).toBeCloseTo(60, 6);
  });
});

/**
 * Tests for progress math, throttling and formatting
 */

import { describe, it, expect } from 'vitest';
import {
  ProgressThrottle,
  computeSample,
  formatProgressBlock,
  formatTargetBanner,
} from '../src/core/progress.js';
import type { Target } from '../src/core/types.js';

const target: Target = {
  raw: 'a.example.com/',
  text: 'a.example.com',
  ordinal: 2,
  safeName: 'a.example.com',
  urlTemplate: 'https://a.example.com/FUZZ',
};

describe('computeSample', () => {
  it('should compute remaining work from result records', () => {
    expect(computeSample(37, 100)).toEqual({
      completed: 37,
      total: 100,
      remaining: 63,
      percentRemaining: 63,
    });
  });

  it('should floor the completed percentage', () => {
    // 1 of 3 done is 33.3%, so 67% remains
    expect(computeSample(1, 3).percentRemaining).toBe(67);
  });

  it('should floor the total to 1', () => {
    expect(computeSample(0, 0)).toEqual({
      completed: 0,
      total: 1,
      remaining: 1,
      percentRemaining: 100,
    });
  });

  it('should stay within 0..100 for every completed count', () => {
    const total = 257;
    for (let completed = 0; completed <= total; completed++) {
      const { percentRemaining, remaining } = computeSample(completed, total);
      expect(percentRemaining).toBeGreaterThanOrEqual(0);
      expect(percentRemaining).toBeLessThanOrEqual(100);
      expect(remaining).toBe(total - completed);
    }
  });

  it('should clamp overshooting counts', () => {
    expect(computeSample(150, 100)).toMatchObject({ remaining: 0, percentRemaining: 0 });
  });
});

describe('ProgressThrottle', () => {
  it('should emit exactly once per distinct percentage', () => {
    const total = 40;
    const completedSeries = [0, 0, 1, 1, 2, 5, 5, 20, 20, 39, 40, 40];
    const throttle = new ProgressThrottle();

    const emitted = completedSeries
      .map((completed) => computeSample(completed, total))
      .filter((sample) => throttle.shouldEmit(sample))
      .map((sample) => sample.percentRemaining);

    const distinct = [
      ...new Set(completedSeries.map((c) => computeSample(c, total).percentRemaining)),
    ];
    expect(emitted).toEqual(distinct);
    expect(emitted).toEqual([100, 98, 95, 88, 50, 3, 0]);
    expect(throttle.lastEmitted).toBe(0);
  });

  it('should resume from a previously emitted value', () => {
    const throttle = new ProgressThrottle(63);

    expect(throttle.shouldEmit(computeSample(37, 100))).toBe(false);
    expect(throttle.shouldEmit(computeSample(38, 100))).toBe(true);
  });
});

describe('formatting', () => {
  it('should render the target banner', () => {
    expect(formatTargetBanner(target, 5)).toBe(
      [
        '',
        '==============================================',
        '[2/5] Starting: a.example.com',
        '==============================================',
      ].join('\n')
    );
  });

  it('should render the progress block', () => {
    const block = formatProgressBlock({
      target,
      wordlistPath: '/lists/common.txt',
      sample: computeSample(37, 100),
      logPath: '/out/a.example.com/a.example.com.log',
    });

    expect(block.split('\n')).toEqual([
      '',
      '    Subdomain : a.example.com',
      '    Wordlist  : common.txt (total lines: 100)',
      '    Tried     : 37',
      '    Remaining : 63 (63%)',
      '    Log file  : /out/a.example.com/a.example.com.log',
      '',
    ]);
  });
});

/**
 * Progress math and formatting
 */

import { basename } from 'path';
import type { ProgressSample, Target } from './types.js';

const RULE = '='.repeat(46);

/**
 * Compute remaining work from a completed count. `total` is floored to 1.
 */
export function computeSample(completed: number, total: number): ProgressSample {
  const safeTotal = Math.max(1, total);
  const done = Math.max(0, completed);
  const remaining = Math.max(0, safeTotal - done);
  const percentDone = Math.floor((done * 100) / safeTotal);
  const percentRemaining = Math.min(100, Math.max(0, 100 - percentDone));

  return { completed: done, total: safeTotal, remaining, percentRemaining };
}

/**
 * A title framed by rules, preceded by a blank line
 */
export function formatBanner(title: string): string {
  return ['', RULE, title, RULE].join('\n');
}

export function formatTargetBanner(target: Target, total: number): string {
  return formatBanner(`[${target.ordinal}/${total}] Starting: ${target.text}`);
}

export interface ProgressBlockInput {
  target: Target;
  wordlistPath: string;
  sample: ProgressSample;
  logPath: string;
}

/**
 * Multi-line progress block printed in heuristic mode
 */
export function formatProgressBlock({
  target,
  wordlistPath,
  sample,
  logPath,
}: ProgressBlockInput): string {
  return [
    '',
    `    Subdomain : ${target.text}`,
    `    Wordlist  : ${basename(wordlistPath)} (total lines: ${sample.total})`,
    `    Tried     : ${sample.completed}`,
    `    Remaining : ${sample.remaining} (${sample.percentRemaining}%)`,
    `    Log file  : ${logPath}`,
    '',
  ].join('\n');
}

/**
 * Emits only when the displayed percentage changes, however often it is sampled
 */
export class ProgressThrottle {
  private last: number | null;

  constructor(last: number | null = null) {
    this.last = last;
  }

  /**
   * Returns true, and records the value, when `percentRemaining` differs from the last emitted one
   */
  shouldEmit(sample: ProgressSample): boolean {
    if (sample.percentRemaining === this.last) {
      return false;
    }
    this.last = sample.percentRemaining;
    return true;
  }

  get lastEmitted(): number | null {
    return this.last;
  }
}

/**
 * Output directory naming and layout
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { Target, TargetLayout } from './types.js';

export const RUN_DIR_PREFIX = 'ffuf-results_';

/**
 * Map every character outside [A-Za-z0-9._-] to `_`. Length and positions are kept.
 * Distinct targets can collide; callers share the directory in that case.
 */
export function safeName(raw: string): string {
  return raw.replace(/[^A-Za-z0-9._-]/g, '_');
}

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Local-time stamp with second resolution, e.g. 20240131_235959
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Create the run directory once at startup
 */
export async function createRunRoot(outputRoot: string, startedAt: Date): Promise<string> {
  const runDir = join(outputRoot, `${RUN_DIR_PREFIX}${formatTimestamp(startedAt)}`);
  await mkdir(runDir, { recursive: true });
  return runDir;
}

/**
 * Ensure the per-target directory exists and return where its log goes
 */
export async function layout(
  runRoot: string,
  target: Pick<Target, 'safeName'>
): Promise<TargetLayout> {
  const dir = join(runRoot, target.safeName);
  await mkdir(dir, { recursive: true });
  return { dir, logPath: join(dir, `${target.safeName}.log`) };
}

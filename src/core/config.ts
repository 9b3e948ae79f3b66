/**
 * Run configuration: pre-flight checks and the immutable RunConfiguration
 */

import { access, constants, stat } from 'fs/promises';
import { resolve } from 'path';
import { CapabilityDetector } from './capabilities.js';
import { InputError, ToolMissingError } from './errors.js';
import { createRunRoot } from './layout.js';
import { logger } from '../utils/logger.js';
import type { Capabilities, ProgressStrategy, RunConfiguration } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_COOLDOWN_MS = 1000;

export interface RunOptions {
  targetsPath: string;
  wordlistPath: string;
  extraArgs?: string[];
  outputRoot?: string;
  ffufPath?: string;
  pvPath?: string;
  pollIntervalMs?: number;
  cooldownMs?: number;
  forceHeuristic?: boolean;
  quiet?: boolean;
  startedAt?: Date;
}

export type CapabilityProbe = Pick<CapabilityDetector, 'detect' | 'isToolInstalled'>;

/**
 * The strategy is picked once per run
 */
export function selectStrategy(
  capabilities: Capabilities,
  forceHeuristic = false
): ProgressStrategy {
  return capabilities.streamingAvailable && !forceHeuristic ? 'exact' : 'heuristic';
}

async function requireFile(path: string, label: string): Promise<void> {
  let isFile = false;
  try {
    isFile = (await stat(path)).isFile();
  } catch (error) {
    logger.debug(`stat ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isFile) {
    throw new InputError(`${label} file not found: ${path}`, path);
  }

  try {
    await access(path, constants.R_OK);
  } catch {
    throw new InputError(`${label} file not readable: ${path}`, path);
  }
}

/**
 * Validate inputs, detect capabilities, create the run directory and freeze the result
 */
export async function prepareRun(
  options: RunOptions,
  probe?: CapabilityProbe
): Promise<RunConfiguration> {
  const ffufPath = options.ffufPath ?? 'ffuf';
  const pvPath = options.pvPath ?? 'pv';
  const detector = probe ?? new CapabilityDetector(ffufPath, pvPath);

  await requireFile(options.targetsPath, 'Subdomain');
  await requireFile(options.wordlistPath, 'Wordlist');

  if (!(await detector.isToolInstalled(ffufPath))) {
    throw new ToolMissingError(ffufPath);
  }

  const capabilities = Object.freeze(await detector.detect());
  const startedAt = options.startedAt ?? new Date();
  const outputRoot = resolve(options.outputRoot ?? process.cwd());
  const runDir = await createRunRoot(outputRoot, startedAt);

  return Object.freeze({
    targetsPath: options.targetsPath,
    wordlistPath: options.wordlistPath,
    extraArgs: Object.freeze([...(options.extraArgs ?? [])]),
    capabilities,
    strategy: selectStrategy(capabilities, options.forceHeuristic),
    startedAt,
    outputRoot,
    runDir,
    ffufPath,
    pvPath,
    pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    cooldownMs: options.cooldownMs ?? DEFAULT_COOLDOWN_MS,
    quiet: options.quiet ?? false,
  });
}

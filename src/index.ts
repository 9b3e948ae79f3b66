/**
 * fuzzsweep - sequential multi-target ffuf runner
 * Main entry point for programmatic usage
 */

import { App } from './core/app.js';
import { prepareRun } from './core/config.js';
import type { RunOptions } from './core/config.js';
import type { OutputWriter, RunSummary } from './core/types.js';

export { App } from './core/app.js';
export { CapabilityDetector } from './core/capabilities.js';
export { TargetEnumerator, normalizeTarget, buildUrlTemplate } from './core/targets.js';
export { safeName, layout, createRunRoot } from './core/layout.js';
export { prepareRun, selectStrategy } from './core/config.js';
export type { RunOptions, CapabilityProbe } from './core/config.js';
export { JobRunner } from './ffuf/runner.js';
export * from './core/errors.js';
export * from './core/types.js';
export { VERSION } from './version.js';

/**
 * One-call sweep for programmatic usage
 * @example
 * ```typescript
 * import { sweep } from 'fuzzsweep';
 *
 * const summary = await sweep({
 *   targetsPath: 'subdomains.txt',
 *   wordlistPath: 'words.txt',
 *   extraArgs: ['-t', '20'],
 * });
 * ```
 */
export async function sweep(options: RunOptions, write?: OutputWriter): Promise<RunSummary> {
  const config = await prepareRun(options);
  const app = new App(config, write);
  return await app.run();
}

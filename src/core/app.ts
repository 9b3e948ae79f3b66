/**
 * Main application orchestrator
 */
import chalk from 'chalk';
import { JobRunner } from '../ffuf/runner.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/concurrency.js';
import { layout } from './layout.js';
import { formatBanner, formatTargetBanner } from './progress.js';
import { TargetEnumerator } from './targets.js';
import type { OutputWriter, RunConfiguration, RunState, RunSummary } from './types.js';

const PERMISSION_REMINDER =
  'IMPORTANT: Only scan targets you own or have explicit permission to test.';

/**
 * Drives the sequential loop over targets
 */
export class App {
  private readonly runner: JobRunner;
  private readonly write: OutputWriter;
  private readonly state: RunState = {
    total: 0,
    outcomes: [],
    seenSafeNames: new Set<string>(),
    stopped: false,
  };

  constructor(
    private readonly config: RunConfiguration,
    write?: OutputWriter
  ) {
    this.write = write ?? (config.quiet ? () => undefined : (line: string) => console.log(line));
    this.runner = new JobRunner({
      ffufPath: config.ffufPath,
      pvPath: config.pvPath,
      wordlistPath: config.wordlistPath,
      extraArgs: config.extraArgs,
      strategy: config.strategy,
      pollIntervalMs: config.pollIntervalMs,
      write: this.write,
    });

    logger.setQuiet(config.quiet);
  }

  /**
   * Process every target in order. Resolves once the last job and its cool-down are done,
   * or as soon as the active job ends after `stop()`.
   */
  async run(): Promise<RunSummary> {
    const startTime = Date.now();
    const enumerator = new TargetEnumerator(this.config.targetsPath);

    this.state.total = await enumerator.count();
    logger.info(
      `${this.state.total} targets, ${this.config.strategy} progress mode, output in ${this.config.runDir}`
    );

    for await (const target of enumerator.enumerate()) {
      if (this.state.stopped) {
        break;
      }

      this.write(chalk.cyan.bold(formatTargetBanner(target, this.state.total)));

      if (this.state.seenSafeNames.has(target.safeName)) {
        logger.warn(
          `${target.text} shares the directory name ${target.safeName} with an earlier target`
        );
      }
      this.state.seenSafeNames.add(target.safeName);

      const targetLayout = await layout(this.config.runDir, target);
      const outcome = await this.runner.run(target, targetLayout);
      this.state.outcomes.push(outcome);

      if (this.state.stopped) {
        break;
      }
      await sleep(this.config.cooldownMs);
    }

    this.write(
      this.state.stopped
        ? chalk.red.bold(formatBanner(`Interrupted. Partial results: ${this.config.runDir}`))
        : chalk.green.bold(formatBanner(`All done. Results: ${this.config.runDir}`))
    );
    this.write(chalk.yellow(PERMISSION_REMINDER));
    logger.success(`Processed ${this.state.outcomes.length} of ${this.state.total} targets`);

    return {
      runDir: this.config.runDir,
      strategy: this.config.strategy,
      total: this.state.total,
      outcomes: [...this.state.outcomes],
      interrupted: this.state.stopped,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Stop after the active job; the signal is forwarded to its processes
   */
  stop(signal: NodeJS.Signals = 'SIGINT'): void {
    this.state.stopped = true;
    this.runner.interrupt(signal);
  }
}

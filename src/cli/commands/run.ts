/**
 * Run command implementation
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App } from '../../core/app.js';
import { prepareRun } from '../../core/config.js';
import { exitCodeFor } from '../../core/errors.js';
import { logger } from '../../utils/logger.js';

const INTERRUPTED_EXIT_CODE = 130;

interface RunCommandOptions {
  output: string;
  ffuf: string;
  pv: string;
  interval: number;
  cooldown: number;
  heuristic: boolean;
  verbose: boolean;
  quiet: boolean;
}

/**
 * Commander option parser for non-negative integers
 */
export function parseMilliseconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export const runCommand = new Command('run')
  .description('Fuzz every target in the list with the same wordlist')
  .argument('<targets>', 'File with one subdomain or URL per line')
  .argument('<wordlist>', 'Wordlist shared by every target')
  .argument('[ffuf-args...]', 'Extra ffuf arguments, appended after the built-in ones')
  .option('-o, --output <dir>', 'Directory that receives the timestamped run folder', '.')
  .option('--ffuf <path>', 'ffuf binary', 'ffuf')
  .option('--pv <path>', 'pv binary', 'pv')
  .option('--interval <ms>', 'Heuristic progress poll interval', parseMilliseconds, 1000)
  .option('--cooldown <ms>', 'Pause between targets', parseMilliseconds, 1000)
  .option('--heuristic', 'Use heuristic progress even when pv streaming is available', false)
  .option('--verbose', 'Print debug logs', false)
  .option('-q, --quiet', 'Suppress progress output', false)
  .passThroughOptions()
  .exitOverride()
  .action(
    async (
      targetsPath: string,
      wordlistPath: string,
      extraArgs: string[],
      options: RunCommandOptions
    ) => {
      if (options.verbose) {
        logger.setLevel('debug');
      }

      try {
        const config = await prepareRun({
          targetsPath,
          wordlistPath,
          extraArgs,
          outputRoot: options.output,
          ffufPath: options.ffuf,
          pvPath: options.pv,
          pollIntervalMs: options.interval,
          cooldownMs: options.cooldown,
          forceHeuristic: options.heuristic,
          quiet: options.quiet,
        });

        const app = new App(config);
        let signalled = false;
        const onSignal = (signal: NodeJS.Signals) => {
          if (signalled) {
            process.exit(INTERRUPTED_EXIT_CODE);
          }
          signalled = true;
          logger.warn(`Received ${signal}, stopping after the current target`);
          app.stop(signal);
        };
        process.on('SIGINT', onSignal);
        process.on('SIGTERM', onSignal);

        const summary = await app.run();

        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        process.exit(summary.interrupted ? INTERRUPTED_EXIT_CODE : 0);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(chalk.red(message));
        process.exit(exitCodeFor(error));
      }
    }
  );

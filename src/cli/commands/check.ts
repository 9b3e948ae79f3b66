import { Command } from 'commander';
import chalk from 'chalk';
import { CapabilityDetector } from '../../core/capabilities.js';
import { selectStrategy } from '../../core/config.js';

const mark = (ok: boolean) => (ok ? chalk.green('yes') : chalk.yellow('no'));

export const checkCommand = new Command('check')
  .description('Report which progress mode a run would use on this host')
  .option('--ffuf <path>', 'ffuf binary', 'ffuf')
  .option('--pv <path>', 'pv binary', 'pv')
  .exitOverride()
  .action(async (options: { ffuf: string; pv: string }) => {
    const detector = new CapabilityDetector(options.ffuf, options.pv);
    const installed = await detector.isToolInstalled();
    const capabilities = await detector.detect();
    const strategy = selectStrategy(capabilities);

    console.log(chalk.cyan.bold('\n   Host capabilities'));
    console.log(chalk.gray('   ├─ ffuf installed      : ') + mark(installed));
    console.log(chalk.gray('   ├─ pv available        : ') + mark(capabilities.pvAvailable));
    console.log(chalk.gray('   ├─ ffuf reads stdin    : ') + mark(capabilities.stdinSupported));
    console.log(
      chalk.gray('   └─ Progress mode       : ') +
        (strategy === 'exact'
          ? chalk.green.bold('exact (pv -> ffuf streaming)')
          : chalk.yellow.bold('heuristic (polled JSON results)'))
    );
    console.log();

    if (!installed) {
      console.error(chalk.red(`${options.ffuf} not installed or not in PATH`));
      process.exitCode = 4;
    }
  });

#!/usr/bin/env node

/**
 * fuzzsweep CLI entry point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { runCommand } from './commands/run.js';
import { checkCommand } from './commands/check.js';
import { VERSION } from '../version.js';

const program = new Command();

program
  .name('fuzzsweep')
  .description('Run ffuf against a list of subdomains, one target at a time')
  .version(VERSION)
  .enablePositionalOptions();

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('FUZZSWEEP')} ${chalk.gray(`v${VERSION}`)}                                      ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Sequential ffuf runs with per-target progress')}            ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(runCommand);
program.addCommand(checkCommand);

// Usage errors exit with 2; help and version exit cleanly
program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode === 0 ? 0 : 2);
  }
  if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exit(1);
  }
  throw error;
}

/**
 * ffuf job runner: launches one target at a time and reports its progress
 */

import { spawn } from 'child_process';
import type { ChildProcess, StdioOptions } from 'child_process';
import { mkdtemp, open, rm } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { InputError } from '../core/errors.js';
import { computeSample, formatProgressBlock, ProgressThrottle } from '../core/progress.js';
import type {
  JobOutcome,
  JobState,
  OutputWriter,
  ProgressSample,
  ProgressStrategy,
  Target,
  TargetLayout,
} from '../core/types.js';
import { createSerialGate, sleep } from '../utils/concurrency.js';
import { countLines, countMarkers } from '../utils/files.js';
import { logger } from '../utils/logger.js';
import { formatCommand } from '../utils/shell.js';
import { buildHeuristicArgs, buildPvArgs, buildStreamingArgs } from './command.js';

/**
 * ffuf writes one `"status"` key per result record in its JSON output
 */
export const RESULT_MARKER = '"status"';

export interface JobRunnerOptions {
  ffufPath: string;
  pvPath: string;
  wordlistPath: string;
  extraArgs: readonly string[];
  strategy: ProgressStrategy;
  pollIntervalMs: number;
  write?: OutputWriter;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface Supervised {
  proc: ChildProcess;
  exited: Promise<ExitStatus>;
  isAlive: () => boolean;
}

/**
 * Runs ffuf against targets strictly one after another
 */
export class JobRunner {
  private readonly gate = createSerialGate();
  private readonly active = new Set<ChildProcess>();
  private readonly write: OutputWriter;

  constructor(private readonly options: JobRunnerOptions) {
    this.write = options.write ?? ((line: string) => console.log(line));
  }

  /**
   * Run one target to completion. Calls made while a job is active wait their turn.
   * A failing ffuf run still resolves; its exit status is in the outcome.
   */
  run(target: Target, targetLayout: TargetLayout): Promise<JobOutcome> {
    return this.gate(() => this.execute(target, targetLayout));
  }

  /**
   * Forward a signal to every process of the active job
   */
  interrupt(signal: NodeJS.Signals = 'SIGINT'): void {
    for (const proc of this.active) {
      logger.debug(`Sending ${signal} to pid ${proc.pid ?? '?'}`);
      proc.kill(signal);
    }
  }

  get activeProcessCount(): number {
    return this.active.size;
  }

  private async execute(target: Target, targetLayout: TargetLayout): Promise<JobOutcome> {
    const state: JobState = { phase: 'pending', lastPercentRemaining: null };
    const startTime = new Date();

    const totalLines = await this.wordlistTotal();
    this.write(`Using wordlist: ${this.options.wordlistPath} (lines: ${totalLines})`);

    state.phase = 'launching';
    const log = await open(targetLayout.logPath, 'w');
    let status: ExitStatus;

    try {
      status =
        this.options.strategy === 'exact'
          ? await this.runStreaming(target, log, totalLines, state)
          : await this.runHeuristic(target, targetLayout, log, totalLines, state);
    } finally {
      await log.close();
    }

    state.phase = 'completed';
    if (status.code !== 0) {
      logger.debug(
        `ffuf for ${target.text} ended with code ${status.code ?? 'none'} signal ${status.signal ?? 'none'}`
      );
    }
    this.write(`Finished: ${target.text} -- log: ${targetLayout.logPath}`);

    return {
      target,
      strategy: this.options.strategy,
      logPath: targetLayout.logPath,
      exitCode: status.code,
      signal: status.signal,
      startTime,
      endTime: new Date(),
    };
  }

  /**
   * Wordlist line count, floored to 1 so percentages never divide by zero
   */
  private async wordlistTotal(): Promise<number> {
    try {
      return Math.max(1, await countLines(this.options.wordlistPath));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InputError(
        `Wordlist not readable: ${this.options.wordlistPath} (${reason})`,
        this.options.wordlistPath
      );
    }
  }

  /**
   * pv reads the wordlist and feeds ffuf's stdin; pv draws its own exact progress bar
   */
  private async runStreaming(
    target: Target,
    log: FileHandle,
    totalLines: number,
    state: JobState
  ): Promise<ExitStatus> {
    const { ffufPath, pvPath, wordlistPath, extraArgs } = this.options;
    const pvArgs = buildPvArgs(wordlistPath, totalLines, target.safeName);
    const ffufArgs = buildStreamingArgs(target, extraArgs);

    this.write(chalk.green('Using pv -> ffuf streaming mode (exact per-wordlist progress)'));
    this.write(
      `Running command: ${formatCommand(pvPath, pvArgs)} | ${formatCommand(ffufPath, ffufArgs)}`
    );

    const pv = this.launch(pvPath, pvArgs, ['ignore', 'pipe', 'inherit']);
    if (!pv.proc.stdout) {
      pv.proc.kill('SIGTERM');
      await pv.exited;
      throw new Error('pv stdout is not available');
    }

    const ffuf = this.launch(ffufPath, ffufArgs, [pv.proc.stdout, log.fd, log.fd]);
    // ffuf owns the read end now; the parent's copy would keep pv from closing
    pv.proc.stdout.destroy();
    state.phase = 'running';

    const status = await ffuf.exited;
    if (pv.isAlive()) {
      pv.proc.kill('SIGTERM');
    }
    await pv.exited;
    this.write('');

    return status;
  }

  /**
   * ffuf writes JSON results to a temporary file that is polled for a completed count
   */
  private async runHeuristic(
    target: Target,
    targetLayout: TargetLayout,
    log: FileHandle,
    totalLines: number,
    state: JobState
  ): Promise<ExitStatus> {
    const { ffufPath, wordlistPath, extraArgs, pollIntervalMs } = this.options;
    const tmpDir = await mkdtemp(join(tmpdir(), 'fuzzsweep-'));
    const resultsPath = join(tmpDir, 'results.json');
    const ffufArgs = buildHeuristicArgs(target, wordlistPath, resultsPath, extraArgs);

    this.write(
      chalk.yellow('pv/stdin streaming unavailable - using heuristic progress (approximate)')
    );
    this.write(`Running command: ${formatCommand(ffufPath, ffufArgs)}`);

    try {
      await log.write(`Running: ffuf -u ${target.urlTemplate} -w ${wordlistPath}\n`);
      const ffuf = this.launch(ffufPath, ffufArgs, ['ignore', log.fd, log.fd]);
      state.phase = 'running';

      const throttle = new ProgressThrottle(state.lastPercentRemaining);
      while (ffuf.isAlive()) {
        await sleep(pollIntervalMs);
        const sample = await this.sample(resultsPath, totalLines);
        if (throttle.shouldEmit(sample)) {
          state.lastPercentRemaining = sample.percentRemaining;
          this.write(
            formatProgressBlock({
              target,
              wordlistPath,
              sample,
              logPath: targetLayout.logPath,
            })
          );
        }
      }

      return await ffuf.exited;
    } finally {
      await rm(tmpDir, { recursive: true, force: true });
    }
  }

  /**
   * Results are read while ffuf may still be writing them, so the count can lag.
   * An absent or unreadable file counts as zero.
   */
  private async sample(resultsPath: string, totalLines: number): Promise<ProgressSample> {
    let completed = 0;
    try {
      completed = await countMarkers(resultsPath, RESULT_MARKER);
    } catch (error) {
      logger.debug(
        `Results file not readable yet: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return computeSample(completed, totalLines);
  }

  private launch(command: string, args: string[], stdio: StdioOptions): Supervised {
    const proc = spawn(command, args, { stdio });
    let alive = true;
    this.active.add(proc);
    logger.debug(`Started ${command} (pid ${proc.pid ?? '?'})`);

    const exited = new Promise<ExitStatus>((resolve) => {
      const settle = (status: ExitStatus) => {
        if (!alive) {
          return;
        }
        alive = false;
        this.active.delete(proc);
        resolve(status);
      };

      proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        settle({ code, signal });
      });

      proc.on('error', (error: Error) => {
        logger.warn(`${command} failed to run: ${error.message}`);
        settle({ code: null, signal: null });
      });
    });

    return { proc, exited, isAlive: () => alive };
  }
}

// src/core/types.ts
/**
 * Type definitions for fuzzsweep
 */

/**
 * Host capabilities detected once at startup
 */
export interface Capabilities {
  pvAvailable: boolean;
  stdinSupported: boolean;
  streamingAvailable: boolean;
}

/**
 * Progress strategy, chosen once per run
 */
export type ProgressStrategy = 'exact' | 'heuristic';

/**
 * Immutable run configuration
 */
export interface RunConfiguration {
  readonly targetsPath: string;
  readonly wordlistPath: string;
  readonly extraArgs: readonly string[];
  readonly capabilities: Readonly<Capabilities>;
  readonly strategy: ProgressStrategy;
  readonly startedAt: Date;
  readonly outputRoot: string;
  readonly runDir: string;
  readonly ffufPath: string;
  readonly pvPath: string;
  readonly pollIntervalMs: number;
  readonly cooldownMs: number;
  readonly quiet: boolean;
}

/**
 * One normalized entry of the target list
 */
export interface Target {
  readonly raw: string;
  readonly text: string;
  readonly ordinal: number;
  readonly safeName: string;
  readonly urlTemplate: string;
}

/**
 * Per-target output location
 */
export interface TargetLayout {
  dir: string;
  logPath: string;
}

/**
 * Lifecycle of a single job. There is no retry state.
 */
export type JobPhase = 'pending' | 'launching' | 'running' | 'completed';

/**
 * Mutable state owned by the runner for the job in flight
 */
export interface JobState {
  phase: JobPhase;
  lastPercentRemaining: number | null;
}

/**
 * Point-in-time progress estimate (heuristic mode)
 */
export interface ProgressSample {
  completed: number;
  total: number;
  remaining: number;
  percentRemaining: number;
}

/**
 * Result of one finished job
 */
export interface JobOutcome {
  target: Target;
  strategy: ProgressStrategy;
  logPath: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  startTime: Date;
  endTime: Date;
}

/**
 * State threaded through the orchestrator for the whole run
 */
export interface RunState {
  total: number;
  outcomes: JobOutcome[];
  seenSafeNames: Set<string>;
  stopped: boolean;
}

/**
 * Run summary returned to callers
 */
export interface RunSummary {
  runDir: string;
  strategy: ProgressStrategy;
  total: number;
  outcomes: JobOutcome[];
  interrupted: boolean;
  duration: number;
}

/**
 * Sink for user-facing output lines
 */
export type OutputWriter = (line: string) => void;

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

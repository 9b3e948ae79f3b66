/**
 * Application error types and their process exit codes
 */

/**
 * Base class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode = 1
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toString(): string {
    return `${this.name}(${this.code}): ${this.message}`;
  }
}

/**
 * Target list or wordlist cannot be read. Aborts the run before any job.
 */
export class InputError extends AppError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message, 'INPUT_ERROR', 3);
  }
}

/**
 * The external fuzzer is not installed or not on PATH
 */
export class ToolMissingError extends AppError {
  constructor(public readonly tool: string) {
    super(`${tool} not installed or not in PATH`, 'TOOL_MISSING', 4);
  }
}

/**
 * Resolve the exit code for any thrown value
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof AppError ? error.exitCode : 1;
}

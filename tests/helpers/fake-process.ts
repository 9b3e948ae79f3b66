/**
 * In-process stand-in for a spawned child process
 */

import { EventEmitter } from 'events';
import { PassThrough } from 'stream';

let nextPid = 4000;

export class FakeProcess extends EventEmitter {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly pid = nextPid++;
  readonly signals: string[] = [];
  finished = false;

  constructor(
    readonly command: string,
    readonly args: readonly string[],
    readonly options: { stdio?: unknown } = {}
  ) {
    super();
  }

  /**
   * Value following `flag` in the argument list
   */
  argAfter(flag: string): string | undefined {
    const index = this.args.indexOf(flag);
    return index === -1 ? undefined : this.args[index + 1];
  }

  kill(signal = 'SIGTERM'): boolean {
    this.signals.push(signal);
    this.finish(null, signal);
    return true;
  }

  finish(code: number | null, signal: string | null = null): void {
    if (this.finished) {
      return;
    }
    this.finished = true;
    setImmediate(() => this.emit('close', code, signal));
  }

  fail(error: Error): void {
    this.finished = true;
    setImmediate(() => this.emit('error', error));
  }
}

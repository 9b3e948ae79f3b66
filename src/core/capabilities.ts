/**
 * Host capability detection
 */

import { spawn } from 'child_process';
import { logger } from '../utils/logger.js';
import type { Capabilities } from './types.js';

/**
 * Detects whether exact streaming progress (pv piped into ffuf stdin) is possible.
 * Every check degrades to false; nothing here throws.
 */
export class CapabilityDetector {
  constructor(
    private readonly ffufPath = 'ffuf',
    private readonly pvPath = 'pv'
  ) {}

  async detect(): Promise<Capabilities> {
    const pvAvailable = await this.exitsCleanly(this.pvPath, ['--version']);
    const help = await this.captureOutput(this.ffufPath, ['-h']);
    // Proxy check: a help text advertising -w is taken to mean `-w -:FUZZ` works.
    const stdinSupported = help.includes('-w');

    const capabilities = {
      pvAvailable,
      stdinSupported,
      streamingAvailable: pvAvailable && stdinSupported,
    };
    logger.debug(
      `Capabilities: pv=${pvAvailable} stdin=${stdinSupported} streaming=${capabilities.streamingAvailable}`
    );
    return capabilities;
  }

  /**
   * True when the binary can be launched at all
   */
  async isToolInstalled(binary = this.ffufPath): Promise<boolean> {
    return new Promise((resolve) => {
      const proc = spawn(binary, ['-V'], { stdio: 'ignore' });
      proc.on('close', () => resolve(true));
      proc.on('error', () => resolve(false));
    });
  }

  private exitsCleanly(binary: string, args: string[]): Promise<boolean> {
    return new Promise((resolve) => {
      const proc = spawn(binary, args, { stdio: 'ignore' });

      proc.on('close', (code) => {
        resolve(code === 0);
      });

      proc.on('error', () => {
        resolve(false);
      });
    });
  }

  /**
   * Combined stdout and stderr of a short-lived command; empty when it cannot start
   */
  private captureOutput(binary: string, args: string[]): Promise<string> {
    return new Promise((resolve) => {
      const proc = spawn(binary, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let output = '';

      proc.stdout.on('data', (data: Buffer) => {
        output += data.toString();
      });
      proc.stderr.on('data', (data: Buffer) => {
        output += data.toString();
      });

      proc.on('close', () => resolve(output));
      proc.on('error', () => resolve(''));
    });
  }
}

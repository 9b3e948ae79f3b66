/**
 * Target list enumeration
 */

import { open } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { createInterface } from 'readline';
import { InputError } from './errors.js';
import { safeName } from './layout.js';
import type { Target } from './types.js';

export const FUZZ_MARKER = 'FUZZ';

const SCHEME_PREFIX = /^https?:\/\//;

/**
 * Normalize one raw line: drop carriage returns, trim, and strip trailing slashes.
 * Trailing whitespace and slashes are stripped together so the result is a fixed point.
 */
export function normalizeTarget(raw: string): string {
  return raw
    .replace(/\r/g, '')
    .trim()
    .replace(/[\s/]+$/, '');
}

/**
 * Blank lines and `#` comments are not targets
 */
export function isSkipped(normalized: string): boolean {
  return normalized === '' || normalized.startsWith('#');
}

/**
 * Build the fuzzer URL template, defaulting the scheme to https
 */
export function buildUrlTemplate(normalized: string): string {
  const base = SCHEME_PREFIX.test(normalized) ? normalized : `https://${normalized}`;
  return `${base}/${FUZZ_MARKER}`;
}

/**
 * Reads a target list lazily, one normalized Target per usable line
 */
export class TargetEnumerator {
  constructor(private readonly path: string) {}

  /**
   * Yield targets in file order. Ordinals start at 1 and only count yielded targets.
   */
  async *enumerate(): AsyncGenerator<Target, void, undefined> {
    const handle = await this.openList();
    const input = handle.createReadStream({ encoding: 'utf-8' });
    const lines = createInterface({ input, crlfDelay: Infinity });
    let ordinal = 0;

    try {
      for await (const raw of lines) {
        const text = normalizeTarget(raw);
        if (isSkipped(text)) {
          continue;
        }

        ordinal++;
        yield {
          raw,
          text,
          ordinal,
          safeName: safeName(text),
          urlTemplate: buildUrlTemplate(text),
        };
      }
    } finally {
      lines.close();
      // Closes the handle as well
      input.destroy();
    }
  }

  /**
   * Number of targets `enumerate()` will yield
   */
  async count(): Promise<number> {
    let total = 0;
    for await (const _target of this.enumerate()) {
      total++;
    }
    return total;
  }

  private async openList(): Promise<FileHandle> {
    try {
      return await open(this.path, 'r');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InputError(`Target list not readable: ${this.path} (${reason})`, this.path);
    }
  }
}

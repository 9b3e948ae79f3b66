/**
 * JobRunner exact mode against real processes joined by a pipe
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import chalk from 'chalk';
import { JobRunner } from '../src/ffuf/runner.js';
import { layout } from '../src/core/layout.js';
import type { Target, TargetLayout } from '../src/core/types.js';

const target: Target = {
  raw: 'a.example.com',
  text: 'a.example.com',
  ordinal: 1,
  safeName: 'a.example.com',
  urlTemplate: 'https://a.example.com/FUZZ',
};

// Stand-in for pv: copies its last argument to stdout
const PV_SCRIPT = `#!/bin/sh
for arg in "$@"; do file="$arg"; done
cat "$file"
`;

// pv that keeps running after the wordlist is written
const SLOW_PV_SCRIPT = `${PV_SCRIPT}exec sleep 30
`;

// Stand-in for ffuf: counts the words it received on stdin
const FFUF_SCRIPT = `#!/bin/sh
echo "got $(wc -l | tr -d ' ')"
`;

// ffuf that gives up after the first word
const EARLY_FFUF_SCRIPT = `#!/bin/sh
read -r first
echo "first $first"
exit 3
`;

describe.skipIf(process.platform === 'win32')('JobRunner exact mode pipe', () => {
  let dir: string;
  let wordlistPath: string;
  let targetLayout: TargetLayout;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runner-pipe-test-'));
    wordlistPath = join(dir, 'words.txt');
    await writeFile(wordlistPath, Array.from({ length: 5000 }, (_, i) => `w${i}\n`).join(''));
    targetLayout = await layout(join(dir, 'run'), target);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const script = async (name: string, body: string) => {
    const path = join(dir, name);
    await writeFile(path, body, { mode: 0o755 });
    return path;
  };

  const createRunner = async (pvBody: string, ffufBody: string) =>
    new JobRunner({
      ffufPath: await script('ffuf', ffufBody),
      pvPath: await script('pv', pvBody),
      wordlistPath,
      extraArgs: [],
      strategy: 'exact',
      pollIntervalMs: 5,
      write: () => undefined,
    });

  it('should resolve once pv and ffuf exit, with every word delivered', async () => {
    const runner = await createRunner(PV_SCRIPT, FFUF_SCRIPT);

    const outcome = await runner.run(target, targetLayout);

    expect(outcome).toMatchObject({ strategy: 'exact', exitCode: 0, signal: null });
    expect(runner.activeProcessCount).toBe(0);
    await expect(readFile(targetLayout.logPath, 'utf-8')).resolves.toBe('got 5000\n');
  });

  it('should reap pv when ffuf exits first', async () => {
    const runner = await createRunner(SLOW_PV_SCRIPT, EARLY_FFUF_SCRIPT);

    const outcome = await runner.run(target, targetLayout);

    expect(outcome).toMatchObject({ exitCode: 3, signal: null });
    expect(runner.activeProcessCount).toBe(0);
    await expect(readFile(targetLayout.logPath, 'utf-8')).resolves.toBe('first w0\n');
  });
});

/**
 * Tests for ffuf/pv argument construction and command display
 */

import { describe, it, expect } from 'vitest';
import {
  FFUF_BASE_ARGS,
  buildHeuristicArgs,
  buildPvArgs,
  buildStreamingArgs,
} from '../src/ffuf/command.js';
import { formatCommand, quoteArg } from '../src/utils/shell.js';
import type { Target } from '../src/core/types.js';

const target: Target = {
  raw: 'x.test',
  text: 'x.test',
  ordinal: 1,
  safeName: 'x.test',
  urlTemplate: 'https://x.test/FUZZ',
};

describe('ffuf arguments', () => {
  it('should read words from stdin in streaming mode', () => {
    expect(buildStreamingArgs(target, [])).toEqual([
      '-u',
      'https://x.test/FUZZ',
      '-w',
      '-:FUZZ',
      '-recursion',
      '-recursion-depth',
      '3',
      '-ic',
      '-v',
      '-mc',
      '200',
      '-H',
      'User-Agent: Mozilla/5.0',
    ]);
  });

  it('should pass the wordlist and a JSON results file in heuristic mode', () => {
    const args = buildHeuristicArgs(target, '/w/words.txt', '/tmp/r.json', []);

    expect(args.slice(0, 8)).toEqual([
      '-u',
      'https://x.test/FUZZ',
      '-w',
      '/w/words.txt:FUZZ',
      '-o',
      '/tmp/r.json',
      '-of',
      'json',
    ]);
    expect(args.slice(8)).toEqual([...FFUF_BASE_ARGS]);
  });

  it('should append passthrough arguments last', () => {
    const extra = ['-mc', '200,301', '-t', '50'];

    expect(buildStreamingArgs(target, extra).slice(-4)).toEqual(extra);
    expect(buildHeuristicArgs(target, '/w', '/r', extra).slice(-4)).toEqual(extra);
  });

  it('should give pv the line total and a display name', () => {
    expect(buildPvArgs('/w/words.txt', 100, 'x.test')).toEqual([
      '-l',
      '-s',
      '100',
      '-N',
      'x.test',
      '/w/words.txt',
    ]);
  });
});

describe('command display', () => {
  it('should leave plain arguments unquoted', () => {
    expect(quoteArg('-recursion-depth')).toBe('-recursion-depth');
    expect(quoteArg('https://x.test/FUZZ')).toBe('https://x.test/FUZZ');
  });

  it('should quote spaces, quotes and empty strings', () => {
    expect(quoteArg('User-Agent: Mozilla/5.0')).toBe("'User-Agent: Mozilla/5.0'");
    expect(quoteArg("it's")).toBe("'it'\\''s'");
    expect(quoteArg('')).toBe("''");
  });

  it('should render a full command line', () => {
    expect(formatCommand('ffuf', ['-H', 'X: 1', '-w', '-:FUZZ'])).toBe(
      "ffuf -H 'X: 1' -w -:FUZZ"
    );
  });
});

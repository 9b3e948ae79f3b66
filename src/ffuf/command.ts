/**
 * ffuf and pv argument construction
 */

import type { Target } from '../core/types.js';
import { FUZZ_MARKER } from '../core/targets.js';

/**
 * Options every ffuf invocation carries, before any passthrough arguments
 */
export const FFUF_BASE_ARGS: readonly string[] = [
  '-recursion',
  '-recursion-depth',
  '3',
  '-ic',
  '-v',
  '-mc',
  '200',
  '-H',
  'User-Agent: Mozilla/5.0',
];

/**
 * Wordlist designator telling ffuf to read words from stdin
 */
export const STDIN_WORDLIST = `-:${FUZZ_MARKER}`;

/**
 * ffuf arguments for exact mode: words arrive on stdin
 */
export function buildStreamingArgs(target: Target, extraArgs: readonly string[]): string[] {
  return ['-u', target.urlTemplate, '-w', STDIN_WORDLIST, ...FFUF_BASE_ARGS, ...extraArgs];
}

/**
 * ffuf arguments for heuristic mode: wordlist file plus a JSON results file to poll
 */
export function buildHeuristicArgs(
  target: Target,
  wordlistPath: string,
  resultsPath: string,
  extraArgs: readonly string[]
): string[] {
  return [
    '-u',
    target.urlTemplate,
    '-w',
    `${wordlistPath}:${FUZZ_MARKER}`,
    '-o',
    resultsPath,
    '-of',
    'json',
    ...FFUF_BASE_ARGS,
    ...extraArgs,
  ];
}

/**
 * pv arguments: line mode with a known size so its bar shows exact progress
 */
export function buildPvArgs(wordlistPath: string, totalLines: number, name: string): string[] {
  return ['-l', '-s', String(totalLines), '-N', name, wordlistPath];
}

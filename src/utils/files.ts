/**
 * File inspection helpers
 */

import { createReadStream } from 'fs';
import { readFile } from 'fs/promises';

/**
 * Count newline characters in a file, the way `wc -l` does
 */
export async function countLines(path: string): Promise<number> {
  let lines = 0;
  const stream = createReadStream(path);

  for await (const chunk of stream) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    let index = buffer.indexOf(0x0a);
    while (index !== -1) {
      lines++;
      index = buffer.indexOf(0x0a, index + 1);
    }
  }

  return lines;
}

/**
 * Count non-overlapping occurrences of a marker in a file's text.
 * Throws if the file cannot be read.
 */
export async function countMarkers(path: string, marker: string): Promise<number> {
  const content = await readFile(path, 'utf-8');
  return countOccurrences(content, marker);
}

export function countOccurrences(text: string, marker: string): number {
  if (marker === '') {
    return 0;
  }

  let count = 0;
  let index = text.indexOf(marker);
  while (index !== -1) {
    count++;
    index = text.indexOf(marker, index + marker.length);
  }
  return count;
}

/**
 * Line reader for piped input
 */

import { createInterface } from 'node:readline';

/**
 * Collect the non-empty lines of a readable stream.
 */
export async function readLines(input: NodeJS.ReadableStream): Promise<string[]> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines: string[] = [];
  for await (const line of rl) {
    if (line.trim().length > 0) {
      lines.push(line);
    }
  }
  return lines;
}

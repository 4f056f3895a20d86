/**
 * Line splitting over chunked input
 */

import type { DumpSource } from './types.js';

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Yield the lines of a chunked source without their terminators. A trailing
 * newline does not produce a final empty line. Errors raised by the source
 * propagate to the consumer.
 */
export async function* readLines(source: DumpSource): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  let pending = '';

  for await (const chunk of source) {
    pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });

    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      yield stripCarriageReturn(pending.slice(0, newline));
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  }

  pending += decoder.decode();
  if (pending.length > 0) {
    yield stripCarriageReturn(pending);
  }
}

/**
 * Synchronous counterpart of readLines for content already in memory
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];
  const lines = content.split('\n').map(stripCarriageReturn);
  if (content.endsWith('\n')) lines.pop();
  return lines;
}

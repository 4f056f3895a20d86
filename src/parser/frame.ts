/**
 * Frame rendering and stack search
 */

import type { Frame, Goroutine } from './types.js';

/**
 * Render a frame for display: function on the first line, an indented
 * file:// link on the second. The offset suffix is left out when the dump
 * did not print one.
 */
export function formatFrame(frame: Frame): string {
  const offset = frame.position === undefined ? '' : ` +0x${frame.position.toString(16)}`;
  return `${frame.func}\n   file://${frame.file}#${frame.line}${offset}`;
}

/**
 * Trace frames followed by the created-by frame, if any
 */
export function fullStack(goroutine: Goroutine): Frame[] {
  return goroutine.createdBy ? [...goroutine.trace, goroutine.createdBy] : goroutine.trace;
}

/**
 * Whether any rendered frame contains the search text, ignoring case
 */
export function stackContains(frames: readonly Frame[], subString: string): boolean {
  const needle = subString.toLowerCase();
  return frames.some(frame => formatFrame(frame).toLowerCase().includes(needle));
}

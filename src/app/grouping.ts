/**
 * Grouping of goroutines that share a stack
 */

import { createHash } from 'node:crypto';
import type { Frame, Goroutine } from '../parser/types.js';
import { generateStackName, stripArgs, type TitleRule } from './naming.js';

export interface StackGroup {
  traceId: string; // Fingerprint of the stack trace
  state: string;
  title: string;
  count: number;
  goroutineIds: bigint[];
  maxWaitMinutes: number;
  trace: Frame[]; // Trace of the first goroutine in the group
}

const FINGERPRINT_LENGTH = 24;

/**
 * Fingerprint a trace by function (arguments elided) and location, so
 * goroutines parked at the same place with different argument values match.
 */
export function fingerprint(frames: readonly Frame[]): string {
  const traceString = frames.map(frame => `${stripArgs(frame.func)} ${frame.file}:${frame.line}`).join('\n');
  return createHash('sha256').update(traceString).digest('hex').slice(-FINGERPRINT_LENGTH);
}

/**
 * Group goroutines by (stack trace, state). Larger groups first; equal sizes
 * keep the order in which their first goroutine appeared.
 */
export function groupGoroutines(goroutines: Goroutine[], rules: TitleRule[] = []): StackGroup[] {
  const groupMap = new Map<string, StackGroup>();

  for (const goroutine of goroutines) {
    const traceId = fingerprint(goroutine.trace);
    const groupKey = `${traceId}:${goroutine.state}`;

    let group = groupMap.get(groupKey);
    if (!group) {
      group = {
        traceId,
        state: goroutine.state,
        title: generateStackName(goroutine.trace, rules),
        count: 0,
        goroutineIds: [],
        maxWaitMinutes: 0,
        trace: goroutine.trace,
      };
      groupMap.set(groupKey, group);
    }

    group.count++;
    group.goroutineIds.push(goroutine.id);
    group.maxWaitMinutes = Math.max(group.maxWaitMinutes, goroutine.waitMinutes);
  }

  // Array.prototype.sort is stable
  return [...groupMap.values()].sort((a, b) => b.count - a.count);
}

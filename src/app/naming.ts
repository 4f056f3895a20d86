/**
 * Pure functions for naming stacks
 */

import type { Frame } from '../parser/types.js';

export type TitleRule = { skip: string } | { trim: string };

/**
 * Determine if a function name represents a Go standard library function
 */
export function isStdLib(functionName: string): boolean {
  const firstSlash = functionName.indexOf('/');
  if (firstSlash === -1) {
    // No slash means it's likely a top-level package like "main", "fmt" or "runtime"
    // the only non-stdlib top level package is "main".
    return !functionName.startsWith('main');
  }
  // Check if there's a dot before the first slash
  const beforeSlash = functionName.substring(0, firstSlash);
  return !beforeSlash.includes('.');
}

/**
 * Drop the printed argument list: "main.worker(0xc000010000, 0x1)" -> "main.worker"
 */
export function stripArgs(func: string): string {
  const match = func.match(/^(.+)(\(.*\))$/);
  return match ? match[1] : func;
}

function applyTrim(name: string, trim: string): string {
  if (trim.startsWith('s/')) {
    const match = trim.match(/^s\/(.+)\/(.*)\/$/);
    if (!match) return name;
    const [, pattern, replacement] = match;
    try {
      return name.replace(new RegExp(pattern), replacement);
    } catch (e) {
      // Invalid regex, ignore this rule
      return name;
    }
  }
  if (trim.startsWith('s|')) {
    const match = trim.match(/^s\|(.*)\|([^|]*)\|([gimuy]*)$/);
    if (!match) return name;
    const [, pattern, replacement, flags] = match;
    try {
      return name.replace(new RegExp(pattern, flags), replacement);
    } catch (e) {
      // Invalid regex, ignore this rule
      return name;
    }
  }
  return name.startsWith(trim) ? name.slice(trim.length) : name;
}

/**
 * Generate a stack name: the first frame no skip rule matches, argument list
 * dropped, then trimmed by every trim rule in order
 */
export function generateStackName(trace: readonly Frame[], rules: TitleRule[]): string {
  if (trace.length === 0) return 'empty';

  const skips = rules.flatMap(rule => ('skip' in rule ? [rule.skip] : []));
  const trims = rules.flatMap(rule => ('trim' in rule ? [rule.trim] : []));

  const frame = trace.find(f => !skips.some(prefix => stripArgs(f.func).startsWith(prefix)));
  if (!frame) return 'empty';

  return trims.reduce((name, trim) => applyTrim(name, trim), stripArgs(frame.func));
}

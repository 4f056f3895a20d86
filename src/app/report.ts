/**
 * Text and JSON rendering of parsed dumps
 */

import { bold, cyan, dim, gray, red, yellow } from 'kolorist';
import { formatFrame } from '../parser/frame.js';
import type { Frame, Goroutine, ParseDiagnostic } from '../parser/types.js';
import type { StackGroup } from './grouping.js';
import { isStdLib, stripArgs } from './naming.js';

type ColorFunc = (str: string | number) => string;

export interface Palette {
  header: ColorFunc;
  state: ColorFunc;
  func: ColorFunc;
  location: ColorFunc;
  muted: ColorFunc;
  warning: ColorFunc;
}

export const COLOR_PALETTE: Palette = {
  header: bold,
  state: yellow,
  func: cyan,
  location: gray,
  muted: dim,
  warning: red,
};

const plain: ColorFunc = str => String(str);

export const PLAIN_PALETTE: Palette = {
  header: plain,
  state: plain,
  func: plain,
  location: plain,
  muted: plain,
  warning: plain,
};

export interface RenderOptions {
  palette: Palette;
  functionTrimPrefixes: RegExp[];
  fileTrimPrefixes: RegExp[];
}

export interface InputReport {
  name: string;
  goroutines: Goroutine[]; // After filtering
  totalGoroutines: number;
  groups: StackGroup[] | null; // Set when grouping was requested
  diagnostics: ParseDiagnostic[];
}

// Only the ids of a group are listed up to this many
const MAX_LISTED_IDS = 10;

function trimPrefix(value: string, prefixes: RegExp[]): string {
  for (const prefix of prefixes) {
    const match = value.match(prefix);
    if (match && match.index === 0) {
      return value.slice(match[0].length);
    }
  }
  return value;
}

// Standard library frames are muted so application frames stand out
function renderFrame(frame: Frame, options: RenderOptions, funcPrefix = ''): string[] {
  const display: Frame = {
    ...frame,
    func: trimPrefix(frame.func, options.functionTrimPrefixes),
    file: trimPrefix(frame.file, options.fileTrimPrefixes),
  };
  const [funcLine, locationLine] = formatFrame(display).split('\n');
  const funcColor = isStdLib(stripArgs(frame.func)) ? options.palette.muted : options.palette.func;
  return [funcColor(funcPrefix + funcLine), options.palette.location(locationLine)];
}

function statusClause(state: string, qualifiers: string[]): string {
  return [state, ...qualifiers].join(', ');
}

export function renderGoroutine(goroutine: Goroutine, options: RenderOptions): string {
  const { palette } = options;
  const qualifiers: string[] = [];
  if (goroutine.waitMinutes > 0) qualifiers.push(`${goroutine.waitMinutes} minutes`);
  if (goroutine.lockedToThread) qualifiers.push('locked to thread');
  qualifiers.push(...goroutine.labels);

  const lines = [
    `${palette.header(`goroutine ${goroutine.id}`)} [${palette.state(statusClause(goroutine.state, qualifiers))}]:`,
  ];
  for (const frame of goroutine.trace) {
    lines.push(...renderFrame(frame, options));
  }
  if (goroutine.framesElided) {
    lines.push(palette.muted('...additional frames elided...'));
  }
  if (goroutine.createdBy) {
    const [funcLine, locationLine] = renderFrame(goroutine.createdBy, options, 'created by ');
    const creator = goroutine.creatorId === null ? '' : palette.muted(` in goroutine ${goroutine.creatorId}`);
    lines.push(funcLine + creator, locationLine);
  }
  return lines.join('\n');
}

export function renderGroup(group: StackGroup, options: RenderOptions): string {
  const { palette } = options;
  const noun = group.count === 1 ? 'goroutine' : 'goroutines';
  const qualifiers = group.maxWaitMinutes > 0 ? [`up to ${group.maxWaitMinutes} minutes`] : [];

  const listed = group.goroutineIds.slice(0, MAX_LISTED_IDS).join(', ');
  const more = group.goroutineIds.length > MAX_LISTED_IDS ? `, ... (${group.goroutineIds.length - MAX_LISTED_IDS} more)` : '';

  const lines = [
    `${palette.header(`${group.count} ${noun}`)} [${palette.state(statusClause(group.state, qualifiers))}] ${group.title}`,
    palette.muted(`ids: ${listed}${more}`),
  ];
  for (const frame of group.trace) {
    lines.push(...renderFrame(frame, options));
  }
  return lines.join('\n');
}

function renderSummary(report: InputReport, options: RenderOptions): string {
  const parts = [`${report.goroutines.length} of ${report.totalGoroutines} goroutines`];
  if (report.groups) {
    parts.push(`${report.groups.length} stacks`);
  }
  const summary = `${report.name}: ${parts.join(', ')}`;
  if (report.diagnostics.length === 0) {
    return options.palette.muted(summary);
  }
  return options.palette.muted(summary + ', ') + options.palette.warning(`${report.diagnostics.length} skipped`);
}

/**
 * Render every input as text: records (or groups) separated by blank lines,
 * then one summary line per input
 */
export function renderText(reports: InputReport[], options: RenderOptions): string {
  const blocks: string[] = [];
  for (const report of reports) {
    if (report.groups) {
      blocks.push(...report.groups.map(group => renderGroup(group, options)));
    } else {
      blocks.push(...report.goroutines.map(goroutine => renderGoroutine(goroutine, options)));
    }
  }
  const summaries = reports.map(report => renderSummary(report, options));
  return [...blocks, summaries.join('\n')].join('\n\n') + '\n';
}

/**
 * Render every input as a JSON document
 */
export function renderJSON(reports: InputReport[]): string {
  const inputs = reports.map(report => ({
    name: report.name,
    totalGoroutines: report.totalGoroutines,
    ...(report.groups ? { groups: report.groups } : { goroutines: report.goroutines }),
    diagnostics: report.diagnostics.map(diagnostic => ({
      kind: diagnostic.name,
      line: diagnostic.lineNumber,
      message: diagnostic.message,
    })),
  }));
  // Goroutine ids are int64 and may exceed what a JSON number holds exactly
  return JSON.stringify({ inputs }, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value), 2) + '\n';
}

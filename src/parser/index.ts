/**
 * Goroutine dump parser module
 *
 * Public API:
 * - DumpParser / parseDump: line-oriented dump parsing
 * - formatFrame, stackContains, fullStack: frame helpers
 * - ZipHandler: gzip and zip detection and extraction
 */

export * from './types.js';
export * from './errors.js';
export { DumpParser, parseDump, parseHeader, parseStackPos } from './parser.js';
export type { StackPosition } from './parser.js';
export { formatFrame, fullStack, stackContains } from './frame.js';
export { ZipHandler } from './zip.js';

/**
 * Types for the parser module
 */

import type { BlockParseError, FrameParseError, StreamError } from './errors.js';

export interface Frame {
  readonly func: string; // As printed, argument list included (e.g. "main.worker(0xc000010000)")
  readonly file: string;
  readonly line: number;
  readonly position?: number; // PC offset from the "+0x..." suffix, absent when not printed
}

export interface Goroutine {
  id: bigint; // 64-bit signed, as printed by the runtime
  state: string; // Open vocabulary: "running", "chan receive", "GC worker (idle)", ...
  waitMinutes: number; // 0 when the header carries no "<N> minutes" qualifier
  lockedToThread: boolean;
  labels: string[]; // Qualifiers other than wait time and thread lock
  trace: Frame[];
  createdBy: Frame | null;
  creatorId: bigint | null; // From "created by f in goroutine N" (Go 1.21+)
  framesElided: boolean;
}

export type ParseDiagnostic = BlockParseError | FrameParseError;

export interface ParsedDump {
  originalName: string;
  goroutines: Goroutine[];
  diagnostics: ParseDiagnostic[];
}

// Result type that can represent success or failure
export type Result = { success: true; data: ParsedDump } | { success: false; error: StreamError };

/**
 * Anything that yields the dump text in chunks. Node Readable streams,
 * web streams and plain arrays all qualify.
 */
export type DumpSource = AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

export interface ParserLogger {
  warn(message: string): void;
}

// Zip extraction types
export interface ZipFile {
  path: string;
  content: Uint8Array;
}

export interface ExtractResult {
  files: ZipFile[];
  totalSize: number;
}

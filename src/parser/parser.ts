/**
 * Core parser for Go goroutine stack dumps
 */

import { gunzipSync } from 'fflate';
import { BlockParseError, FrameParseError, StreamError, TruncatedInputError } from './errors.js';
import { readLines, splitLines } from './lines.js';
import { ZipHandler } from './zip.js';
import type {
  DumpSource,
  Frame,
  Goroutine,
  ParseDiagnostic,
  ParsedDump,
  ParserLogger,
  Result,
} from './types.js';

const HEADER_PREFIX = 'goroutine ';
const CREATED_BY_PREFIX = 'created by ';
const FRAMES_ELIDED = '...additional frames elided...';
const STACK_UNAVAILABLE = 'goroutine running on other thread; stack unavailable';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

type Parsed<T> = { ok: true; value: T } | { ok: false; reason: string };

function fail<T>(reason: string): Parsed<T> {
  return { ok: false, reason };
}

export interface StackPosition {
  file: string;
  line: number;
  position?: number;
}

/**
 * Split a status clause on commas, keeping quoted values that contain commas
 * together: `sync.Cond.Wait, 12 minutes, "env":"prod,staging"`
 */
function splitQualifiers(clause: string): string[] {
  const rawParts = clause.split(',').map(s => s.trim());
  const parts: string[] = [];
  let i = 0;
  while (i < rawParts.length) {
    let part = rawParts[i];
    if (part.startsWith('"') && !part.endsWith('"')) {
      while (i + 1 < rawParts.length) {
        i++;
        part += ',' + rawParts[i];
        if (rawParts[i].endsWith('"')) break;
      }
    }
    parts.push(part);
    i++;
  }
  return parts;
}

/**
 * Parse a goroutine header. Two shapes are printed by the runtime:
 * 1. Standard: "goroutine 123 [select, 5 minutes, locked to thread]:"
 * 2. Runtime internal: "goroutine 123 gp=0x... m=... mp=0x... [running]:"
 */
export function parseHeader(header: string): Parsed<Goroutine> {
  const fields = header.split(' ');
  if (fields.length < 3) {
    return fail(`Expected header with at least 3 fields, got "${header}"`);
  }
  if (fields[0] !== 'goroutine') {
    return fail(`Expected goroutine header, got "${header}"`);
  }
  if (!/^[+-]?\d+$/.test(fields[1])) {
    return fail(`Could not parse goroutine id "${fields[1]}"`);
  }
  const id = BigInt(fields[1]);
  if (id < INT64_MIN || id > INT64_MAX) {
    return fail(`Goroutine id ${fields[1]} is out of range`);
  }

  const trimmed = header.trimEnd();
  if (!trimmed.endsWith(']:')) {
    return fail(`Expected header to end with "]:", got "${header}"`);
  }
  const clauseStart = trimmed.indexOf('[');
  const clauseEnd = trimmed.length - 2;
  if (clauseStart === -1) {
    return fail(`Missing [status] clause in "${header}"`);
  }

  const [state, ...qualifiers] = splitQualifiers(trimmed.slice(clauseStart + 1, clauseEnd));
  const goroutine: Goroutine = {
    id,
    state,
    waitMinutes: 0,
    lockedToThread: false,
    labels: [],
    trace: [],
    createdBy: null,
    creatorId: null,
    framesElided: false,
  };

  for (const qualifier of qualifiers) {
    // Quoted label pattern: "key":"value"
    const quotedLabel = qualifier.match(/^"([^"]+)":"([^"]*)"$/);
    if (quotedLabel) {
      goroutine.labels.push(`${quotedLabel[1]}=${quotedLabel[2]}`);
      continue;
    }

    const waitTime = qualifier.match(/^(\d+) minutes?$/);
    if (waitTime) {
      goroutine.waitMinutes = parseInt(waitTime[1], 10);
    } else if (qualifier === 'locked to thread') {
      goroutine.lockedToThread = true;
    } else if (qualifier) {
      goroutine.labels.push(qualifier);
    }
  }

  return { ok: true, value: goroutine };
}

/**
 * Parse a position line such as "\t/usr/local/go/src/net/http/server.go:2969 +0x970".
 * The rightmost colon ends the file path, since paths may contain colons.
 */
export function parseStackPos(text: string): Parsed<StackPosition> {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return fail('Unexpected empty line');
  }

  const fileLineSep = trimmed.lastIndexOf(':');
  if (fileLineSep <= 0) {
    return fail(`Missing file:line separator in "${trimmed}"`);
  }
  const file = trimmed.slice(0, fileLineSep);

  const linePosSep = trimmed.lastIndexOf(' ');
  let lineStr: string;
  let position: number | undefined;
  if (linePosSep <= fileLineSep + 1) {
    // No offset suffix
    lineStr = trimmed.slice(fileLineSep + 1);
  } else {
    const suffix = trimmed.slice(linePosSep + 1);
    const offset = suffix.match(/^\+0x([0-9a-fA-F]+)$/);
    if (!offset) {
      return fail(`Could not parse stack position "${suffix}" in "${trimmed}"`);
    }
    position = parseInt(offset[1], 16);
    if (!Number.isSafeInteger(position)) {
      return fail(`Stack position "${suffix}" is out of range`);
    }
    lineStr = trimmed.slice(fileLineSep + 1, linePosSep);
  }

  if (!/^[+-]?\d+$/.test(lineStr)) {
    return fail(`Could not parse line number "${lineStr}" in "${trimmed}"`);
  }
  const line = parseInt(lineStr, 10);
  if (line < INT32_MIN || line > INT32_MAX) {
    return fail(`Line number ${lineStr} is out of range`);
  }

  return { ok: true, value: position === undefined ? { file, line } : { file, line, position } };
}

interface PendingFrame {
  func: string;
  isCreator: boolean;
  creatorId: bigint | null;
  lineNumber: number;
}

/**
 * Per-call scanner state. Lines are pushed one at a time; nothing is kept
 * beyond the block being assembled and the function line awaiting its
 * position line.
 */
class DumpScanner {
  private readonly fileName: string;
  private readonly logger: ParserLogger;
  private readonly goroutines: Goroutine[] = [];
  private readonly diagnostics: ParseDiagnostic[] = [];
  private current: Goroutine | null = null;
  private pending: PendingFrame | null = null;
  private skippingBlock = false; // Inside a dropped block, until the next blank line
  private lineNumber = 0;

  constructor(fileName: string, logger: ParserLogger) {
    this.fileName = fileName;
    this.logger = logger;
  }

  push(line: string): void {
    this.lineNumber++;
    const blank = line.trim().length === 0;

    // A header also ends a block whose separating blank line went missing
    if (!blank && (!this.current || line.startsWith(HEADER_PREFIX))) {
      const header = parseHeader(line);
      if (header.ok) {
        this.skippingBlock = false;
        this.startBlock(header.value);
        return;
      }
      if (!this.current) {
        if (!this.skippingBlock) {
          this.report(new BlockParseError(header.reason, this.lineNumber, line));
          this.skippingBlock = true;
        }
        return;
      }
    }

    if (!this.current) {
      this.skippingBlock = false; // blank line
      return;
    }

    if (this.pending) {
      this.completeFrame(this.current, this.pending, line);
      this.pending = null;
      // A blank line in the position slot still ends the block
      if (blank) this.endBlock();
      return;
    }

    if (blank) {
      this.endBlock();
      return;
    }

    const marker = line.trim();
    if (marker === FRAMES_ELIDED) {
      this.current.framesElided = true;
      return;
    }
    if (marker === STACK_UNAVAILABLE) {
      return;
    }

    if (line.startsWith(CREATED_BY_PREFIX)) {
      // Go 1.21+ appends the creating goroutine: "created by main.start in goroutine 1"
      const creator = line.slice(CREATED_BY_PREFIX.length);
      const inGoroutine = creator.match(/^(.+) in goroutine (\d+)$/);
      const inRange = inGoroutine !== null && BigInt(inGoroutine[2]) <= INT64_MAX;
      this.pending = {
        func: inGoroutine && inRange ? inGoroutine[1] : creator,
        isCreator: true,
        creatorId: inGoroutine && inRange ? BigInt(inGoroutine[2]) : null,
        lineNumber: this.lineNumber,
      };
    } else {
      this.pending = { func: line, isCreator: false, creatorId: null, lineNumber: this.lineNumber };
    }
  }

  finish(): ParsedDump {
    if (this.pending) {
      this.report(new TruncatedInputError(this.pending.lineNumber, this.pending.func));
      this.pending = null;
    }
    this.endBlock();
    return { originalName: this.fileName, goroutines: this.goroutines, diagnostics: this.diagnostics };
  }

  private completeFrame(goroutine: Goroutine, pending: PendingFrame, line: string): void {
    const pos = parseStackPos(line);
    if (!pos.ok) {
      const what = pending.isCreator ? 'created by frame' : 'stack frame';
      this.report(new FrameParseError(`Failed to parse ${what} "${pending.func}": ${pos.reason}`, this.lineNumber, line));
      return;
    }

    const frame: Frame = { func: pending.func, ...pos.value };
    if (pending.isCreator) {
      goroutine.createdBy = frame;
      goroutine.creatorId = pending.creatorId;
    } else {
      goroutine.trace.push(frame);
    }
  }

  private startBlock(goroutine: Goroutine): void {
    if (this.pending) {
      const { func, lineNumber } = this.pending;
      this.report(new FrameParseError(`Missing position line for "${func}"`, lineNumber, func));
      this.pending = null;
    }
    this.endBlock();
    this.current = goroutine;
  }

  private endBlock(): void {
    if (this.current) {
      this.goroutines.push(this.current);
      this.current = null;
    }
  }

  private report(diagnostic: ParseDiagnostic): void {
    this.diagnostics.push(diagnostic);
    const scope = diagnostic instanceof BlockParseError ? 'goroutine block' : 'stack frame';
    this.logger.warn(`${this.fileName}: skipping ${scope}: ${diagnostic.message}`);
  }
}

interface ParserSettings {
  logger?: ParserLogger;
}

/**
 * Dump parser
 */
export class DumpParser {
  private logger: ParserLogger;

  constructor(settings?: ParserSettings) {
    this.logger = settings?.logger ?? console;
  }

  /**
   * Parse a chunked source. A read error from the source fails the whole
   * call and discards whatever was already assembled.
   */
  async parseStream(source: DumpSource, fileName = 'stdin'): Promise<Result> {
    const scanner = new DumpScanner(fileName, this.logger);
    try {
      for await (const line of readLines(source)) {
        scanner.push(line);
      }
    } catch (error) {
      return {
        success: false,
        error: new StreamError(
          `Failed to read ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        ),
      };
    }
    return { success: true, data: scanner.finish() };
  }

  /**
   * Parse string content already in memory
   */
  parseString(content: string, fileName: string): Result {
    const scanner = new DumpScanner(fileName, this.logger);
    for (const line of splitLines(content)) {
      scanner.push(line);
    }
    return { success: true, data: scanner.finish() };
  }

  /**
   * Parse raw file bytes (handles gzip detection and decompression)
   */
  async parseFile(bytes: Uint8Array, fileName: string): Promise<Result> {
    if (!ZipHandler.isGzipFile(bytes)) {
      return this.parseStream([bytes], fileName);
    }

    let decompressed: Uint8Array;
    try {
      decompressed = gunzipSync(bytes);
    } catch (error) {
      return {
        success: false,
        error: new StreamError(
          `Failed to decompress ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        ),
      };
    }
    return this.parseStream([decompressed], fileName);
  }
}

/**
 * Parse a dump with default settings
 */
export function parseDump(source: DumpSource, fileName?: string): Promise<Result> {
  return new DumpParser().parseStream(source, fileName);
}

/**
 * Opening dump inputs from disk or stdin
 */

import { createReadStream } from 'node:fs';
import { open, readFile } from 'node:fs/promises';
import { StreamError } from '../parser/errors.js';
import type { DumpParser } from '../parser/parser.js';
import type { DumpSource, ParserLogger, Result, ZipFile } from '../parser/types.js';
import { ZipHandler } from '../parser/zip.js';

export interface ParsedInput {
  name: string;
  result: Result;
}

export interface InputOptions {
  zipFilePatterns: RegExp[];
  stdin: DumpSource;
  logger: ParserLogger;
}

const HEAD_LENGTH = 4;

function readFailure(name: string, error: unknown): ParsedInput {
  const message = error instanceof Error ? error.message : String(error);
  return { name, result: { success: false, error: new StreamError(`Failed to read ${name}: ${message}`, { cause: error }) } };
}

async function readHead(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    const buffer = Buffer.alloc(HEAD_LENGTH);
    const { bytesRead } = await handle.read(buffer, 0, HEAD_LENGTH, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Parse one command line input. "-" is stdin; zip archives yield one result
 * per matching entry, named "<archive>!<entry>"; gzip files are decompressed;
 * anything else is streamed from disk.
 */
export async function parseInput(path: string, parser: DumpParser, options: InputOptions): Promise<ParsedInput[]> {
  if (path === '-') {
    return [{ name: 'stdin', result: await parser.parseStream(options.stdin, 'stdin') }];
  }

  let head: Uint8Array;
  try {
    head = await readHead(path);
  } catch (error) {
    return [readFailure(path, error)];
  }

  if (ZipHandler.isZipFile(head)) {
    let files: ZipFile[];
    try {
      files = ZipHandler.extractFiles(await readFile(path), options.zipFilePatterns).files;
    } catch (error) {
      return [readFailure(path, error)];
    }
    if (files.length === 0) {
      options.logger.warn(`${path}: no archive entries match ${options.zipFilePatterns.map(String).join(', ')}`);
    }

    const parsed: ParsedInput[] = [];
    for (const file of files) {
      const name = `${path}!${file.path}`;
      parsed.push({ name, result: await parser.parseFile(file.content, name) });
    }
    return parsed;
  }

  if (ZipHandler.isGzipFile(head)) {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(path);
    } catch (error) {
      return [readFailure(path, error)];
    }
    return [{ name: path, result: await parser.parseFile(bytes, path) }];
  }

  const stream = createReadStream(path);
  try {
    return [{ name: path, result: await parser.parseStream(stream, path) }];
  } finally {
    stream.destroy();
  }
}

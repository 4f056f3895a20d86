/**
 * Error taxonomy for dump parsing. Only StreamError is ever surfaced as a
 * failed result; the others are collected as diagnostics.
 */

export class StreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StreamError';
  }
}

export abstract class DumpParseError extends Error {
  readonly lineNumber: number; // 1-based line the failure was detected on
  readonly text: string;

  constructor(message: string, lineNumber: number, text: string) {
    super(`line ${lineNumber}: ${message}`);
    this.lineNumber = lineNumber;
    this.text = text;
  }
}

// Malformed or unrecognized header line; the whole block is dropped
export class BlockParseError extends DumpParseError {
  constructor(message: string, lineNumber: number, text: string) {
    super(message, lineNumber, text);
    this.name = 'BlockParseError';
  }
}

// Malformed or missing position line; only that frame is dropped
export class FrameParseError extends DumpParseError {
  constructor(message: string, lineNumber: number, text: string) {
    super(message, lineNumber, text);
    this.name = 'FrameParseError';
  }
}

export class TruncatedInputError extends FrameParseError {
  constructor(lineNumber: number, text: string) {
    super(`Unexpected end of input after "${text}"`, lineNumber, text);
    this.name = 'TruncatedInputError';
  }
}

/**
 * Archive helpers for dumps shipped inside debug zips or gzip files
 */
import { unzipSync } from 'fflate';
import type { ExtractResult, ZipFile } from './types.js';

// Default: only "stacks.txt" anywhere in the archive
const DEFAULT_PATTERNS = [/^(.*\/)?stacks\.txt$/];

export class ZipHandler {
  static isZipFile(bytes: Uint8Array): boolean {
    // Local file header signature "PK\x03\x04"
    return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b && bytes[2] === 0x03 && bytes[3] === 0x04;
  }

  static isGzipFile(bytes: Uint8Array): boolean {
    return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
  }

  /**
   * Extract the entries whose path matches one of the patterns. Entries are
   * returned in archive order; directories never match.
   */
  static extractFiles(bytes: Uint8Array, patterns: RegExp[] = DEFAULT_PATTERNS): ExtractResult {
    const wanted = (path: string) => !path.endsWith('/') && patterns.some(pattern => pattern.test(path));

    const entries = unzipSync(bytes, { filter: file => wanted(file.name) });

    const files: ZipFile[] = [];
    let totalSize = 0;
    for (const [path, content] of Object.entries(entries)) {
      files.push({ path, content });
      totalSize += content.length;
    }

    return { files, totalSize };
  }
}

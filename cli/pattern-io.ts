/**
 * Pattern file I/O for the Node.js CLI
 * Patterns are stored as JSON; a `.gz` suffix gzips them with pako
 */

import { readFileSync, writeFileSync } from 'fs';
import pako from 'pako';
import { StoragePattern, parsePatternStructure } from '../src/lib/pattern.js';
import { DataError } from '../src/lib/errors.js';

function isGzipPath(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.gz');
}

/**
 * Serialize a pattern to a JSON (or gzipped JSON) buffer
 */
export function createPatternBuffer(pattern: StoragePattern, gzip: boolean = false): Uint8Array {
  const json = JSON.stringify(pattern.toStructure(), null, 2);
  const bytes = new TextEncoder().encode(json);
  return gzip ? pako.gzip(bytes, { level: 9 }) : bytes;
}

/**
 * Parse a pattern from a JSON (or gzipped JSON) buffer
 */
export function parsePatternBuffer(buffer: Uint8Array, gzip: boolean = false): StoragePattern {
  let text: string;
  try {
    text = new TextDecoder().decode(gzip ? pako.ungzip(buffer) : buffer);
  } catch (err) {
    throw new DataError(`Not a valid gzip pattern file: ${err instanceof Error ? err.message : String(err)}`);
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new DataError(`Not a valid pattern file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return StoragePattern.fromStructure(parsePatternStructure(document));
}

export function savePatternFile(filePath: string, pattern: StoragePattern): void {
  writeFileSync(filePath, createPatternBuffer(pattern, isGzipPath(filePath)));
}

export function loadPatternFile(filePath: string): StoragePattern {
  return parsePatternBuffer(readFileSync(filePath), isGzipPath(filePath));
}

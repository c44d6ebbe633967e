/**
 * CLI option parsing shared by the write, read and simulate commands
 */

import { readFileSync } from 'fs';
import type { Vec3 } from '../src/utils/constants.js';
import { createErrorCorrection, isErrorCorrectionName, type ErrorCorrectionScheme } from '../src/lib/ecc.js';
import { stringToBytes } from '../src/utils/helpers.js';

/** Bad command-line input; exits with status 2 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const EXIT = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

function parseDimensions(value: string, count: number, label: string): number[] {
  const parts = value.toLowerCase().split('x');
  const numbers = parts.map(p => Number(p.trim()));
  if (parts.length !== count || !numbers.every(n => Number.isInteger(n) && n > 0)) {
    throw new UsageError(`Invalid ${label} "${value}": expected ${count} positive integers separated by "x"`);
  }
  return numbers;
}

/**
 * "8x8x2" → [8, 8, 2]
 */
export function parseGrid(value: string): Vec3 {
  const [x, y, z] = parseDimensions(value, 3, '--grid');
  return [x, y, z];
}

/**
 * "16x8" → { intensityLevels: 16, polarizationStates: 8 }
 */
export function parseLevels(value: string): { intensityLevels: number; polarizationStates: number } {
  const [intensityLevels, polarizationStates] = parseDimensions(value, 2, '--levels');
  return { intensityLevels, polarizationStates };
}

export function parseScheme(value: string): ErrorCorrectionScheme {
  const name = value.toLowerCase();
  if (!isErrorCorrectionName(name)) {
    throw new UsageError(`Invalid --ecc "${value}": use none, hamming74 or parity8`);
  }
  return createErrorCorrection(name);
}

/**
 * Non-negative float; 0 when the option is absent
 */
export function parseStd(value: string | undefined, label: string): number {
  if (value === undefined) return 0;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw new UsageError(`Invalid ${label} "${value}": expected a non-negative number`);
  }
  return n;
}

export function parseSeed(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new UsageError(`Invalid --seed "${value}": expected an integer`);
  }
  return n;
}

/**
 * Payload from the text argument, a file, or piped stdin
 */
export function readPayload(text: string | undefined, file: string | undefined): Uint8Array {
  if (file) {
    return new Uint8Array(readFileSync(file));
  }
  if (text !== undefined) {
    return stringToBytes(text);
  }
  if (!process.stdin.isTTY) {
    return new Uint8Array(readFileSync(0));
  }
  throw new UsageError('No input provided. Use text argument, -f flag, or pipe input.');
}

const CORE_LOG_PREFIXES = ['[Writer]', '[Reader]', '[ECC]', '[Host]'];

/**
 * Run `fn` with the pipeline's prefixed console output muted
 */
export async function withCoreLogs<T>(muted: boolean, fn: () => Promise<T>): Promise<T> {
  if (!muted) return fn();

  const originalLog = console.log;
  const originalWarn = console.warn;
  const filter = (target: (...args: unknown[]) => void) => (...args: unknown[]) => {
    const msg = args[0];
    if (typeof msg === 'string' && CORE_LOG_PREFIXES.some(prefix => msg.startsWith(prefix))) {
      return;
    }
    target.apply(console, args);
  };

  console.log = filter(originalLog);
  console.warn = filter(originalWarn);
  try {
    return await fn();
  } finally {
    console.log = originalLog;
    console.warn = originalWarn;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

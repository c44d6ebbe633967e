/**
 * Host-side orchestration
 *
 * Wraps the writer and reader with optional payload scrambling and a
 * read-back check. The codec underneath only ever sees bits, so the
 * scrambler layers on without touching it.
 */
import { bitsToBytes, bytesToBits } from '../utils/bits';
import { bytesEqual } from '../utils/helpers';
import { LaserWriter, type WriterOptions } from '../encode';
import { LFSR_SEED, descrambleBits, scrambleBits } from '../encode/scramble';
import { LaserReader, type ReadResult } from '../decode';
import type { StoragePattern } from '../lib/pattern';
import type { Voxel } from '../lib/voxel';

export interface ScrambleOptions {
  /** Whiten payload bits before writing (default: true) */
  scramble?: boolean;
  scrambleSeed?: number;
}

export interface HostWriterOptions extends WriterOptions, ScrambleOptions {}

export interface HostReadback {
  pattern: StoragePattern;
  readResult: ReadResult;
  /** Payload after descrambling */
  data: Uint8Array;
  /** No uncorrectable blocks, and bytes match `expected` when it was given */
  ok: boolean;
}

export class HostWriter {
  readonly writer: LaserWriter;
  readonly scramble: boolean;
  readonly scrambleSeed: number;

  constructor(options: HostWriterOptions = {}) {
    const { scramble = true, scrambleSeed = LFSR_SEED, ...writerOptions } = options;
    this.writer = new LaserWriter(writerOptions);
    this.scramble = scramble;
    this.scrambleSeed = scrambleSeed;
  }

  write(data: Uint8Array): StoragePattern {
    if (!this.scramble) return this.writer.write(data);
    return this.writer.write(bitsToBytes(scrambleBits(bytesToBits(data), this.scrambleSeed)));
  }

  /**
   * Read a pattern back and undo this writer's scrambling
   *
   * @param voxels - Substitute measurements, e.g. from applyGaussianNoise
   * @param expected - Original payload to compare against
   */
  verify(pattern: StoragePattern, voxels?: readonly Voxel[], expected?: Uint8Array): HostReadback {
    return readBack(pattern, { scramble: this.scramble, scrambleSeed: this.scrambleSeed }, voxels, expected);
  }
}

/**
 * Read a pattern back and undo scrambling, without configuring a writer
 */
export function readBack(
  pattern: StoragePattern,
  options: ScrambleOptions = {},
  voxels?: readonly Voxel[],
  expected?: Uint8Array
): HostReadback {
  const { scramble = true, scrambleSeed = LFSR_SEED } = options;
  const readResult = new LaserReader(pattern).read(voxels);
  const data = scramble
    ? bitsToBytes(descrambleBits(bytesToBits(readResult.data), scrambleSeed))
    : readResult.data;

  let ok = readResult.detectedUncorrectable === 0;
  if (expected !== undefined) {
    ok = ok && bytesEqual(data, expected);
  }
  if (!ok) {
    console.warn('[Host] Read-back verification failed');
  }

  return { pattern, readResult, data, ok };
}

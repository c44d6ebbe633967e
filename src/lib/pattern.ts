/**
 * StoragePattern - the self-describing unit of stored data
 *
 * Binds the voxel sequence to the geometry, quantization and FEC parameters
 * that produced it, so a reader needs nothing else to decode it.
 *
 * Voxel order is the row-major linearization of the lattice:
 *   index = z * (gx * gy) + y * gx + x
 */
import type { ValueRange, Vec3 } from '../utils/constants';
import {
  createErrorCorrection,
  type ErrorCorrectionMetadata,
  type ErrorCorrectionName,
  type ErrorCorrectionScheme,
} from './ecc';
import { CapacityError, DataError } from './errors';
import { bitsForLevels } from './quantize';
import { Voxel, type VoxelRecord } from './voxel';

export interface StoragePatternInit {
  voxels: readonly Voxel[];
  gridSize: Vec3;
  voxelPitch: Vec3;
  intensityLevels: number;
  intensityRange: ValueRange;
  polarizationStates: number;
  polarizationRange: ValueRange;
  bitsPerVoxel: number;
  encodedBitLength: number;
  dataBitLength: number;
  paddingBits: number;
  errorCorrection: ErrorCorrectionScheme;
  errorCorrectionMetadata?: ErrorCorrectionMetadata;
  dataLengthBytes: number;
}

/**
 * Plain keyed form used for JSON persistence
 */
export interface StoragePatternStructure {
  voxels: VoxelRecord[];
  gridSize: Vec3;
  voxelPitch: Vec3;
  intensityLevels: number;
  intensityRange: ValueRange;
  polarizationStates: number;
  polarizationRange: ValueRange;
  bitsPerVoxel: number;
  encodedBitLength: number;
  dataBitLength: number;
  paddingBits: number;
  errorCorrection: string;
  errorCorrectionMetadata: Record<string, number>;
  dataLengthBytes: number;
}

export interface PatternSummary {
  gridSize: Vec3;
  voxelPitch: Vec3;
  intensityLevels: number;
  polarizationStates: number;
  bitsPerVoxel: number;
  encodedBitLength: number;
  dataBitLength: number;
  paddingBits: number;
  errorCorrection: ErrorCorrectionName;
  errorCorrectionMetadata: ErrorCorrectionMetadata;
  dataLengthBytes: number;
  voxelCount: number;
}

export class StoragePattern {
  readonly voxels: readonly Voxel[];
  readonly gridSize: Vec3;
  readonly voxelPitch: Vec3;
  readonly intensityLevels: number;
  readonly intensityRange: ValueRange;
  readonly polarizationStates: number;
  readonly polarizationRange: ValueRange;
  readonly bitsPerVoxel: number;
  readonly encodedBitLength: number;
  readonly dataBitLength: number;
  readonly paddingBits: number;
  readonly errorCorrection: ErrorCorrectionScheme;
  readonly errorCorrectionMetadata: ErrorCorrectionMetadata;
  readonly dataLengthBytes: number;

  constructor(init: StoragePatternInit) {
    this.voxels = Object.freeze([...init.voxels]);
    this.gridSize = [...init.gridSize];
    this.voxelPitch = [...init.voxelPitch];
    this.intensityLevels = init.intensityLevels;
    this.intensityRange = [...init.intensityRange];
    this.polarizationStates = init.polarizationStates;
    this.polarizationRange = [...init.polarizationRange];
    this.bitsPerVoxel = init.bitsPerVoxel;
    this.encodedBitLength = init.encodedBitLength;
    this.dataBitLength = init.dataBitLength;
    this.paddingBits = init.paddingBits;
    this.errorCorrection = init.errorCorrection;
    this.errorCorrectionMetadata = Object.freeze({ ...(init.errorCorrectionMetadata ?? init.errorCorrection.metadata()) });
    this.dataLengthBytes = init.dataLengthBytes;

    requireCount(this.encodedBitLength, 'encodedBitLength');
    requireCount(this.dataBitLength, 'dataBitLength');
    requireCount(this.paddingBits, 'paddingBits');
    requireCount(this.dataLengthBytes, 'dataLengthBytes');
    if (this.dataBitLength !== this.dataLengthBytes * 8) {
      throw new DataError(
        `Inconsistent payload length: ${this.dataBitLength} data bits for ${this.dataLengthBytes} bytes`
      );
    }
    const expectedBitsPerVoxel = levelBits(this.intensityLevels, 'intensityLevels') +
      levelBits(this.polarizationStates, 'polarizationStates');
    if (this.bitsPerVoxel !== expectedBitsPerVoxel) {
      throw new DataError(
        `bitsPerVoxel ${this.bitsPerVoxel} does not match ${this.intensityLevels} intensity levels ` +
        `and ${this.polarizationStates} polarization states (${expectedBitsPerVoxel} bits)`
      );
    }

    if (this.voxels.length > 0 && this.encodedBitLength + this.paddingBits !== this.voxels.length * this.bitsPerVoxel) {
      throw new DataError(
        `Inconsistent bit accounting: ${this.encodedBitLength} encoded + ${this.paddingBits} padding bits ` +
        `!= ${this.voxels.length} voxels x ${this.bitsPerVoxel} bits`
      );
    }
  }

  get voxelCount(): number {
    return this.voxels.length;
  }

  /**
   * Raw lattice capacity in bits, before FEC overhead
   */
  capacityBits(): number {
    const [gx, gy, gz] = this.gridSize;
    return gx * gy * gz * this.bitsPerVoxel;
  }

  summary(): PatternSummary {
    return {
      gridSize: [...this.gridSize],
      voxelPitch: [...this.voxelPitch],
      intensityLevels: this.intensityLevels,
      polarizationStates: this.polarizationStates,
      bitsPerVoxel: this.bitsPerVoxel,
      encodedBitLength: this.encodedBitLength,
      dataBitLength: this.dataBitLength,
      paddingBits: this.paddingBits,
      errorCorrection: this.errorCorrection.name,
      errorCorrectionMetadata: this.errorCorrectionMetadata,
      dataLengthBytes: this.dataLengthBytes,
      voxelCount: this.voxelCount,
    };
  }

  toStructure(): StoragePatternStructure {
    return {
      voxels: this.voxels.map(v => v.toRecord()),
      gridSize: [...this.gridSize],
      voxelPitch: [...this.voxelPitch],
      intensityLevels: this.intensityLevels,
      intensityRange: [...this.intensityRange],
      polarizationStates: this.polarizationStates,
      polarizationRange: [...this.polarizationRange],
      bitsPerVoxel: this.bitsPerVoxel,
      encodedBitLength: this.encodedBitLength,
      dataBitLength: this.dataBitLength,
      paddingBits: this.paddingBits,
      errorCorrection: this.errorCorrection.name,
      errorCorrectionMetadata: { ...this.errorCorrectionMetadata },
      dataLengthBytes: this.dataLengthBytes,
    };
  }

  static fromStructure(structure: StoragePatternStructure): StoragePattern {
    return new StoragePattern({
      voxels: structure.voxels.map(record => Voxel.from(record)),
      gridSize: structure.gridSize,
      voxelPitch: structure.voxelPitch,
      intensityLevels: structure.intensityLevels,
      intensityRange: structure.intensityRange,
      polarizationStates: structure.polarizationStates,
      polarizationRange: structure.polarizationRange,
      bitsPerVoxel: structure.bitsPerVoxel,
      encodedBitLength: structure.encodedBitLength,
      dataBitLength: structure.dataBitLength,
      paddingBits: structure.paddingBits,
      errorCorrection: createErrorCorrection(structure.errorCorrection),
      errorCorrectionMetadata: structure.errorCorrectionMetadata,
      dataLengthBytes: structure.dataLengthBytes,
    });
  }
}

function requireCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new DataError(`Pattern field "${label}" must be a non-negative integer, got ${value}`);
  }
}

function levelBits(levels: number, label: string): number {
  if (!Number.isInteger(levels) || levels <= 0 || (levels & (levels - 1)) !== 0) {
    throw new DataError(`Pattern field "${label}" must be a positive power of two, got ${levels}`);
  }
  return bitsForLevels(levels);
}

/**
 * Lattice coordinates for a linear voxel index
 */
export function indexToCoordinates(index: number, gridSize: Vec3): Vec3 {
  const [gx, gy, gz] = gridSize;
  const planeSize = gx * gy;
  const z = Math.floor(index / planeSize);
  if (z >= gz) {
    throw new CapacityError(`Voxel index ${index} exceeds lattice depth ${gz}`);
  }
  const remainder = index % planeSize;
  return [remainder % gx, Math.floor(remainder / gx), z];
}

// ---------------------------------------------------------------------------
// Structure validation for untrusted input (pattern files)

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(source: Record<string, unknown>, key: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DataError(`Pattern field "${key}" must be a finite number`);
  }
  return value;
}

function readCount(source: Record<string, unknown>, key: string): number {
  const value = readNumber(source, key);
  requireCount(value, key);
  return value;
}

function readTuple(source: Record<string, unknown>, key: string, length: number): number[] {
  const value = source[key];
  if (!Array.isArray(value) || value.length !== length || !value.every(v => typeof v === 'number' && Number.isFinite(v))) {
    throw new DataError(`Pattern field "${key}" must be a list of ${length} numbers`);
  }
  return value.map(Number);
}

function readVoxel(value: unknown, index: number): VoxelRecord {
  if (!isRecord(value)) {
    throw new DataError(`Voxel ${index} is not an object`);
  }
  return {
    x: readNumber(value, 'x'),
    y: readNumber(value, 'y'),
    z: readNumber(value, 'z'),
    intensity: readNumber(value, 'intensity'),
    polarization: readNumber(value, 'polarization'),
  };
}

/**
 * Validate a decoded JSON document against the pattern structure
 */
export function parsePatternStructure(value: unknown): StoragePatternStructure {
  if (!isRecord(value)) {
    throw new DataError('Pattern document must be an object');
  }
  if (!Array.isArray(value.voxels)) {
    throw new DataError('Pattern field "voxels" must be a list');
  }

  const [gx, gy, gz] = readTuple(value, 'gridSize', 3);
  const [px, py, pz] = readTuple(value, 'voxelPitch', 3);
  const [iMin, iMax] = readTuple(value, 'intensityRange', 2);
  const [pMin, pMax] = readTuple(value, 'polarizationRange', 2);

  const metadata: Record<string, number> = {};
  if (isRecord(value.errorCorrectionMetadata)) {
    for (const [key, entry] of Object.entries(value.errorCorrectionMetadata)) {
      if (typeof entry === 'number') metadata[key] = entry;
    }
  }

  return {
    voxels: value.voxels.map((v: unknown, i: number) => readVoxel(v, i)),
    gridSize: [gx, gy, gz],
    voxelPitch: [px, py, pz],
    intensityLevels: readCount(value, 'intensityLevels'),
    intensityRange: [iMin, iMax],
    polarizationStates: readCount(value, 'polarizationStates'),
    polarizationRange: [pMin, pMax],
    bitsPerVoxel: readCount(value, 'bitsPerVoxel'),
    encodedBitLength: readCount(value, 'encodedBitLength'),
    dataBitLength: readCount(value, 'dataBitLength'),
    paddingBits: readCount(value, 'paddingBits'),
    errorCorrection: typeof value.errorCorrection === 'string' ? value.errorCorrection : 'none',
    errorCorrectionMetadata: metadata,
    dataLengthBytes: readCount(value, 'dataLengthBytes'),
  };
}

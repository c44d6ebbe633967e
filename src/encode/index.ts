/**
 * Main writing pipeline
 *
 * Flow: Bytes → Bits → FEC → Pad → Chunk per voxel → Quantize → Voxel lattice
 */
import { LIMITS, POLARIZATION_MAX, WRITER_DEFAULTS, type ValueRange, type Vec3 } from '../utils/constants';
import { bitsToInt, bytesToBits, chunkBits } from '../utils/bits';
import { formatBytes } from '../utils/helpers';
import { createErrorCorrection, type ErrorCorrectionScheme } from '../lib/ecc';
import { CapacityError, ConfigurationError } from '../lib/errors';
import { StoragePattern, indexToCoordinates } from '../lib/pattern';
import { bitsForLevels, levelToPhysical } from '../lib/quantize';
import { Voxel } from '../lib/voxel';

export interface WriterOptions {
  gridSize?: Vec3;
  voxelPitch?: Vec3;
  intensityLevels?: number;
  polarizationStates?: number;
  intensityRange?: ValueRange;
  polarizationRange?: ValueRange;
  errorCorrection?: ErrorCorrectionScheme;
}

export type WriterConfig = Required<WriterOptions>;

/**
 * Fill unset writer options from WRITER_DEFAULTS
 */
export function resolveWriterConfig(options: WriterOptions = {}): WriterConfig {
  return {
    gridSize: options.gridSize ?? [...WRITER_DEFAULTS.GRID_SIZE],
    voxelPitch: options.voxelPitch ?? [...WRITER_DEFAULTS.VOXEL_PITCH],
    intensityLevels: options.intensityLevels ?? WRITER_DEFAULTS.INTENSITY_LEVELS,
    polarizationStates: options.polarizationStates ?? WRITER_DEFAULTS.POLARIZATION_STATES,
    intensityRange: options.intensityRange ?? [...WRITER_DEFAULTS.INTENSITY_RANGE],
    polarizationRange: options.polarizationRange ?? [...WRITER_DEFAULTS.POLARIZATION_RANGE],
    errorCorrection: options.errorCorrection ?? createErrorCorrection(WRITER_DEFAULTS.ERROR_CORRECTION),
  };
}

function validateRange(range: ValueRange, label: string): void {
  const [min, max] = range;
  if (!Number.isFinite(min) || !Number.isFinite(max) || min >= max) {
    throw new ConfigurationError(`Invalid ${label} range [${min}, ${max}]: lower bound must be below upper bound`);
  }
}

/**
 * Check a writer configuration before any encoding happens
 */
export function validateWriterConfig(config: WriterConfig): void {
  const { gridSize, voxelPitch } = config;
  if (gridSize.length !== 3 || !gridSize.every(d => Number.isInteger(d) && d > 0)) {
    throw new ConfigurationError(`Grid dimensions must be positive integers, got ${gridSize.join('x')}`);
  }
  if (gridSize.some(d => d > LIMITS.MAX_GRID_DIMENSION)) {
    throw new ConfigurationError(
      `Grid dimensions exceed maximum (${LIMITS.MAX_GRID_DIMENSION}): ${gridSize.join('x')}`
    );
  }
  if (voxelPitch.length !== 3 || !voxelPitch.every(p => Number.isFinite(p) && p > 0)) {
    throw new ConfigurationError(`Voxel pitch values must be positive, got ${voxelPitch.join('x')}`);
  }
  if (!(config.intensityLevels > 0) || !(config.polarizationStates > 0)) {
    throw new ConfigurationError('Quantization level counts must be positive');
  }
  validateRange(config.intensityRange, 'intensity');
  validateRange(config.polarizationRange, 'polarization');

  // Every quantized value must be storable in a Voxel
  if (config.intensityRange[0] < 0) {
    throw new ConfigurationError(`Intensity range must be non-negative, got [${config.intensityRange.join(', ')}]`);
  }
  const [pMin, pMax] = config.polarizationRange;
  if (pMin < 0 || pMax > POLARIZATION_MAX) {
    throw new ConfigurationError(`Polarization range must lie within [0, 2π], got [${pMin}, ${pMax}]`);
  }
}

/**
 * LaserWriter - turns byte payloads into voxel patterns
 *
 * Configuration is validated once at construction; write() can then be
 * called any number of times and shares no state between calls.
 */
export class LaserWriter {
  readonly config: WriterConfig;
  readonly bitsPerIntensity: number;
  readonly bitsPerPolarization: number;
  readonly bitsPerVoxel: number;

  constructor(options: WriterOptions = {}) {
    this.config = resolveWriterConfig(options);
    validateWriterConfig(this.config);

    this.bitsPerIntensity = bitsForLevels(this.config.intensityLevels);
    this.bitsPerPolarization = bitsForLevels(this.config.polarizationStates);
    this.bitsPerVoxel = this.bitsPerIntensity + this.bitsPerPolarization;
    if (this.bitsPerVoxel === 0) {
      throw new ConfigurationError('At least one dimension must encode information');
    }
  }

  get errorCorrection(): ErrorCorrectionScheme {
    return this.config.errorCorrection;
  }

  /**
   * Total voxels in the lattice
   */
  get maxVoxels(): number {
    const [gx, gy, gz] = this.config.gridSize;
    return gx * gy * gz;
  }

  write(data: Uint8Array): StoragePattern {
    const { config } = this;

    if (data.length > LIMITS.MAX_PAYLOAD_BYTES) {
      throw new CapacityError(
        `Payload exceeds maximum size (${formatBytes(LIMITS.MAX_PAYLOAD_BYTES)}): ${data.length} bytes provided`
      );
    }

    const payloadBits = bytesToBits(data);
    const encodedBits = config.errorCorrection.encode(payloadBits);
    const encodedBitLength = encodedBits.length;

    const requiredVoxels = encodedBitLength > 0 ? Math.ceil(encodedBitLength / this.bitsPerVoxel) : 0;
    if (requiredVoxels > this.maxVoxels) {
      throw new CapacityError(
        `Data does not fit inside the configured lattice: requires ${requiredVoxels} voxels, only ${this.maxVoxels} available`,
        requiredVoxels,
        this.maxVoxels
      );
    }

    const paddingBits = requiredVoxels * this.bitsPerVoxel - encodedBitLength;
    const paddedBits = encodedBits.concat(new Array<number>(paddingBits).fill(0));

    const voxels = chunkBits(paddedBits, this.bitsPerVoxel).map((chunk, index) => {
      const [x, y, z] = indexToCoordinates(index, config.gridSize);
      const intensityLevel = bitsToInt(chunk.slice(0, this.bitsPerIntensity));
      const polarizationLevel = bitsToInt(chunk.slice(this.bitsPerIntensity));
      return new Voxel(
        x,
        y,
        z,
        levelToPhysical(intensityLevel, config.intensityLevels, config.intensityRange),
        levelToPhysical(polarizationLevel, config.polarizationStates, config.polarizationRange)
      );
    });

    console.log(
      `[Writer] ${data.length} bytes → ${encodedBitLength} encoded bits (${config.errorCorrection.name}) → ` +
      `${voxels.length}/${this.maxVoxels} voxels, ${paddingBits} padding bits`
    );

    return new StoragePattern({
      voxels,
      gridSize: config.gridSize,
      voxelPitch: config.voxelPitch,
      intensityLevels: config.intensityLevels,
      intensityRange: config.intensityRange,
      polarizationStates: config.polarizationStates,
      polarizationRange: config.polarizationRange,
      bitsPerVoxel: this.bitsPerVoxel,
      encodedBitLength,
      dataBitLength: payloadBits.length,
      paddingBits,
      errorCorrection: config.errorCorrection,
      errorCorrectionMetadata: config.errorCorrection.metadata(),
      dataLengthBytes: data.length,
    });
  }
}

/**
 * One-shot write with the given options
 */
export function writePattern(data: Uint8Array, options?: WriterOptions): StoragePattern {
  return new LaserWriter(options).write(data);
}

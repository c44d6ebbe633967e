/**
 * Main reading pipeline
 *
 * Flow: Voxels (possibly noisy) → Levels → Bits → Strip padding → FEC decode → Bytes
 *
 * The reader never mutates the pattern. Noise simulation hands it a
 * replacement voxel sequence instead.
 */
import { bitsToBytes, intToBits } from '../utils/bits';
import { DataError } from '../lib/errors';
import type { StoragePattern } from '../lib/pattern';
import { bitsForLevels, physicalToLevel } from '../lib/quantize';
import type { Voxel } from '../lib/voxel';

export interface ReadResult {
  data: Uint8Array;
  correctedErrors: number;
  detectedUncorrectable: number;
  voxelsUsed: number;
  /** Voxel bits with padding removed, before FEC decoding */
  rawBitstream: number[];
  /** FEC output truncated to the original payload length */
  decodedPayloadBits: number[];
}

/**
 * LaserReader - recovers the payload stored in a pattern
 */
export class LaserReader {
  readonly pattern: StoragePattern;
  readonly bitsPerIntensity: number;
  readonly bitsPerPolarization: number;
  readonly bitsPerVoxel: number;

  constructor(pattern: StoragePattern) {
    this.pattern = pattern;
    this.bitsPerIntensity = bitsForLevels(pattern.intensityLevels);
    this.bitsPerPolarization = bitsForLevels(pattern.polarizationStates);
    this.bitsPerVoxel = this.bitsPerIntensity + this.bitsPerPolarization;

    if (this.bitsPerVoxel === 0 && pattern.encodedBitLength > 0) {
      throw new DataError('Pattern does not contain encodable information');
    }
  }

  /**
   * @param voxels - Replacement measurements (e.g. after noise injection);
   *                 defaults to the pattern's own voxels
   */
  read(voxels?: readonly Voxel[]): ReadResult {
    const { pattern } = this;
    const source = voxels ?? pattern.voxels;

    if (source.length === 0 && pattern.encodedBitLength > 0) {
      throw new DataError('No voxels provided for decoding');
    }

    const requiredBits = pattern.encodedBitLength + pattern.paddingBits;
    const collected: number[] = [];
    let voxelsUsed = 0;

    for (const voxel of source) {
      if (collected.length >= requiredBits) break;

      const intensityLevel = physicalToLevel(voxel.intensity, pattern.intensityLevels, pattern.intensityRange);
      const polarizationLevel = physicalToLevel(voxel.polarization, pattern.polarizationStates, pattern.polarizationRange);
      collected.push(...intToBits(intensityLevel, this.bitsPerIntensity));
      collected.push(...intToBits(polarizationLevel, this.bitsPerPolarization));
      voxelsUsed++;
    }

    if (collected.length < requiredBits) {
      throw new DataError(
        `Insufficient voxel data to reconstruct payload: need ${requiredBits} bits, got ${collected.length} from ${voxelsUsed} voxels`
      );
    }

    const rawBitstream = collected.slice(0, requiredBits - pattern.paddingBits);

    const decoded = pattern.errorCorrection.decode(rawBitstream);
    const decodedPayloadBits = decoded.bits.slice(0, pattern.dataBitLength);
    const data = bitsToBytes(decodedPayloadBits).slice(0, pattern.dataLengthBytes);

    if (decoded.correctedErrors > 0) {
      console.log(`[Reader] Corrected ${decoded.correctedErrors} bit errors`);
    }
    if (decoded.detectedUncorrectable > 0) {
      console.warn(`[Reader] ${decoded.detectedUncorrectable} blocks failed FEC checks`);
    }

    return {
      data,
      correctedErrors: decoded.correctedErrors,
      detectedUncorrectable: decoded.detectedUncorrectable,
      voxelsUsed,
      rawBitstream,
      decodedPayloadBits,
    };
  }
}

/**
 * One-shot read of a pattern, optionally with substituted voxels
 */
export function readPattern(pattern: StoragePattern, voxels?: readonly Voxel[]): ReadResult {
  return new LaserReader(pattern).read(voxels);
}

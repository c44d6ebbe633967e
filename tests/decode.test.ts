import { describe, it, expect, vi, afterEach } from 'vitest';
import { LaserWriter, writePattern } from '../src/encode';
import { LaserReader, readPattern } from '../src/decode';
import { Hamming74, NoErrorCorrection, Parity8 } from '../src/lib/ecc';
import { DataError } from '../src/lib/errors';
import { StoragePattern } from '../src/lib/pattern';
import { applyGaussianNoise } from '../src/lib/noise';
import { levelToPhysical } from '../src/lib/quantize';
import { Voxel } from '../src/lib/voxel';
import { bytesToBits } from '../src/utils/bits';
import { stringToBytes } from '../src/utils/helpers';

describe('LaserReader', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should roundtrip without error correction', () => {
    const payload = stringToBytes('DataCube'.repeat(4));
    const pattern = writePattern(payload, {
      gridSize: [16, 16, 4],
      voxelPitch: [5, 5, 15],
      intensityLevels: 8,
      polarizationStates: 8,
      intensityRange: [0.1, 0.9],
      polarizationRange: [0, 3.14159],
      errorCorrection: new NoErrorCorrection(),
    });

    const result = readPattern(pattern);
    expect(result.data).toEqual(payload);
    expect(result.correctedErrors).toBe(0);
    expect(result.detectedUncorrectable).toBe(0);
    // 256 bits / 6 bits per voxel
    expect(result.voxelsUsed).toBe(43);
    expect(result.rawBitstream.length).toBe(256);
    expect(result.decodedPayloadBits).toEqual(bytesToBits(payload));
  });

  it('should roundtrip with Parity8', () => {
    const payload = stringToBytes('ParityTest');
    const pattern = writePattern(payload, {
      gridSize: [16, 16, 2],
      intensityLevels: 8,
      polarizationStates: 8,
      intensityRange: [0.2, 1.0],
      polarizationRange: [0, 3.14159],
      errorCorrection: new Parity8(),
    });

    const result = new LaserReader(pattern).read();
    expect(result.data).toEqual(payload);
    expect(result.detectedUncorrectable).toBe(0);
  });

  it('should correct a misread voxel with Hamming74', () => {
    const pattern = writePattern(new Uint8Array([0x41]), {
      gridSize: [4, 4, 1],
      intensityLevels: 4,
      polarizationStates: 4,
      intensityRange: [0, 1],
      polarizationRange: [0, 3],
      errorCorrection: new Hamming74(),
    });
    vi.spyOn(console, 'log').mockImplementation(() => {});

    // voxel 0 holds bits 1001; reading intensity level 3 gives 1101 (one flipped bit)
    const [first, ...rest] = pattern.voxels;
    const misread = [new Voxel(first.x, first.y, first.z, levelToPhysical(3, 4, [0, 1]), first.polarization), ...rest];

    const result = readPattern(pattern, misread);
    expect(result.data).toEqual(new Uint8Array([0x41]));
    expect(result.correctedErrors).toBe(1);
    expect(result.detectedUncorrectable).toBe(0);
  });

  it('should leave the pattern untouched when given replacement voxels', () => {
    const pattern = writePattern(stringToBytes('immutable'), { gridSize: [8, 8, 2] });
    const before = pattern.voxels.map(v => v.toRecord());

    readPattern(pattern, applyGaussianNoise(pattern, 0.5, 0.5, 1));
    expect(pattern.voxels.map(v => v.toRecord())).toEqual(before);
  });

  it('should stop consuming voxels once enough bits are read', () => {
    const pattern = writePattern(stringToBytes('stop'), { gridSize: [8, 8, 2] });
    const result = readPattern(pattern, [...pattern.voxels, ...pattern.voxels]);
    expect(result.voxelsUsed).toBe(pattern.voxelCount);
    expect(result.data).toEqual(stringToBytes('stop'));
  });

  it('should fail when no voxels are available', () => {
    const pattern = writePattern(stringToBytes('x'), { gridSize: [8, 8, 2] });
    expect(() => readPattern(pattern, [])).toThrow(DataError);
    expect(() => readPattern(pattern, [])).toThrow('No voxels provided for decoding');
  });

  it('should fail when voxels run out early', () => {
    const pattern = writePattern(stringToBytes('truncated'), { gridSize: [8, 8, 2] });
    const partial = pattern.voxels.slice(0, pattern.voxelCount - 1);
    expect(() => readPattern(pattern, partial)).toThrow(DataError);
    expect(() => readPattern(pattern, partial)).toThrow('Insufficient voxel data');
  });

  it('should refuse a pattern whose voxels carry no bits', () => {
    const pattern = new StoragePattern({
      voxels: [],
      gridSize: [2, 2, 1],
      voxelPitch: [5, 5, 20],
      intensityLevels: 1,
      intensityRange: [0, 1],
      polarizationStates: 1,
      polarizationRange: [0, 1],
      bitsPerVoxel: 0,
      encodedBitLength: 8,
      dataBitLength: 8,
      paddingBits: 0,
      errorCorrection: new NoErrorCorrection(),
      dataLengthBytes: 1,
    });

    expect(() => new LaserReader(pattern)).toThrow(DataError);
    expect(() => readPattern(pattern)).toThrow('Pattern does not contain encodable information');
  });

  it('should read an empty pattern without consuming voxels', () => {
    const pattern = writePattern(new Uint8Array(0), { gridSize: [4, 4, 1] });
    const result = readPattern(pattern);
    expect(result.data.length).toBe(0);
    expect(result.voxelsUsed).toBe(0);
  });

  it('should recover data under light measurement noise', () => {
    const payload = stringToBytes('Femtosecond lasers rock!');
    const writer = new LaserWriter({
      gridSize: [32, 32, 8],
      intensityLevels: 16,
      polarizationStates: 8,
      intensityRange: [0.2, 1.0],
      polarizationRange: [0, 3.14159],
      errorCorrection: new Hamming74(),
    });
    const pattern = writer.write(payload);
    const noisy = applyGaussianNoise(pattern, 0.002, 0.002, 99);

    const result = readPattern(pattern, noisy);
    expect(result.data).toEqual(payload);
    expect(result.correctedErrors).toBe(0);
    expect(result.detectedUncorrectable).toBe(0);
  });
});

import { describe, it, expect, vi, afterEach } from 'vitest';
import { HostWriter, readBack, type HostWriterOptions } from '../src/host';
import { readPattern } from '../src/decode';
import { CapacityError } from '../src/lib/errors';
import { applyGaussianNoise } from '../src/lib/noise';
import { stringToBytes } from '../src/utils/helpers';

const LATTICE: HostWriterOptions = {
  gridSize: [8, 8, 2],
  intensityLevels: 4,
  polarizationStates: 4,
};

describe('HostWriter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should roundtrip a scrambled payload', () => {
    const host = new HostWriter(LATTICE);
    const payload = stringToBytes('hello host writer');
    const pattern = host.write(payload);

    // 136 bits -> 34 Hamming blocks -> 238 bits over 4 bits per voxel
    expect(pattern.voxelCount).toBe(60);

    const readback = host.verify(pattern, undefined, payload);
    expect(readback.ok).toBe(true);
    expect(readback.data).toEqual(payload);
    expect(readback.pattern).toBe(pattern);
  });

  it('should store whitened bytes in the pattern', () => {
    const pattern = new HostWriter(LATTICE).write(stringToBytes('he'));
    expect(Array.from(readPattern(pattern).data)).toEqual([0x69, 0x36]);
  });

  it('should store the payload as-is without scrambling', () => {
    const payload = stringToBytes('plain');
    const pattern = new HostWriter({ ...LATTICE, scramble: false }).write(payload);
    expect(readPattern(pattern).data).toEqual(payload);
  });

  it('should verify noisy measurements', () => {
    const host = new HostWriter(LATTICE);
    const payload = stringToBytes('noisy read-back');
    const pattern = host.write(payload);

    const readback = host.verify(pattern, applyGaussianNoise(pattern, 0.01, 0.01, 7), payload);
    expect(readback.ok).toBe(true);
    expect(readback.data).toEqual(payload);
  });

  it('should fail verification against the wrong payload', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const host = new HostWriter(LATTICE);
    const pattern = host.write(stringToBytes('right'));

    const readback = host.verify(pattern, undefined, stringToBytes('wrong'));
    expect(readback.ok).toBe(false);
    expect(readback.data).toEqual(stringToBytes('right'));
    expect(warn).toHaveBeenCalledWith('[Host] Read-back verification failed');
  });

  it('should read back without a writer', () => {
    const payload = stringToBytes('read-only path');
    const pattern = new HostWriter({ ...LATTICE, scrambleSeed: 0x1234 }).write(payload);

    const readback = readBack(pattern, { scrambleSeed: 0x1234 }, undefined, payload);
    expect(readback.ok).toBe(true);
    expect(readback.data).toEqual(payload);

    const plain = new HostWriter({ ...LATTICE, scramble: false }).write(payload);
    expect(readBack(plain, { scramble: false }).data).toEqual(payload);
  });

  it('should surface the writer capacity guard', () => {
    const host = new HostWriter({ gridSize: [2, 2, 1], intensityLevels: 2, polarizationStates: 2 });
    expect(() => host.write(new Uint8Array(1024))).toThrow(CapacityError);
  });
});

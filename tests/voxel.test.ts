import { describe, it, expect } from 'vitest';
import { Voxel } from '../src/lib/voxel';
import { ValidationError } from '../src/lib/errors';

describe('Voxel', () => {
  it('should hold its fields', () => {
    const voxel = new Voxel(1, 2, 3, 0.5, 1.25);
    expect(voxel.toRecord()).toEqual({ x: 1, y: 2, z: 3, intensity: 0.5, polarization: 1.25 });
  });

  it('should be frozen', () => {
    const voxel = new Voxel(0, 0, 0, 0, 0);
    expect(Object.isFrozen(voxel)).toBe(true);
  });

  it('should reject negative or fractional coordinates', () => {
    expect(() => new Voxel(-1, 0, 0, 0.5, 0)).toThrow(ValidationError);
    expect(() => new Voxel(0, -1, 0, 0.5, 0)).toThrow(ValidationError);
    expect(() => new Voxel(0, 0, 1.5, 0.5, 0)).toThrow(ValidationError);
  });

  it('should reject negative or non-finite intensity', () => {
    expect(() => new Voxel(0, 0, 0, -0.1, 0)).toThrow(ValidationError);
    expect(() => new Voxel(0, 0, 0, Number.NaN, 0)).toThrow(ValidationError);
    expect(() => new Voxel(0, 0, 0, Number.POSITIVE_INFINITY, 0)).toThrow(ValidationError);
  });

  it('should bound polarization to [0, 2π]', () => {
    expect(() => new Voxel(0, 0, 0, 0.5, -0.01)).toThrow(ValidationError);
    expect(() => new Voxel(0, 0, 0, 0.5, 2 * Math.PI + 0.01)).toThrow(ValidationError);
    expect(new Voxel(0, 0, 0, 0.5, 2 * Math.PI).polarization).toBe(2 * Math.PI);
  });

  it('should rebuild from a plain record', () => {
    const record = { x: 4, y: 5, z: 6, intensity: 0.9, polarization: 3 };
    expect(Voxel.from(record).toRecord()).toEqual(record);
  });
});

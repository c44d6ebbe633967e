/**
 * Voxel - a single written point in the glass
 *
 * Position is an integer lattice coordinate; intensity and polarization are the
 * two measured physical properties that carry data.
 */
import { POLARIZATION_MAX } from '../utils/constants';
import { ValidationError } from './errors';

export interface VoxelRecord {
  x: number;
  y: number;
  z: number;
  intensity: number;
  polarization: number;
}

export class Voxel implements VoxelRecord {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly intensity: number;
  readonly polarization: number;

  constructor(x: number, y: number, z: number, intensity: number, polarization: number) {
    if (![x, y, z].every(c => Number.isInteger(c) && c >= 0)) {
      throw new ValidationError(`Voxel coordinates must be non-negative integers, got (${x}, ${y}, ${z})`);
    }
    if (!Number.isFinite(intensity) || intensity < 0) {
      throw new ValidationError(`Intensity must be finite and non-negative, got ${intensity}`);
    }
    if (!Number.isFinite(polarization) || polarization < 0 || polarization > POLARIZATION_MAX) {
      throw new ValidationError(`Polarization angle must be within [0, 2π], got ${polarization}`);
    }

    this.x = x;
    this.y = y;
    this.z = z;
    this.intensity = intensity;
    this.polarization = polarization;
    Object.freeze(this);
  }

  static from(record: VoxelRecord): Voxel {
    return new Voxel(record.x, record.y, record.z, record.intensity, record.polarization);
  }

  toRecord(): VoxelRecord {
    return {
      x: this.x,
      y: this.y,
      z: this.z,
      intensity: this.intensity,
      polarization: this.polarization,
    };
  }
}

/**
 * Error taxonomy for the storage pipeline
 *
 * Every failure the writer, reader or voxel model raises is a StorageError.
 * FEC decoding never throws; it reports through DecodingResult counters.
 */

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
  }
}

/** Invalid grid, pitch, level count or value range */
export class ConfigurationError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Payload does not fit in the configured lattice */
export class CapacityError extends StorageError {
  constructor(
    message: string,
    public readonly requiredVoxels?: number,
    public readonly availableVoxels?: number
  ) {
    super(message);
    this.name = 'CapacityError';
  }
}

/** Not enough (or malformed) voxel data to reconstruct a payload */
export class DataError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'DataError';
  }
}

/** Voxel field out of bounds */
export class ValidationError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

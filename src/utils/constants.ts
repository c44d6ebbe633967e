export type Vec3 = [number, number, number];
export type ValueRange = [number, number];

// Polarization is an angle in radians, bounded to one full turn
export const POLARIZATION_MAX = 2 * Math.PI;

// Default writer settings - a 64x64x32 block of fused-silica voxels
// 16 intensity levels (4 bits) + 8 polarization states (3 bits) = 7 bits/voxel
export const WRITER_DEFAULTS = {
  GRID_SIZE: [64, 64, 32],
  VOXEL_PITCH: [5.0, 5.0, 20.0], // micrometres
  INTENSITY_LEVELS: 16,
  POLARIZATION_STATES: 8,
  INTENSITY_RANGE: [0.15, 1.0],
  POLARIZATION_RANGE: [0.0, Math.PI],
  ERROR_CORRECTION: 'hamming74',
} as const;

// Limits
export const LIMITS = {
  MAX_GRID_DIMENSION: 10_000,     // per axis
  MAX_PAYLOAD_BYTES: 1_000_000,   // 1MB hard limit per pattern
} as const;

// CLI defaults - small lattice so demos stay readable
export const CLI_DEFAULTS = {
  GRID: '8x8x2',
  LEVELS: '4x4',
  ECC: 'hamming74',
  OUTPUT: 'pattern.json',
} as const;

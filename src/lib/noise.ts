/**
 * Measurement noise simulation
 *
 * Produces a perturbed copy of a pattern's voxels for the reader to consume,
 * leaving the pattern itself untouched.
 */
import { ConfigurationError } from './errors';
import type { StoragePattern } from './pattern';
import { Voxel } from './voxel';

/**
 * Mulberry32 - small seedable 32-bit PRNG, uniform in [0, 1)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6D2B79F5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Normal deviate via Box-Muller
 */
function gaussian(random: () => number, mean: number, std: number): number {
  if (std === 0) return mean;
  let u = 0;
  while (u === 0) u = random(); // log(0) guard
  const v = random();
  return mean + std * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * New voxel list with independent Gaussian noise on intensity and
 * polarization, clamped back into the pattern's configured ranges.
 *
 * @param seed - Fixes the noise realization; omit for Math.random
 */
export function applyGaussianNoise(
  pattern: StoragePattern,
  intensityStd: number,
  polarizationStd: number,
  seed?: number
): Voxel[] {
  if (!(intensityStd >= 0) || !(polarizationStd >= 0)) {
    throw new ConfigurationError(
      `Noise standard deviations must be non-negative, got ${intensityStd} and ${polarizationStd}`
    );
  }

  const random = seed === undefined ? Math.random : createRandom(seed);
  const [iMin, iMax] = pattern.intensityRange;
  const [pMin, pMax] = pattern.polarizationRange;

  return pattern.voxels.map(voxel => new Voxel(
    voxel.x,
    voxel.y,
    voxel.z,
    clamp(gaussian(random, voxel.intensity, intensityStd), iMin, iMax),
    clamp(gaussian(random, voxel.polarization, polarizationStd), pMin, pMax)
  ));
}

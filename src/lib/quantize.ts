/**
 * Level quantization
 *
 * Maps a continuous physical value (intensity, polarization angle) onto one of
 * N evenly spaced levels and back. N must be a power of two so each level
 * carries a whole number of bits.
 *
 * Rounding rule: round half away from zero. Normalized values are never
 * negative here, so this is exactly Math.round.
 */
import type { ValueRange } from '../utils/constants';
import { ConfigurationError } from './errors';

/**
 * Number of bits one level carries (0 for a single level)
 */
export function bitsForLevels(levels: number): number {
  if (!Number.isInteger(levels) || levels <= 0) {
    throw new ConfigurationError(`Level count must be a positive integer, got ${levels}`);
  }
  if ((levels & (levels - 1)) !== 0) {
    throw new ConfigurationError(`Level count must be a power of two for binary encoding, got ${levels}`);
  }
  return levels === 1 ? 0 : Math.log2(levels);
}

/**
 * Physical value written for a level
 */
export function levelToPhysical(level: number, levels: number, range: ValueRange): number {
  const [min, max] = range;
  if (levels === 1) {
    return (min + max) / 2;
  }
  const step = (max - min) / (levels - 1);
  const clamped = Math.max(0, Math.min(level, levels - 1));
  return min + clamped * step;
}

/**
 * Nearest level for a (possibly noisy) physical measurement
 */
export function physicalToLevel(value: number, levels: number, range: ValueRange): number {
  const [min, max] = range;
  if (levels === 1) {
    return 0;
  }
  const step = (max - min) / (levels - 1);
  if (step === 0) {
    return 0;
  }
  const clamped = Math.max(min, Math.min(value, max));
  const level = Math.round((clamped - min) / step);
  return Math.max(0, Math.min(level, levels - 1));
}

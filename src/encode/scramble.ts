/**
 * LFSR payload scrambler
 *
 * Whitens payload bits before they are written so long runs of identical
 * bytes do not map onto long runs of identical voxels. XOR with the same
 * sequence undoes it.
 *
 * Polynomial: x^15 + x + 1 (Fibonacci LFSR), period 2^15 - 1 = 32767
 */

export const LFSR_POLYNOMIAL = 0x4001; // taps at bits 14 and 0
export const LFSR_SEED = 0x4A80;       // fixed seed shared by writer and reader
const LFSR_MASK = 0x7FFF;              // 15-bit register

export class LFSR {
  private state: number;

  constructor(seed: number = LFSR_SEED) {
    // An all-zero register never leaves zero
    this.state = (seed & LFSR_MASK) || LFSR_SEED;
  }

  nextBit(): number {
    const outputBit = this.state & 1;
    const feedback = ((this.state >> 14) ^ this.state) & 1;
    this.state = ((this.state >> 1) | (feedback << 14)) & LFSR_MASK;
    return outputBit;
  }

  reset(seed: number = LFSR_SEED): void {
    this.state = (seed & LFSR_MASK) || LFSR_SEED;
  }
}

/**
 * XOR bits with the LFSR sequence
 */
export function scrambleBits(bits: readonly number[], seed: number = LFSR_SEED): number[] {
  const lfsr = new LFSR(seed);
  return bits.map(bit => (bit & 1) ^ lfsr.nextBit());
}

/**
 * Inverse of scrambleBits (the same XOR)
 */
export function descrambleBits(bits: readonly number[], seed: number = LFSR_SEED): number[] {
  return scrambleBits(bits, seed);
}

/**
 * First `length` bits of the scrambling sequence
 */
export function generateSequence(length: number, seed: number = LFSR_SEED): number[] {
  const lfsr = new LFSR(seed);
  return Array.from({ length }, () => lfsr.nextBit());
}

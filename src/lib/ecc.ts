/**
 * Bit-level forward error correction
 *
 * Three schemes share one contract:
 * - none:      passthrough
 * - hamming74: (7,4) Hamming, corrects one flipped bit per 7-bit block
 * - parity8:   one even-parity bit per byte, detects (never corrects)
 *
 * Schemes are stateless, so a single instance can be shared freely.
 * decode() never throws - damage is reported through the counters.
 */
import { chunkBits } from '../utils/bits';

export type ErrorCorrectionName = 'none' | 'hamming74' | 'parity8';

export const ERROR_CORRECTION_NAMES: readonly ErrorCorrectionName[] = ['none', 'hamming74', 'parity8'];

export type ErrorCorrectionMetadata = Readonly<Record<string, number>>;

export interface DecodingResult {
  readonly bits: number[];
  readonly correctedErrors: number;
  readonly detectedUncorrectable: number;
}

export interface ErrorCorrectionScheme {
  readonly name: ErrorCorrectionName;
  encode(bits: readonly number[]): number[];
  decode(bits: readonly number[]): DecodingResult;
  metadata(): ErrorCorrectionMetadata;
}

function decodingResult(bits: number[], correctedErrors = 0, detectedUncorrectable = 0): DecodingResult {
  return Object.freeze({ bits, correctedErrors, detectedUncorrectable });
}

export class NoErrorCorrection implements ErrorCorrectionScheme {
  readonly name = 'none';

  encode(bits: readonly number[]): number[] {
    return bits.map(bit => bit & 1);
  }

  decode(bits: readonly number[]): DecodingResult {
    return decodingResult(bits.map(bit => bit & 1));
  }

  metadata(): ErrorCorrectionMetadata {
    return {};
  }
}

/**
 * Hamming(7,4)
 *
 * Block layout (1-indexed): [p1, p2, d1, p3, d2, d3, d4]
 *   p1 = d1 ^ d2 ^ d4
 *   p2 = d1 ^ d3 ^ d4
 *   p3 = d2 ^ d3 ^ d4
 *
 * After a syndrome-guided flip the block is checked twice more: the syndrome
 * is recomputed, then the parity bits are rebuilt from the corrected data.
 * A failure of either marks the block uncorrectable. This catches only some
 * double-bit errors; others still decode silently to wrong data.
 */
export class Hamming74 implements ErrorCorrectionScheme {
  readonly name = 'hamming74';

  encode(bits: readonly number[]): number[] {
    const encoded: number[] = [];
    for (const [d1, d2, d3, d4] of chunkBits(bits, 4, true)) {
      encoded.push(...encodeNibble(d1, d2, d3, d4));
    }
    return encoded;
  }

  decode(bits: readonly number[]): DecodingResult {
    let corrected = 0;
    let uncorrectable = 0;
    const decoded: number[] = [];

    for (const block of chunkBits(bits, 7, true)) {
      const errorPosition = syndrome(block);

      if (errorPosition !== 0) {
        block[errorPosition - 1] ^= 1;
        corrected++;

        if (syndrome(block) !== 0) {
          uncorrectable++;
        } else {
          const [p1, p2, , p3] = encodeNibble(block[2], block[4], block[5], block[6]);
          if (p1 !== block[0] || p2 !== block[1] || p3 !== block[3]) {
            uncorrectable++;
          }
        }
      }

      decoded.push(block[2], block[4], block[5], block[6]);
    }

    return decodingResult(decoded, corrected, uncorrectable);
  }

  metadata(): ErrorCorrectionMetadata {
    return { dataBitsPerBlock: 4, encodedBitsPerBlock: 7 };
  }
}

function encodeNibble(d1: number, d2: number, d3: number, d4: number): number[] {
  const p1 = d1 ^ d2 ^ d4;
  const p2 = d1 ^ d3 ^ d4;
  const p3 = d2 ^ d3 ^ d4;
  return [p1, p2, d1, p3, d2, d3, d4];
}

/**
 * 1-indexed position of the flipped bit, or 0 for a clean block
 */
function syndrome(block: readonly number[]): number {
  const s1 = block[0] ^ block[2] ^ block[4] ^ block[6];
  const s2 = block[1] ^ block[2] ^ block[5] ^ block[6];
  const s3 = block[3] ^ block[4] ^ block[5] ^ block[6];
  return (s3 << 2) | (s2 << 1) | s1;
}

/**
 * Even parity over each byte: 8 data bits + 1 parity bit
 */
export class Parity8 implements ErrorCorrectionScheme {
  readonly name = 'parity8';

  encode(bits: readonly number[]): number[] {
    const encoded: number[] = [];
    for (const chunk of chunkBits(bits, 8, true)) {
      encoded.push(...chunk, parity(chunk));
    }
    return encoded;
  }

  decode(bits: readonly number[]): DecodingResult {
    let uncorrectable = 0;
    const decoded: number[] = [];

    for (const block of chunkBits(bits, 9, true)) {
      const data = block.slice(0, 8);
      if (parity(data) !== block[8]) {
        uncorrectable++;
      }
      decoded.push(...data);
    }

    return decodingResult(decoded, 0, uncorrectable);
  }

  metadata(): ErrorCorrectionMetadata {
    return { dataBitsPerBlock: 8, encodedBitsPerBlock: 9 };
  }
}

function parity(bits: readonly number[]): number {
  let p = 0;
  for (const bit of bits) p ^= bit & 1;
  return p;
}

export function isErrorCorrectionName(name: string): name is ErrorCorrectionName {
  return ERROR_CORRECTION_NAMES.some(known => known === name);
}

/**
 * Scheme instance for a name; unknown names fall back to passthrough
 */
export function createErrorCorrection(name: string): ErrorCorrectionScheme {
  if (!isErrorCorrectionName(name)) {
    console.warn(`[ECC] Unknown scheme "${name}", falling back to none`);
    return new NoErrorCorrection();
  }

  switch (name) {
    case 'none':
      return new NoErrorCorrection();
    case 'hamming74':
      return new Hamming74();
    case 'parity8':
      return new Parity8();
  }
}

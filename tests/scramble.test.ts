/**
 * Tests for LFSR Scrambler
 */

import { describe, it, expect } from 'vitest';
import {
  scrambleBits,
  descrambleBits,
  generateSequence,
  LFSR,
  LFSR_SEED,
} from '../src/encode/scramble';
import { bytesToBits } from '../src/utils/bits';
import { stringToBytes } from '../src/utils/helpers';

describe('LFSR Scrambler', () => {
  describe('LFSR class', () => {
    it('should produce deterministic output from same seed', () => {
      const lfsr1 = new LFSR(LFSR_SEED);
      const lfsr2 = new LFSR(LFSR_SEED);

      for (let i = 0; i < 100; i++) {
        expect(lfsr1.nextBit()).toBe(lfsr2.nextBit());
      }
    });

    it('should emit the seed bits first, LSB first', () => {
      expect(generateSequence(15)).toEqual([0, 0, 0, 0, 0, 0, 0, 1, 0, 1, 0, 1, 0, 0, 1]);
    });

    it('should replace an all-zero seed with the default', () => {
      expect(generateSequence(64, 0)).toEqual(generateSequence(64, LFSR_SEED));
    });

    it('should restart after reset', () => {
      const lfsr = new LFSR();
      const first = Array.from({ length: 32 }, () => lfsr.nextBit());
      lfsr.reset();
      const second = Array.from({ length: 32 }, () => lfsr.nextBit());
      expect(second).toEqual(first);
    });

    it('should produce a balanced sequence', () => {
      const ones = generateSequence(10000).reduce((sum, bit) => sum + bit, 0);
      expect(ones / 10000).toBeGreaterThan(0.45);
      expect(ones / 10000).toBeLessThan(0.55);
    });
  });

  describe('scrambleBits / descrambleBits', () => {
    it('should turn zeros into the raw sequence', () => {
      expect(scrambleBits(new Array<number>(40).fill(0))).toEqual(generateSequence(40));
    });

    it('should XOR the payload with the sequence', () => {
      // sequence bytes start 0x01, 0x53
      expect(scrambleBits(bytesToBits(stringToBytes('he')))).toEqual(bytesToBits(new Uint8Array([0x69, 0x36])));
    });

    it('should roundtrip', () => {
      const bits = bytesToBits(stringToBytes('Scramble me, then put me back'));
      const scrambled = scrambleBits(bits);
      expect(scrambled).not.toEqual(bits);
      expect(descrambleBits(scrambled)).toEqual(bits);
    });

    it('should only roundtrip with the matching seed', () => {
      const bits = bytesToBits(stringToBytes('seeded'));
      expect(descrambleBits(scrambleBits(bits, 0x1234), 0x1234)).toEqual(bits);
      expect(descrambleBits(scrambleBits(bits, 0x1234))).not.toEqual(bits);
    });

    it('should handle empty input', () => {
      expect(scrambleBits([])).toEqual([]);
    });
  });
});

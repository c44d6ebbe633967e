/**
 * Bit-level packing
 *
 * Bits are plain number arrays holding 0 or 1, most significant bit first.
 * Every function masks its input with `& 1`, so stray values never leak
 * into the stream.
 */

/**
 * Expand bytes into bits (MSB first)
 */
export function bytesToBits(data: Uint8Array): number[] {
  const bits = new Array<number>(data.length * 8);
  for (let i = 0; i < data.length; i++) {
    for (let b = 0; b < 8; b++) {
      bits[i * 8 + b] = (data[i] >> (7 - b)) & 1;
    }
  }
  return bits;
}

/**
 * Pack bits into bytes (MSB first)
 * A short final group is right-padded with zeros.
 */
export function bitsToBytes(bits: readonly number[]): Uint8Array {
  const chunks = chunkBits(bits, 8, true);
  const bytes = new Uint8Array(chunks.length);
  for (let i = 0; i < chunks.length; i++) {
    bytes[i] = bitsToInt(chunks[i]);
  }
  return bytes;
}

/**
 * Split bits into consecutive groups of `size`
 *
 * @param pad - When true the final short group is zero-padded to `size`;
 *              otherwise it is emitted as-is.
 */
export function chunkBits(bits: readonly number[], size: number, pad: boolean = false): number[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: number[][] = [];
  for (let offset = 0; offset < bits.length; offset += size) {
    const chunk = bits.slice(offset, offset + size).map(bit => bit & 1);
    if (pad) {
      while (chunk.length < size) chunk.push(0);
    }
    chunks.push(chunk);
  }
  return chunks;
}

/**
 * Interpret bits as a big-endian unsigned integer
 */
export function bitsToInt(bits: readonly number[]): number {
  let value = 0;
  for (const bit of bits) {
    value = value * 2 + (bit & 1);
  }
  return value;
}

/**
 * Big-endian `width`-bit representation of `value`
 */
export function intToBits(value: number, width: number): number[] {
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`Width must be a non-negative integer, got ${width}`);
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Value must be a non-negative integer, got ${value}`);
  }
  if (value >= 2 ** width) {
    throw new RangeError(`Value ${value} does not fit into ${width} bits`);
  }

  const bits = new Array<number>(width);
  let remaining = value;
  for (let i = width - 1; i >= 0; i--) {
    bits[i] = remaining % 2;
    remaining = Math.floor(remaining / 2);
  }
  return bits;
}

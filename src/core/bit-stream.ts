import { MalformedPayloadError } from '../errors.js';
import type { Bit } from './bits.js';

/**
 * Bytes produced by packing a bit sequence, MSB first.
 */
export interface PackedBits {
  /** Packed bytes; the final byte is zero-padded */
  bytes: Uint8Array;

  /** Valid bits in the final byte: 1-8, or 0 when `bytes` is empty */
  validBitsInLastByte: number;

  /** Total number of valid bits */
  bitLength: number;
}

/**
 * Bit-level output stream.
 * Accumulates bits MSB first and emits a byte every 8 bits.
 */
export class BitOutputStream {
  private buffer: number[] = [];
  private currentByte: number = 0;
  private bitPosition: number = 0;

  /**
   * Write a single bit to the stream.
   */
  writeBit(bit: Bit): void {
    this.currentByte = (this.currentByte << 1) | bit;
    this.bitPosition++;

    if (this.bitPosition === 8) {
      this.buffer.push(this.currentByte);
      this.currentByte = 0;
      this.bitPosition = 0;
    }
  }

  /**
   * Write every bit of a code, in order.
   */
  writeCode(code: readonly Bit[]): void {
    for (let i = 0; i < code.length; i++) {
      this.writeBit(code[i]);
    }
  }

  /**
   * Number of complete bytes written so far.
   */
  get byteCount(): number {
    return this.buffer.length;
  }

  /**
   * Total number of bits written.
   */
  get bitCount(): number {
    return this.buffer.length * 8 + this.bitPosition;
  }

  /**
   * Pad the pending partial byte with zeros and return the packed result.
   * The stream is reset afterwards.
   */
  finish(): PackedBits {
    const bitLength = this.bitCount;
    const pending = this.bitPosition;

    if (pending > 0) {
      this.buffer.push((this.currentByte << (8 - pending)) & 0xff);
    }

    const bytes = new Uint8Array(this.buffer);
    this.buffer = [];
    this.currentByte = 0;
    this.bitPosition = 0;

    return {
      bytes,
      validBitsInLastByte: bytes.length === 0 ? 0 : pending === 0 ? 8 : pending,
      bitLength,
    };
  }
}

/**
 * Check that a byte length and a final-byte bit count belong together.
 */
export function validatePacking(byteLength: number, validBitsInLastByte: number): void {
  if (!Number.isInteger(validBitsInLastByte)) {
    throw new MalformedPayloadError(
      `Invalid valid-bit count: ${validBitsInLastByte}`
    );
  }
  if (byteLength === 0) {
    if (validBitsInLastByte !== 0) {
      throw new MalformedPayloadError(
        `Empty payload must declare 0 valid bits, got ${validBitsInLastByte}`
      );
    }
    return;
  }
  if (validBitsInLastByte < 1 || validBitsInLastByte > 8) {
    throw new MalformedPayloadError(
      `Valid bits in last byte must be 1-8, got ${validBitsInLastByte}`
    );
  }
}

/**
 * Bit-level input stream.
 * Reads bits MSB first and stops at the last valid bit, never reading padding.
 */
export class BitInputStream {
  private data: Uint8Array;
  private bitLength: number;
  private bitIndex: number = 0;

  /**
   * @param validBitsInLastByte - defaults to 8 (every bit of every byte is data)
   * @throws MalformedPayloadError if the count does not fit the byte length
   */
  constructor(data: Uint8Array, validBitsInLastByte: number = data.length === 0 ? 0 : 8) {
    validatePacking(data.length, validBitsInLastByte);
    this.data = data;
    this.bitLength = data.length === 0 ? 0 : (data.length - 1) * 8 + validBitsInLastByte;
  }

  /**
   * Read a single bit from the stream.
   * @throws MalformedPayloadError when no valid bits remain
   */
  readBit(): Bit {
    if (this.bitIndex >= this.bitLength) {
      throw new MalformedPayloadError(
        `Read past end of payload (${this.bitLength} valid bits)`
      );
    }

    const byte = this.data[this.bitIndex >>> 3];
    const bit = (byte >>> (7 - (this.bitIndex & 7))) & 1;
    this.bitIndex++;
    return bit === 0 ? 0 : 1;
  }

  /**
   * Check if every valid bit has been read.
   */
  get isAtEnd(): boolean {
    return this.bitIndex >= this.bitLength;
  }

  /**
   * Get current position in bits.
   */
  get position(): number {
    return this.bitIndex;
  }

  /**
   * Get number of valid bits.
   */
  get size(): number {
    return this.bitLength;
  }
}

/**
 * Pack a bit sequence into bytes, MSB first, zero-padding the last byte.
 */
export function packBits(bits: Iterable<Bit>): PackedBits {
  const stream = new BitOutputStream();
  for (const bit of bits) {
    stream.writeBit(bit);
  }
  return stream.finish();
}

/**
 * Recover exactly the bits that {@link packBits} packed.
 */
export function unpackBits(bytes: Uint8Array, validBitsInLastByte: number): Bit[] {
  const stream = new BitInputStream(bytes, validBitsInLastByte);
  const bits: Bit[] = [];
  while (!stream.isAtEnd) {
    bits.push(stream.readBit());
  }
  return bits;
}

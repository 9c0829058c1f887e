import { describe, it, expect } from 'vitest';
import {
  BitOutputStream,
  BitInputStream,
  packBits,
  unpackBits,
} from '../src/core/bit-stream.js';
import type { Bit } from '../src/core/bits.js';
import { MalformedPayloadError } from '../src/errors.js';

describe('BitOutputStream', () => {
  it('should write a full byte MSB first', () => {
    const stream = new BitOutputStream();

    // Write 8 bits: 10110100
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(1);
    stream.writeBit(0);
    stream.writeBit(0);

    const result = stream.finish();
    expect(Array.from(result.bytes)).toEqual([0b10110100]);
    expect(result.validBitsInLastByte).toBe(8);
    expect(result.bitLength).toBe(8);
  });

  it('should pad a partial final byte and report its valid bits', () => {
    const stream = new BitOutputStream();

    // Write 5 bits: 10110
    stream.writeCode([1, 0, 1, 1, 0]);

    const result = stream.finish();
    expect(Array.from(result.bytes)).toEqual([0b10110000]);
    expect(result.validBitsInLastByte).toBe(5);
    expect(result.bitLength).toBe(5);
  });

  it('should write multiple bytes', () => {
    const stream = new BitOutputStream();

    for (let i = 0; i < 16; i++) {
      stream.writeBit(i % 2 === 0 ? 0 : 1);
    }

    const result = stream.finish();
    expect(Array.from(result.bytes)).toEqual([0b01010101, 0b01010101]);
    expect(result.validBitsInLastByte).toBe(8);
  });

  it('should concatenate codes across byte boundaries', () => {
    const stream = new BitOutputStream();
    stream.writeCode([1, 1, 0, 1, 0]);
    stream.writeCode([1, 0, 1]);
    stream.writeCode([1]);

    const result = stream.finish();
    expect(Array.from(result.bytes)).toEqual([0b11010101, 0b10000000]);
    expect(result.validBitsInLastByte).toBe(1);
    expect(result.bitLength).toBe(9);
  });

  it('should track bit count correctly', () => {
    const stream = new BitOutputStream();
    stream.writeCode([1, 0, 1]);

    expect(stream.bitCount).toBe(3);
    expect(stream.byteCount).toBe(0);

    stream.writeCode([0, 0, 0, 0, 0]);
    expect(stream.bitCount).toBe(8);
    expect(stream.byteCount).toBe(1);
  });

  it('should produce nothing for an empty stream', () => {
    const result = new BitOutputStream().finish();

    expect(result.bytes.length).toBe(0);
    expect(result.validBitsInLastByte).toBe(0);
    expect(result.bitLength).toBe(0);
  });

  it('should reset after finish', () => {
    const stream = new BitOutputStream();
    stream.writeCode([1, 1, 1]);
    stream.finish();

    stream.writeBit(1);
    const result = stream.finish();
    expect(Array.from(result.bytes)).toEqual([0b10000000]);
    expect(result.validBitsInLastByte).toBe(1);
  });
});

describe('BitInputStream', () => {
  it('should read single bits correctly', () => {
    const stream = new BitInputStream(new Uint8Array([0b10110100]));

    const bits: Bit[] = [];
    while (!stream.isAtEnd) {
      bits.push(stream.readBit());
    }
    expect(bits).toEqual([1, 0, 1, 1, 0, 1, 0, 0]);
  });

  it('should read multiple bytes', () => {
    const stream = new BitInputStream(new Uint8Array([0xff, 0x00]));

    for (let i = 0; i < 8; i++) {
      expect(stream.readBit()).toBe(1);
    }
    for (let i = 0; i < 8; i++) {
      expect(stream.readBit()).toBe(0);
    }
    expect(stream.isAtEnd).toBe(true);
  });

  it('should stop at the last valid bit instead of reading padding', () => {
    const stream = new BitInputStream(new Uint8Array([0b10100000]), 3);

    expect(stream.size).toBe(3);
    expect(stream.readBit()).toBe(1);
    expect(stream.readBit()).toBe(0);
    expect(stream.readBit()).toBe(1);
    expect(stream.isAtEnd).toBe(true);
    expect(() => stream.readBit()).toThrow(MalformedPayloadError);
  });

  it('should track position correctly', () => {
    const stream = new BitInputStream(new Uint8Array([0xff, 0x00]), 4);

    expect(stream.position).toBe(0);
    expect(stream.size).toBe(12);

    stream.readBit();
    expect(stream.position).toBe(1);
  });

  it('should reject valid-bit counts that do not fit the data', () => {
    expect(() => new BitInputStream(new Uint8Array(0), 1)).toThrow(MalformedPayloadError);
    expect(() => new BitInputStream(new Uint8Array([1]), 0)).toThrow(MalformedPayloadError);
    expect(() => new BitInputStream(new Uint8Array([1]), 9)).toThrow(MalformedPayloadError);
    expect(() => new BitInputStream(new Uint8Array([1]), 2.5)).toThrow(MalformedPayloadError);
  });

  it('should accept an empty stream', () => {
    const stream = new BitInputStream(new Uint8Array(0));

    expect(stream.size).toBe(0);
    expect(stream.isAtEnd).toBe(true);
  });
});

describe('packBits / unpackBits', () => {
  it('should preserve bits through pack/unpack', () => {
    const bits: Bit[] = [1, 0, 1, 1, 0, 0, 1, 0, 1, 1, 1, 0];
    const packed = packBits(bits);

    expect(Array.from(packed.bytes)).toEqual([0b10110010, 0b11100000]);
    expect(packed.validBitsInLastByte).toBe(4);
    expect(unpackBits(packed.bytes, packed.validBitsInLastByte)).toEqual(bits);
  });

  it('should handle every length from 0 to 17', () => {
    for (let length = 0; length <= 17; length++) {
      const bits: Bit[] = [];
      for (let i = 0; i < length; i++) {
        bits.push((i * 7) % 3 === 0 ? 1 : 0);
      }

      const packed = packBits(bits);
      expect(packed.bytes.length).toBe(Math.ceil(length / 8));
      expect(unpackBits(packed.bytes, packed.validBitsInLastByte)).toEqual(bits);
    }
  });

  it('should handle large sequences', () => {
    const bits: Bit[] = [];
    let state = 12345;
    for (let i = 0; i < 1003; i++) {
      state = (state * 1103515245 + 12345) >>> 0;
      bits.push((state >>> 16) & 1 ? 1 : 0);
    }

    const packed = packBits(bits);
    expect(packed.bitLength).toBe(1003);
    expect(packed.validBitsInLastByte).toBe(3);
    expect(unpackBits(packed.bytes, packed.validBitsInLastByte)).toEqual(bits);
  });
});

import { UnsupportedSymbolError } from '../errors.js';
import { BitOutputStream } from './bit-stream.js';
import type { Codebook } from './codebook.js';

/**
 * Packed code bits for one input.
 *
 * `bytes` and `validBitsInLastByte` only mean something together; both must
 * be stored or transmitted along with the tree.
 */
export interface CompressedPayload {
  /** Packed code bits, MSB first, final byte zero-padded */
  bytes: Uint8Array;

  /** Valid bits in the final byte: 1-8, or 0 when `bytes` is empty */
  validBitsInLastByte: number;

  /** Number of symbols encoded */
  symbolCount: number;
}

/**
 * Compression statistics. Informational only.
 */
export interface CompressionStats {
  /** Number of input symbols */
  symbolCount: number;

  /** Size of the input at 8 bits per symbol */
  originalBits: number;

  /** Number of code bits in the payload (padding excluded) */
  compressedBits: number;

  /** originalBits / compressedBits (0 for empty input) */
  compressionRatio: number;

  /** Percentage of bits saved (negative when the output is larger) */
  spaceSavings: number;

  /** originalBits - compressedBits */
  bitsSaved: number;
}

/**
 * The payload produced for an empty input.
 */
export function emptyPayload(): CompressedPayload {
  return { bytes: new Uint8Array(0), validBitsInLastByte: 0, symbolCount: 0 };
}

/**
 * Map every symbol through the codebook and pack the concatenated codes.
 *
 * @throws UnsupportedSymbolError if a symbol has no code
 */
export function encodeSymbols(symbols: readonly number[], codebook: Codebook): CompressedPayload {
  const stream = new BitOutputStream();
  for (let i = 0; i < symbols.length; i++) {
    const code = codebook.get(symbols[i]);
    if (code === undefined) {
      throw new UnsupportedSymbolError(symbols[i]);
    }
    stream.writeCode(code);
  }

  const { bytes, validBitsInLastByte } = stream.finish();
  return { bytes, validBitsInLastByte, symbolCount: symbols.length };
}

/**
 * Number of valid bits a payload carries.
 */
export function payloadBitLength(payload: CompressedPayload): number {
  if (payload.bytes.length === 0) return 0;
  return (payload.bytes.length - 1) * 8 + payload.validBitsInLastByte;
}

/**
 * Derive statistics, assuming 8-bit symbols for the original size.
 */
export function computeStats(symbolCount: number, compressedBits: number): CompressionStats {
  const originalBits = symbolCount * 8;
  const bitsSaved = originalBits - compressedBits;

  return {
    symbolCount,
    originalBits,
    compressedBits,
    compressionRatio: compressedBits > 0 ? originalBits / compressedBits : 0,
    spaceSavings: originalBits > 0 ? (bitsSaved / originalBits) * 100 : 0,
    bitsSaved,
  };
}

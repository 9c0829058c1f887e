/**
 * Stateless compress/decompress over the core pipeline.
 *
 * Every call builds its own frequency table, tree and codebook; nothing is
 * shared between calls.
 */

import { MalformedPayloadError } from './errors.js';
import { buildCodebook, type Codebook } from './core/codebook.js';
import { decodePayload } from './core/decoder.js';
import {
  type CompressedPayload,
  type CompressionStats,
  computeStats,
  emptyPayload,
  encodeSymbols,
  payloadBitLength,
} from './core/encoder.js';
import { countFrequencies } from './core/frequency.js';
import { buildHuffmanTree, type SerializedTree } from './core/huffman-tree.js';
import { type SymbolInput, symbolsToText, toSymbols } from './core/symbols.js';
import { serializeTree } from './format/tree-codec.js';

/**
 * Output of {@link compress}.
 */
export interface CompressionOutput {
  /** Packed code bits */
  payload: CompressedPayload;

  /** Tree needed to decode, or `null` when the input was empty */
  tree: SerializedTree | null;

  /** Code assigned to each distinct symbol (empty for empty input) */
  codebook: Codebook;

  /** Size statistics */
  stats: CompressionStats;
}

/**
 * Compress a symbol sequence with a Huffman code built for it.
 *
 * Empty input short-circuits to an empty payload and a `null` tree without
 * building anything.
 */
export function compress(input: SymbolInput): CompressionOutput {
  const symbols = toSymbols(input);

  if (symbols.length === 0) {
    return {
      payload: emptyPayload(),
      tree: null,
      codebook: new Map(),
      stats: computeStats(0, 0),
    };
  }

  const root = buildHuffmanTree(countFrequencies(symbols));
  const codebook = buildCodebook(root);
  const payload = encodeSymbols(symbols, codebook);

  return {
    payload,
    tree: serializeTree(root),
    codebook,
    stats: computeStats(symbols.length, payloadBitLength(payload)),
  };
}

/**
 * Reconstruct the symbols of a payload.
 *
 * @throws MalformedPayloadError if the payload does not decode cleanly
 * against the tree, or carries data while the tree is `null`
 */
export function decompress(payload: CompressedPayload, tree: SerializedTree | null): number[] {
  if (tree === null) {
    if (payload.bytes.length > 0 || payload.validBitsInLastByte !== 0 || payload.symbolCount > 0) {
      throw new MalformedPayloadError('Payload carries data but no tree was supplied');
    }
    return [];
  }
  return decodePayload(payload, tree);
}

/**
 * Like {@link decompress}, returning the symbols as a string of code points.
 */
export function decompressText(payload: CompressedPayload, tree: SerializedTree | null): string {
  return symbolsToText(decompress(payload, tree));
}

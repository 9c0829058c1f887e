/**
 * huffman-codec
 *
 * Lossless Huffman coding: optimal prefix codes, bit packing and a
 * self-describing container format.
 *
 * @example
 * ```typescript
 * import { compress, decompressText, HuffmanCompressor } from 'huffman-codec';
 *
 * // Payload + tree, for callers that store them separately
 * const { payload, tree, stats } = compress('abracadabra');
 * console.log(`${stats.compressedBits} bits instead of ${stats.originalBits}`);
 * console.log(decompressText(payload, tree)); // 'abracadabra'
 *
 * // One self-contained buffer
 * const compressor = new HuffmanCompressor();
 * const result = compressor.compress('abracadabra');
 * console.log(compressor.decompressText(result.data)); // 'abracadabra'
 * ```
 */

// Stateless API
export {
  compress,
  decompress,
  decompressText,
  type CompressionOutput,
} from './codec.js';

// Container compressor
export {
  HuffmanCompressor,
  type CompressorOptions,
  type CompressionResult,
  type CompressionReport,
  type ProgressInfo,
} from './compressor.js';

// Errors
export {
  HuffmanError,
  InvalidInputError,
  MalformedPayloadError,
  UnsupportedSymbolError,
  type HuffmanErrorCode,
} from './errors.js';

// Core coding (for advanced usage)
export {
  type Bit,
  LEFT_BIT,
  RIGHT_BIT,
  SINGLE_SYMBOL_CODE,
  type SymbolInput,
  MAX_SYMBOL,
  toSymbols,
  symbolsToText,
  type FrequencyTable,
  countFrequencies,
  shannonEntropy,
  type HuffmanNode,
  type HuffmanLeaf,
  type HuffmanInternal,
  type SerializedTree,
  type SerializedLeaf,
  type SerializedInternal,
  type TreeStats,
  buildHuffmanTree,
  getTreeStats,
  type Code,
  type Codebook,
  buildCodebook,
  codeToString,
  codebookToRecord,
  isPrefixFree,
  encodedBitLength,
  type PackedBits,
  BitOutputStream,
  BitInputStream,
  packBits,
  unpackBits,
  type CompressedPayload,
  type CompressionStats,
  encodeSymbols,
  computeStats,
  decodePayload,
} from './core/index.js';

// Formats (for advanced usage)
export {
  type CompressedHeader,
  type ContainerParts,
  MAGIC_BYTES,
  FORMAT_VERSION,
  HEADER_SIZE,
  createHeader,
  serializeHeader,
  deserializeHeader,
  combineHeaderAndPayload,
  splitHeaderAndPayload,
  isHuffmanContainer,
  TreeNodeRecordSchema,
  serializeTree,
  parseSerializedTree,
  treeToBytes,
  treeFromBytes,
} from './format/index.js';

// Utilities
export { symbolChecksum } from './utils/index.js';

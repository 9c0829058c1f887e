export { type Bit, LEFT_BIT, RIGHT_BIT, SINGLE_SYMBOL_CODE } from './bits.js';
export {
  type SymbolInput,
  MAX_SYMBOL,
  isValidSymbol,
  toSymbols,
  symbolsToText,
} from './symbols.js';
export {
  type FrequencyTable,
  countFrequencies,
  totalCount,
  shannonEntropy,
} from './frequency.js';
export { MinHeap } from './min-heap.js';
export {
  type HuffmanNode,
  type HuffmanLeaf,
  type HuffmanInternal,
  type SerializedTree,
  type SerializedLeaf,
  type SerializedInternal,
  type TreeStats,
  buildHuffmanTree,
  getTreeStats,
} from './huffman-tree.js';
export {
  type Code,
  type Codebook,
  buildCodebook,
  codeToString,
  codebookToRecord,
  isPrefixFree,
  encodedBitLength,
} from './codebook.js';
export {
  type PackedBits,
  BitOutputStream,
  BitInputStream,
  packBits,
  unpackBits,
  validatePacking,
} from './bit-stream.js';
export {
  type CompressedPayload,
  type CompressionStats,
  emptyPayload,
  encodeSymbols,
  payloadBitLength,
  computeStats,
} from './encoder.js';
export { decodePayload } from './decoder.js';

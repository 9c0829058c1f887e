import { MalformedPayloadError } from './errors.js';
import { buildCodebook, type Codebook, encodedBitLength } from './core/codebook.js';
import { decodePayload } from './core/decoder.js';
import {
  type CompressionStats,
  computeStats,
  encodeSymbols,
  payloadBitLength,
} from './core/encoder.js';
import { countFrequencies, shannonEntropy, totalCount } from './core/frequency.js';
import { buildHuffmanTree, getTreeStats, type TreeStats } from './core/huffman-tree.js';
import { type SymbolInput, symbolsToText, toSymbols } from './core/symbols.js';
import {
  createHeader,
  serializeHeader,
  splitHeaderAndPayload,
  combineHeaderAndPayload,
} from './format/header.js';
import { treeFromBytes, treeToBytes } from './format/tree-codec.js';
import { symbolChecksum } from './utils/checksum.js';

/**
 * Progress information callback payload.
 */
export interface ProgressInfo {
  stage: 'counting' | 'building' | 'encoding' | 'decoding' | 'verifying';
  current: number;
  total: number;
}

/**
 * Options for HuffmanCompressor.
 */
export interface CompressorOptions {
  /** Check the stored checksum after decoding (default: true) */
  verifyChecksum?: boolean;

  /** Progress callback */
  onProgress?: (progress: ProgressInfo) => void;
}

/**
 * Result of compression operation.
 */
export interface CompressionResult {
  /** Compressed data (header + tree + payload) */
  data: Uint8Array;

  /** Original size in bytes, at one byte per symbol */
  originalSize: number;

  /** Compressed size in bytes, container overhead included */
  compressedSize: number;

  /** Compression ratio (originalSize / compressedSize) */
  compressionRatio: number;

  /** Number of symbols in the input */
  symbolCount: number;

  /** Bit-level statistics of the payload alone */
  stats: CompressionStats;

  /** Code assigned to each distinct symbol */
  codebook: Codebook;

  /** Shape of the tree, or `null` for empty input */
  treeStats: TreeStats | null;
}

/**
 * Entropy and efficiency analysis of an input.
 */
export interface CompressionReport {
  stats: CompressionStats;
  treeStats: TreeStats | null;

  /** Shannon entropy in bits per symbol */
  entropy: number;

  /** Average bits per symbol actually spent by the Huffman code */
  averageBitsPerSymbol: number;

  /** entropy / averageBitsPerSymbol, in 0..1 (1 when there is nothing to gain) */
  efficiency: number;
}

/**
 * Huffman compressor producing self-contained buffers.
 *
 * Usage:
 * ```typescript
 * const compressor = new HuffmanCompressor();
 *
 * const result = compressor.compress('abracadabra');
 * const text = compressor.decompressText(result.data);
 * ```
 */
export class HuffmanCompressor {
  private options: CompressorOptions & { verifyChecksum: boolean };
  private lastStats: CompressionStats | null = null;

  constructor(options: CompressorOptions = {}) {
    this.options = { ...options, verifyChecksum: options.verifyChecksum ?? true };
  }

  /**
   * Compress input into a container buffer.
   *
   * @param input - Text, bytes or symbol values
   * @returns Compression result with data and statistics
   */
  compress(input: SymbolInput): CompressionResult {
    const symbols = toSymbols(input);
    const symbolCount = symbols.length;
    const checksum = symbolChecksum(symbols);

    this.reportProgress('counting', 0, symbolCount);
    const table = countFrequencies(symbols);
    this.reportProgress('counting', symbolCount, symbolCount);

    if (symbolCount === 0) {
      // Empty input - header only, no tree
      const headerBytes = serializeHeader(createHeader(0, 0, 0, 0, checksum));
      const stats = computeStats(0, 0);
      this.lastStats = stats;
      return {
        data: headerBytes,
        originalSize: 0,
        compressedSize: headerBytes.length,
        compressionRatio: 1,
        symbolCount: 0,
        stats,
        codebook: new Map(),
        treeStats: null,
      };
    }

    this.reportProgress('building', 0, table.size);
    const root = buildHuffmanTree(table);
    const codebook = buildCodebook(root);
    this.reportProgress('building', table.size, table.size);

    this.reportProgress('encoding', 0, symbolCount);
    const payload = encodeSymbols(symbols, codebook);
    const treeBytes = treeToBytes(root);
    this.reportProgress('encoding', symbolCount, symbolCount);

    const header = createHeader(
      symbolCount,
      payload.validBitsInLastByte,
      treeBytes.length,
      payload.bytes.length,
      checksum
    );
    const data = combineHeaderAndPayload(serializeHeader(header), treeBytes, payload.bytes);
    const stats = computeStats(symbolCount, payloadBitLength(payload));
    this.lastStats = stats;

    return {
      data,
      originalSize: symbolCount,
      compressedSize: data.length,
      compressionRatio: symbolCount / data.length,
      symbolCount,
      stats,
      codebook,
      treeStats: getTreeStats(root),
    };
  }

  /**
   * Decompress a container back to symbols.
   *
   * @param data - The compressed data (from compress())
   * @throws MalformedPayloadError if the container is corrupted
   */
  decompress(data: Uint8Array): number[] {
    const { header, tree, payload } = splitHeaderAndPayload(data);

    let symbols: number[];
    if (header.symbolCount === 0) {
      if (header.treeLength !== 0 || header.payloadLength !== 0) {
        throw new MalformedPayloadError('Empty container must not carry a tree or payload');
      }
      symbols = [];
    } else {
      this.reportProgress('decoding', 0, header.symbolCount);
      symbols = decodePayload(
        {
          bytes: payload,
          validBitsInLastByte: header.validBitsInLastByte,
          symbolCount: header.symbolCount,
        },
        treeFromBytes(tree)
      );
      this.reportProgress('decoding', header.symbolCount, header.symbolCount);
    }

    if (this.options.verifyChecksum) {
      this.reportProgress('verifying', 0, 1);
      const actual = symbolChecksum(symbols);
      if (actual !== header.checksum) {
        throw new MalformedPayloadError(
          `Checksum mismatch: expected 0x${header.checksum.toString(16)}, got 0x${actual.toString(16)}`
        );
      }
      this.reportProgress('verifying', 1, 1);
    }

    return symbols;
  }

  /**
   * Decompress a container whose symbols are text code points.
   */
  decompressText(data: Uint8Array): string {
    return symbolsToText(this.decompress(data));
  }

  /**
   * Measure how close the Huffman code gets to the entropy of the input.
   */
  analyze(input: SymbolInput): CompressionReport {
    const table = countFrequencies(toSymbols(input));
    const symbolCount = totalCount(table);

    if (symbolCount === 0) {
      return {
        stats: computeStats(0, 0),
        treeStats: null,
        entropy: 0,
        averageBitsPerSymbol: 0,
        efficiency: 1,
      };
    }

    const root = buildHuffmanTree(table);
    const codebook = buildCodebook(root);
    const compressedBits = encodedBitLength(codebook, table);
    const entropy = shannonEntropy(table);
    const averageBitsPerSymbol = compressedBits / symbolCount;

    return {
      stats: computeStats(symbolCount, compressedBits),
      treeStats: getTreeStats(root),
      entropy,
      averageBitsPerSymbol,
      efficiency: entropy > 0 ? entropy / averageBitsPerSymbol : 1,
    };
  }

  /**
   * Statistics of the most recent compress() call, or null before the first.
   */
  getLastStats(): CompressionStats | null {
    return this.lastStats;
  }

  /**
   * Report progress to the callback if provided.
   */
  private reportProgress(
    stage: ProgressInfo['stage'],
    current: number,
    total: number
  ): void {
    this.options.onProgress?.({ stage, current, total });
  }
}

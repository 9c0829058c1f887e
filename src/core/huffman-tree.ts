/**
 * Huffman tree construction.
 *
 * The tree is a tagged union of leaves and internal nodes. Frequencies are
 * kept on every node so the sum invariant can be checked; the decoder only
 * needs the shape, which is what {@link SerializedTree} describes.
 */

import { InvalidInputError } from '../errors.js';
import type { FrequencyTable } from './frequency.js';
import { MinHeap } from './min-heap.js';
import { isValidSymbol } from './symbols.js';

export interface HuffmanLeaf {
  readonly kind: 'leaf';
  readonly symbol: number;
  readonly frequency: number;
}

export interface HuffmanInternal {
  readonly kind: 'internal';
  readonly frequency: number;
  readonly left: HuffmanNode;
  readonly right: HuffmanNode;
}

export type HuffmanNode = HuffmanLeaf | HuffmanInternal;

export interface SerializedLeaf {
  readonly kind: 'leaf';
  readonly symbol: number;
}

export interface SerializedInternal {
  readonly kind: 'internal';
  readonly left: SerializedTree;
  readonly right: SerializedTree;
}

/**
 * Tree shape without frequencies. Enough to derive a codebook or decode;
 * any {@link HuffmanNode} is also a valid `SerializedTree`.
 */
export type SerializedTree = SerializedLeaf | SerializedInternal;

/**
 * Tree statistics.
 */
export interface TreeStats {
  /** Edges on the longest root-to-leaf path (0 for a single leaf) */
  height: number;

  /** Number of leaves, i.e. distinct symbols */
  leafCount: number;

  /** Number of internal (merge) nodes */
  internalNodeCount: number;

  /** Mean code length over distinct symbols, in bits */
  averageCodeLength: number;
}

interface QueueEntry {
  node: HuffmanNode;
  sequence: number;
}

function compareEntries(a: QueueEntry, b: QueueEntry): number {
  if (a.node.frequency !== b.node.frequency) {
    return a.node.frequency - b.node.frequency;
  }
  return a.sequence - b.sequence;
}

/**
 * Build a Huffman tree by greedy min-frequency merging.
 *
 * Tie-break: the queue orders by (frequency, sequence). Leaves are seeded in
 * ascending symbol order and numbered as they are pushed; every merged node
 * takes the next number. Among equal frequencies the lower symbol, and any
 * leaf over a later merge, is popped first. The first node popped becomes
 * the left child. The resulting tree depends only on the table's contents.
 *
 * @throws InvalidInputError for an empty table or a non-positive count
 */
export function buildHuffmanTree(table: FrequencyTable): HuffmanNode {
  if (table.size === 0) {
    throw new InvalidInputError('Cannot build a Huffman tree from an empty frequency table');
  }

  const symbols = Array.from(table.keys()).sort((a, b) => a - b);
  const leaves: HuffmanLeaf[] = symbols.map((symbol) => {
    const frequency = table.get(symbol) ?? 0;
    if (!isValidSymbol(symbol)) {
      throw new InvalidInputError(`Invalid symbol in frequency table: ${symbol}`);
    }
    if (!Number.isSafeInteger(frequency) || frequency < 1) {
      throw new InvalidInputError(
        `Invalid frequency for symbol ${symbol}: ${frequency} (expected a positive integer)`
      );
    }
    return { kind: 'leaf', symbol, frequency };
  });

  if (leaves.length === 1) {
    return leaves[0];
  }

  const queue = new MinHeap<QueueEntry>(compareEntries);
  let sequence = 0;
  for (const leaf of leaves) {
    queue.push({ node: leaf, sequence: sequence++ });
  }

  for (;;) {
    const left = queue.pop();
    const right = queue.pop();
    if (left === undefined) {
      break;
    }
    if (right === undefined) {
      return left.node;
    }

    const parent: HuffmanInternal = {
      kind: 'internal',
      frequency: left.node.frequency + right.node.frequency,
      left: left.node,
      right: right.node,
    };
    queue.push({ node: parent, sequence: sequence++ });
  }

  // Unreachable: the queue starts with at least two entries
  throw new InvalidInputError('Frequency table produced no tree');
}

/**
 * Compute height, node counts and average code length.
 */
export function getTreeStats(root: SerializedTree): TreeStats {
  let height = 0;
  let leafCount = 0;
  let internalNodeCount = 0;
  let totalCodeLength = 0;

  const stack: Array<{ node: SerializedTree; depth: number }> = [{ node: root, depth: 0 }];
  let entry = stack.pop();
  while (entry !== undefined) {
    const { node, depth } = entry;
    if (depth > height) height = depth;

    if (node.kind === 'leaf') {
      leafCount++;
      totalCodeLength += Math.max(depth, 1);
    } else {
      internalNodeCount++;
      stack.push({ node: node.right, depth: depth + 1 });
      stack.push({ node: node.left, depth: depth + 1 });
    }
    entry = stack.pop();
  }

  return {
    height,
    leafCount,
    internalNodeCount,
    averageCodeLength: totalCodeLength / leafCount,
  };
}

import { type Bit, LEFT_BIT, RIGHT_BIT, SINGLE_SYMBOL_CODE } from './bits.js';
import type { FrequencyTable } from './frequency.js';
import type { SerializedTree } from './huffman-tree.js';

/**
 * Code for one symbol, most significant (root-side) bit first.
 */
export type Code = readonly Bit[];

/**
 * Symbol-to-code mapping derived from a tree. Prefix-free by construction.
 */
export type Codebook = ReadonlyMap<number, Code>;

interface PathLink {
  readonly bit: Bit;
  readonly parent: PathLink | null;
}

function codeFromPath(path: PathLink | null): Bit[] {
  const code: Bit[] = [];
  for (let link = path; link !== null; link = link.parent) {
    code.push(link.bit);
  }
  return code.reverse();
}

/**
 * Walk the tree depth-first and record the path to every leaf.
 *
 * A tree made of a single leaf gets {@link SINGLE_SYMBOL_CODE}; internal
 * nodes never receive a code.
 */
export function buildCodebook(root: SerializedTree): Codebook {
  const codebook = new Map<number, Code>();

  if (root.kind === 'leaf') {
    codebook.set(root.symbol, SINGLE_SYMBOL_CODE);
    return codebook;
  }

  // Explicit stack: degenerate trees can be as deep as the alphabet is large.
  // Paths share their prefixes; a code is only copied out at its leaf.
  const stack: Array<{ node: SerializedTree; path: PathLink | null }> = [
    { node: root, path: null },
  ];
  let entry = stack.pop();
  while (entry !== undefined) {
    const { node, path } = entry;
    if (node.kind === 'leaf') {
      codebook.set(node.symbol, codeFromPath(path));
    } else {
      stack.push({ node: node.right, path: { bit: RIGHT_BIT, parent: path } });
      stack.push({ node: node.left, path: { bit: LEFT_BIT, parent: path } });
    }
    entry = stack.pop();
  }

  return codebook;
}

/**
 * Render a code as a string of '0' and '1'.
 */
export function codeToString(code: Code): string {
  return code.join('');
}

/**
 * Render a codebook as symbol-character → bit-string, ordered by symbol.
 */
export function codebookToRecord(codebook: Codebook): Record<string, string> {
  const record: Record<string, string> = {};
  const symbols = Array.from(codebook.keys()).sort((a, b) => a - b);
  for (const symbol of symbols) {
    const code = codebook.get(symbol);
    if (code !== undefined) {
      record[String.fromCodePoint(symbol)] = codeToString(code);
    }
  }
  return record;
}

/**
 * Check that no code is a prefix of another symbol's code.
 *
 * Sorting the rendered codes puts any prefix directly before a code it
 * prefixes, so only neighbours need comparing.
 */
export function isPrefixFree(codebook: Codebook): boolean {
  const codes = Array.from(codebook.values(), codeToString).sort();
  for (let i = 1; i < codes.length; i++) {
    if (codes[i].startsWith(codes[i - 1])) {
      return false;
    }
  }
  return true;
}

/**
 * Total number of bits needed to encode a stream with the given symbol
 * counts: Σ count × code length.
 */
export function encodedBitLength(codebook: Codebook, table: FrequencyTable): number {
  let bits = 0;
  for (const [symbol, count] of table) {
    const code = codebook.get(symbol);
    if (code !== undefined) {
      bits += count * code.length;
    }
  }
  return bits;
}

import { describe, it, expect } from 'vitest';
import {
  buildCodebook,
  codebookToRecord,
  codeToString,
  encodedBitLength,
  isPrefixFree,
  type Code,
} from '../src/core/codebook.js';
import { countFrequencies } from '../src/core/frequency.js';
import { buildHuffmanTree, type SerializedTree } from '../src/core/huffman-tree.js';
import { toSymbols } from '../src/core/symbols.js';

function codebookFor(text: string) {
  const table = countFrequencies(toSymbols(text));
  return { table, codebook: buildCodebook(buildHuffmanTree(table)) };
}

describe('buildCodebook', () => {
  it('should assign 0 to left edges and 1 to right edges', () => {
    const { codebook } = codebookFor('AAABBC');

    expect(codebookToRecord(codebook)).toEqual({ A: '0', B: '11', C: '10' });
  });

  it('should give a single symbol the one-bit code 0', () => {
    const { codebook } = codebookFor('AAAA');

    expect(codebookToRecord(codebook)).toEqual({ A: '0' });
  });

  it('should give every symbol of a uniform 8-symbol input a 3-bit code', () => {
    const { codebook } = codebookFor('ABCDEFGH');

    expect(codebookToRecord(codebook)).toEqual({
      A: '000',
      B: '001',
      C: '010',
      D: '011',
      E: '100',
      F: '101',
      G: '110',
      H: '111',
    });
  });

  it('should work from a tree without frequencies', () => {
    const tree: SerializedTree = {
      kind: 'internal',
      left: {
        kind: 'internal',
        left: { kind: 'leaf', symbol: 120 },
        right: { kind: 'leaf', symbol: 121 },
      },
      right: { kind: 'leaf', symbol: 122 },
    };

    expect(codebookToRecord(buildCodebook(tree))).toEqual({ x: '00', y: '01', z: '1' });
  });

  it('should produce prefix-free codes', () => {
    const samples = [
      'abracadabra',
      'she sells sea shells by the sea shore',
      'aaaaaaaaaaaaaaaabbbbbbbbccccdde',
      '0123456789abcdefghijklmnopqrstuvwxyz',
    ];

    for (const sample of samples) {
      const { codebook, table } = codebookFor(sample);
      expect(codebook.size).toBe(table.size);
      expect(isPrefixFree(codebook)).toBe(true);
    }
  });
});

describe('isPrefixFree', () => {
  it('should detect a code that prefixes another', () => {
    const codebook = new Map<number, Code>([
      [1, [0]],
      [2, [0, 1]],
      [3, [1]],
    ]);

    expect(isPrefixFree(codebook)).toBe(false);
  });

  it('should detect duplicate codes', () => {
    const codebook = new Map<number, Code>([
      [1, [1, 0]],
      [2, [1, 0]],
    ]);

    expect(isPrefixFree(codebook)).toBe(false);
  });
});

describe('encodedBitLength', () => {
  it('should sum count times code length', () => {
    const { codebook, table } = codebookFor('AAABBC');

    // 3*1 + 2*2 + 1*2
    expect(encodedBitLength(codebook, table)).toBe(9);
  });

  it('should equal the sum of merge weights (optimal cost)', () => {
    // Frequencies 1,1,2,3,5,8 merge as 2, 4, 7, 12, 20
    const table = new Map([
      [1, 1],
      [2, 1],
      [3, 2],
      [4, 3],
      [5, 5],
      [6, 8],
    ]);
    const codebook = buildCodebook(buildHuffmanTree(table));

    expect(encodedBitLength(codebook, table)).toBe(45);
  });

  it('should never exceed a fixed-width code or undercut the entropy bound', () => {
    const text = 'it was the best of times, it was the worst of times';
    const { codebook, table } = codebookFor(text);
    const n = text.length;
    const bits = encodedBitLength(codebook, table);

    let entropyBits = 0;
    for (const count of table.values()) {
      entropyBits -= count * Math.log2(count / n);
    }

    expect(bits).toBeLessThanOrEqual(n * Math.ceil(Math.log2(table.size)));
    expect(bits).toBeGreaterThanOrEqual(Math.floor(entropyBits));
    expect(bits).toBeLessThan(entropyBits + n);
  });
});

describe('codeToString', () => {
  it('should render bits in order', () => {
    expect(codeToString([1, 0, 0, 1])).toBe('1001');
    expect(codeToString([])).toBe('');
  });
});

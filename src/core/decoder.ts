import { MalformedPayloadError } from '../errors.js';
import { BitInputStream } from './bit-stream.js';
import { LEFT_BIT, SINGLE_SYMBOL_CODE } from './bits.js';
import type { CompressedPayload } from './encoder.js';
import type { SerializedInternal, SerializedTree } from './huffman-tree.js';

/**
 * Decode a payload by walking the tree one bit at a time.
 *
 * For a single-leaf tree every valid bit is one occurrence of the symbol,
 * and each bit must equal its one-bit code. Otherwise bit 0 descends left,
 * bit 1 descends right, and reaching a leaf emits its symbol and returns to
 * the root.
 *
 * @throws MalformedPayloadError if the bits stop mid-code, run out while
 * symbols are still declared, or decode to a different symbol count
 */
export function decodePayload(payload: CompressedPayload, tree: SerializedTree): number[] {
  const input = new BitInputStream(payload.bytes, payload.validBitsInLastByte);

  if (input.size === 0 && payload.symbolCount > 0) {
    throw new MalformedPayloadError(
      `Payload has no bits but declares ${payload.symbolCount} symbols`
    );
  }

  const symbols = tree.kind === 'leaf'
    ? decodeSingleSymbol(input, tree.symbol)
    : decodeWalk(input, tree);

  if (symbols.length !== payload.symbolCount) {
    throw new MalformedPayloadError(
      `Decoded ${symbols.length} symbols, payload declares ${payload.symbolCount}`
    );
  }
  return symbols;
}

function decodeSingleSymbol(input: BitInputStream, symbol: number): number[] {
  const expected = SINGLE_SYMBOL_CODE[0];
  const symbols: number[] = [];
  while (!input.isAtEnd) {
    const position = input.position;
    if (input.readBit() !== expected) {
      throw new MalformedPayloadError(
        `Unexpected bit at position ${position} for a single-symbol tree`
      );
    }
    symbols.push(symbol);
  }
  return symbols;
}

function decodeWalk(input: BitInputStream, root: SerializedInternal): number[] {
  const symbols: number[] = [];
  let node = root;

  while (!input.isAtEnd) {
    const next = input.readBit() === LEFT_BIT ? node.left : node.right;
    if (next.kind === 'leaf') {
      symbols.push(next.symbol);
      node = root;
    } else {
      node = next;
    }
  }

  if (node !== root) {
    throw new MalformedPayloadError(
      `Payload ends mid-code after ${symbols.length} symbols (${input.size} bits)`
    );
  }
  return symbols;
}

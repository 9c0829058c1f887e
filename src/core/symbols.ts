import { InvalidInputError } from '../errors.js';

/**
 * Largest symbol value accepted (the last Unicode code point).
 */
export const MAX_SYMBOL = 0x10ffff;

/**
 * Anything the codec can compress.
 *
 * - `string`: one symbol per Unicode code point
 * - `Uint8Array`: one symbol per byte
 * - `number[]`: symbols as given, each an integer in `0..MAX_SYMBOL`
 */
export type SymbolInput = string | Uint8Array | readonly number[];

export function isValidSymbol(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_SYMBOL;
}

/**
 * Normalize an input into a flat array of symbols.
 */
export function toSymbols(input: SymbolInput): number[] {
  if (typeof input === 'string') {
    const symbols: number[] = [];
    for (const char of input) {
      // for..of yields whole code points, so codePointAt(0) is always defined
      symbols.push(char.codePointAt(0) ?? 0);
    }
    return symbols;
  }

  if (input instanceof Uint8Array) {
    return Array.from(input);
  }

  for (let i = 0; i < input.length; i++) {
    if (!isValidSymbol(input[i])) {
      throw new InvalidInputError(
        `Invalid symbol at index ${i}: ${input[i]} (expected an integer in 0..${MAX_SYMBOL})`
      );
    }
  }
  return input.slice();
}

/**
 * Turn decoded symbols back into a string of code points.
 */
export function symbolsToText(symbols: readonly number[]): string {
  // String.fromCodePoint(...symbols) overflows the argument limit on large inputs
  const CHUNK = 8192;
  let text = '';
  for (let i = 0; i < symbols.length; i += CHUNK) {
    text += String.fromCodePoint(...symbols.slice(i, i + CHUNK));
  }
  return text;
}

import { describe, it, expect } from 'vitest';
import { MAX_SYMBOL, symbolsToText, toSymbols } from '../src/core/symbols.js';
import { InvalidInputError } from '../src/errors.js';

describe('toSymbols', () => {
  it('should split strings into code points', () => {
    expect(toSymbols('A\u{1F389}\u00e9')).toEqual([0x41, 0x1f389, 0xe9]);
  });

  it('should take bytes as-is', () => {
    expect(toSymbols(new Uint8Array([0, 128, 255]))).toEqual([0, 128, 255]);
  });

  it('should copy and validate number arrays', () => {
    const input = [1, 2, MAX_SYMBOL];
    const symbols = toSymbols(input);

    expect(symbols).toEqual(input);
    expect(symbols).not.toBe(input);
  });

  it('should reject values outside the symbol range', () => {
    expect(() => toSymbols([-1])).toThrow(InvalidInputError);
    expect(() => toSymbols([1.5])).toThrow(InvalidInputError);
    expect(() => toSymbols([MAX_SYMBOL + 1])).toThrow(InvalidInputError);
    expect(() => toSymbols([Number.NaN])).toThrow('Invalid symbol at index 0');
  });
});

describe('symbolsToText', () => {
  it('should rebuild the original string', () => {
    const text = 'naïve café \u{1F600} end';

    expect(symbolsToText(toSymbols(text))).toBe(text);
  });

  it('should handle inputs longer than one conversion chunk', () => {
    const text = 'abc\u{1F600}'.repeat(5000);

    expect(symbolsToText(toSymbols(text))).toBe(text);
  });
});

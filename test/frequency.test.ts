import { describe, it, expect } from 'vitest';
import { countFrequencies, shannonEntropy, totalCount } from '../src/core/frequency.js';
import { toSymbols } from '../src/core/symbols.js';

describe('countFrequencies', () => {
  it('should count each distinct symbol', () => {
    const table = countFrequencies(toSymbols('AABBC'));

    expect(table).toEqual(
      new Map([
        [65, 2],
        [66, 2],
        [67, 1],
      ])
    );
    expect(totalCount(table)).toBe(5);
  });

  it('should return an empty table for empty input', () => {
    const table = countFrequencies([]);

    expect(table.size).toBe(0);
    expect(totalCount(table)).toBe(0);
  });

  it('should count bytes', () => {
    const table = countFrequencies(new Uint8Array([0, 255, 0, 0]));

    expect(table.get(0)).toBe(3);
    expect(table.get(255)).toBe(1);
    expect(table.size).toBe(2);
  });
});

describe('shannonEntropy', () => {
  it('should be 1 bit for two equally likely symbols', () => {
    expect(shannonEntropy(countFrequencies(toSymbols('ab')))).toBe(1);
  });

  it('should be 1.5 bits for probabilities 1/2, 1/4, 1/4', () => {
    expect(shannonEntropy(countFrequencies(toSymbols('aabc')))).toBe(1.5);
  });

  it('should be 0 for a single symbol or no symbols', () => {
    expect(shannonEntropy(countFrequencies(toSymbols('aaaa')))).toBe(0);
    expect(shannonEntropy(countFrequencies([]))).toBe(0);
  });
});

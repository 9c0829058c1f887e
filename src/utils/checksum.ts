/**
 * 32-bit FNV-1a checksum over a symbol stream.
 *
 * Each symbol is folded in as three little-endian bytes (enough for any
 * code point), so byte input and the same values given as numbers hash
 * identically.
 */

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export function symbolChecksum(symbols: readonly number[]): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < symbols.length; i++) {
    const symbol = symbols[i];
    hash = Math.imul(hash ^ (symbol & 0xff), FNV_PRIME);
    hash = Math.imul(hash ^ ((symbol >>> 8) & 0xff), FNV_PRIME);
    hash = Math.imul(hash ^ ((symbol >>> 16) & 0xff), FNV_PRIME);
  }
  return hash >>> 0;
}

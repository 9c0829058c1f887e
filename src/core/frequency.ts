/**
 * Symbol frequency counting.
 */

/**
 * Occurrence count per distinct symbol. An empty input yields a table of
 * size 0; every present entry has a count of at least 1.
 */
export type FrequencyTable = ReadonlyMap<number, number>;

/**
 * Tally how often each symbol occurs.
 *
 * O(n) time, O(k) space for k distinct symbols.
 */
export function countFrequencies(symbols: Iterable<number>): FrequencyTable {
  const table = new Map<number, number>();
  for (const symbol of symbols) {
    table.set(symbol, (table.get(symbol) ?? 0) + 1);
  }
  return table;
}

/**
 * Total number of symbols the table was built from.
 */
export function totalCount(table: FrequencyTable): number {
  let total = 0;
  for (const count of table.values()) {
    total += count;
  }
  return total;
}

/**
 * Shannon entropy of the distribution, in bits per symbol.
 * This is the lower bound on the average code length of any prefix code.
 */
export function shannonEntropy(table: FrequencyTable): number {
  const total = totalCount(table);
  if (total === 0 || table.size < 2) return 0;

  let entropy = 0;
  for (const count of table.values()) {
    const p = count / total;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

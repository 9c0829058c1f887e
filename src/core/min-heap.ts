/**
 * Array-backed binary min-heap.
 *
 * Ordering comes entirely from the comparator; ties are resolved however
 * the comparator resolves them, so a total order gives deterministic pops.
 */
export class MinHeap<T> {
  private items: T[] = [];
  private compare: (a: T, b: T) => number;

  constructor(compare: (a: T, b: T) => number) {
    this.compare = compare;
  }

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  /**
   * Remove and return the smallest item, or `undefined` when empty.
   */
  pop(): T | undefined {
    const items = this.items;
    if (items.length === 0) return undefined;

    const top = items[0];
    const last = items.pop();
    if (items.length > 0 && last !== undefined) {
      items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  private siftUp(index: number): void {
    const items = this.items;
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >>> 1;
      if (this.compare(items[i], items[parent]) >= 0) break;
      [items[i], items[parent]] = [items[parent], items[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const items = this.items;
    const n = items.length;
    let i = index;

    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;

      if (left < n && this.compare(items[left], items[smallest]) < 0) {
        smallest = left;
      }
      if (right < n && this.compare(items[right], items[smallest]) < 0) {
        smallest = right;
      }
      if (smallest === i) return;

      [items[i], items[smallest]] = [items[smallest], items[i]];
      i = smallest;
    }
  }
}

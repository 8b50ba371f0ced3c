/**
 * Binary min-heap keyed by a numeric weight.
 *
 * Items with equal weight come out in insertion order, so a sequence of
 * inserts and extractions always yields the same result.
 */

interface HeapEntry<T> {
  item: T;
  weight: number;
  sequence: number;
}

export class MinHeap<T> {
  private entries: HeapEntry<T>[] = [];
  private nextSequence: number = 0;
  private weightOf: (item: T) => number;

  /**
   * @param weightOf - Returns the ordering weight of an item
   */
  constructor(weightOf: (item: T) => number) {
    this.weightOf = weightOf;
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Add an item. O(log n).
   */
  insert(item: T): void {
    const entry: HeapEntry<T> = {
      item,
      weight: this.weightOf(item),
      sequence: this.nextSequence++,
    };
    this.entries.push(entry);
    this.siftUp(this.entries.length - 1);
  }

  /**
   * Remove and return the lightest item. O(log n).
   * @throws Error if the heap is empty
   */
  extractMin(): T {
    const top = this.entries[0];
    if (top === undefined) {
      throw new Error('Cannot extract from an empty heap');
    }

    const last = this.entries.pop();
    if (last !== undefined && this.entries.length > 0) {
      this.entries[0] = last;
      this.siftDown(0);
    }

    return top.item;
  }

  /**
   * Return the lightest item without removing it.
   */
  peek(): T | undefined {
    return this.entries[0]?.item;
  }

  private less(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    if (a.weight !== b.weight) return a.weight < b.weight;
    return a.sequence < b.sequence;
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.entries[i], this.entries[parent])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.entries.length;
    let i = index;

    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;

      if (left < n && this.less(this.entries[left], this.entries[smallest])) {
        smallest = left;
      }
      if (right < n && this.less(this.entries[right], this.entries[smallest])) {
        smallest = right;
      }
      if (smallest === i) return;

      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.entries[a];
    this.entries[a] = this.entries[b];
    this.entries[b] = tmp;
  }
}

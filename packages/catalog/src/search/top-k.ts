/**
 * Keeps the best `k` items seen so far under `compare` (negative when the
 * first argument ranks higher). The worst kept item sits at the root of a
 * binary heap, so it is the pruning threshold.
 */
export class TopK<T> {
  private readonly heap: T[] = [];

  constructor(
    private readonly k: number,
    private readonly compare: (a: T, b: T) => number,
  ) {}

  get size(): number {
    return this.heap.length;
  }

  get full(): boolean {
    return this.heap.length >= this.k;
  }

  /** Lowest-ranked item kept, once the heap is full. */
  threshold(): T | undefined {
    return this.full ? this.heap[0] : undefined;
  }

  /** Returns false when `item` ranks below everything kept. */
  offer(item: T): boolean {
    if (!this.full) {
      this.heap.push(item);
      this.siftUp(this.heap.length - 1);
      return true;
    }
    if (this.k === 0 || this.compare(item, this.heap[0]) >= 0) {
      return false;
    }
    this.heap[0] = item;
    this.siftDown(0);
    return true;
  }

  /** Kept items, best first. */
  sorted(): T[] {
    return [...this.heap].sort(this.compare);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.compare(this.heap[i], this.heap[parent]) <= 0) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      let worst = i;
      const left = 2 * i + 1;
      const right = left + 1;
      if (left < n && this.compare(this.heap[left], this.heap[worst]) > 0) worst = left;
      if (right < n && this.compare(this.heap[right], this.heap[worst]) > 0) worst = right;
      if (worst === i) return;
      this.swap(i, worst);
      i = worst;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}

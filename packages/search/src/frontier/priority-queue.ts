/**
 * Binary min-heap ordered by a numeric priority.
 *
 * Only push and pop-min are supported. There is no decrease-key: callers
 * that find a better priority for an item push it again and skip the
 * outdated copy when it surfaces.
 */
export class PriorityQueue<T> {
  private heap: T[] = [];

  /** @param priorityOf - Smaller values are popped first */
  constructor(private readonly priorityOf: (item: T) => number) {}

  push(item: T): void {
    this.heap.push(item);
    this.bubbleUp(this.heap.length - 1);
  }

  /** Removes and returns the item with the smallest priority */
  pop(): T | undefined {
    const first = this.heap[0];
    const last = this.heap.pop();

    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }

    return first;
  }

  peek(): T | undefined {
    return this.heap[0];
  }

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  clear(): void {
    this.heap = [];
  }

  private less(a: number, b: number): boolean {
    return this.priorityOf(this.heap[a]!) < this.priorityOf(this.heap[b]!);
  }

  private swap(a: number, b: number): void {
    const item = this.heap[a]!;
    this.heap[a] = this.heap[b]!;
    this.heap[b] = item;
  }

  private bubbleUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(i, parent)) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private bubbleDown(index: number): void {
    let i = index;
    while (true) {
      const left = i * 2 + 1;
      const right = left + 1;
      let smallest = i;

      if (left < this.heap.length && this.less(left, smallest)) smallest = left;
      if (right < this.heap.length && this.less(right, smallest)) smallest = right;

      if (smallest === i) break;
      this.swap(smallest, i);
      i = smallest;
    }
  }
}

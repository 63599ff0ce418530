/**
 * Fixed-capacity heap that retains the `capacity` best items pushed into it.
 *
 * `precedes(a, b)` must be a strict total order: true when `a` ranks ahead of
 * `b`. The root holds the worst retained item so a newcomer only has to beat
 * it to get in.
 */
export class BoundedHeap<T> {
  private readonly items: T[] = [];

  constructor(
    readonly capacity: number,
    private readonly precedes: (a: T, b: T) => boolean
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedHeap capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Offer an item. Returns false when it was rejected for ranking below
   * every retained item of a full heap.
   */
  push(item: T): boolean {
    if (this.items.length < this.capacity) {
      this.items.push(item);
      this.siftUp(this.items.length - 1);
      return true;
    }
    if (!this.precedes(item, this.items[0])) {
      return false;
    }
    this.items[0] = item;
    this.siftDown(0);
    return true;
  }

  /**
   * Remove every item, best first
   */
  drain(): T[] {
    const out = new Array<T>(this.items.length);
    for (let i = out.length - 1; i >= 0; i--) {
      out[i] = this.items[0];
      const tail = this.items.pop();
      if (tail !== undefined && this.items.length > 0) {
        this.items[0] = tail;
        this.siftDown(0);
      }
    }
    return out;
  }

  // worst-at-root: a node must never precede its parent
  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.precedes(this.items[parent], this.items[i])) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.items.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let worst = i;
      if (left < n && this.precedes(this.items[worst], this.items[left])) worst = left;
      if (right < n && this.precedes(this.items[worst], this.items[right])) worst = right;
      if (worst === i) break;
      this.swap(i, worst);
      i = worst;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.items[a];
    this.items[a] = this.items[b];
    this.items[b] = tmp;
  }
}

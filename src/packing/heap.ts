/**
 * Binary heap over an array. `before(a, b)` returns true when `a` must come
 * out ahead of `b`.
 */
export class BinaryHeap<T> {
  private readonly data: T[] = [];

  constructor(private readonly before: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    if (a.length === 0) return undefined;
    const top = a[0];
    const last = a[a.length - 1];
    a.length -= 1;
    if (a.length > 0) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let first = i;

      if (l < n && this.before(a[l], a[first])) first = l;
      if (r < n && this.before(a[r], a[first])) first = r;
      if (first === i) return;

      [a[i], a[first]] = [a[first], a[i]];
      i = first;
    }
  }
}

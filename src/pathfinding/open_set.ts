/**
 * Binary min-heap over arbitrary entries.
 *
 * No decrease-key: callers push a fresh entry when a priority improves and
 * skip stale entries when they come out.
 */
export class MinHeap<T> {
  private items: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) { }

  get size(): number { return this.items.length; }

  push(item: T): void {
    const a = this.items;
    a.push(item);
    this.sift_up(a.length - 1);
  }

  pop(): T | undefined {
    const a = this.items;
    const top = a[0];
    const last = a.pop();
    if (a.length > 0 && last !== undefined) {
      a[0] = last;
      this.sift_down(0);
    }
    return top;
  }

  private swap(i: number, j: number): void {
    const a = this.items;
    const tmp = a[i];
    const other = a[j];
    if (tmp === undefined || other === undefined) return;
    a[i] = other;
    a[j] = tmp;
  }

  private at(i: number): T | undefined {
    return this.items[i];
  }

  private is_less(i: number, j: number): boolean {
    const x = this.at(i);
    const y = this.at(j);
    if (x === undefined || y === undefined) return false;
    return this.less(x, y);
  }

  private sift_up(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.is_less(i, p)) break;
      this.swap(i, p);
      i = p;
    }
  }

  private sift_down(i: number): void {
    const n = this.items.length;
    while (true) {
      let s = i;
      const l = i * 2 + 1;
      const r = l + 1;
      if (l < n && this.is_less(l, s)) s = l;
      if (r < n && this.is_less(r, s)) s = r;
      if (s === i) break;
      this.swap(i, s);
      i = s;
    }
  }
}

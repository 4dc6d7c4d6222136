/**
 * Array-backed work list that can be drained from either end.
 *
 * `takeLast()` gives stack order, `takeFirst()` queue order. Taking from the
 * head advances an index instead of shifting; the array is compacted once
 * the consumed prefix dominates it.
 *
 * @example
 * ```typescript
 * const work = WorkList.from([1, 2, 3]);
 * work.takeLast();  // 3
 * work.takeFirst(); // 1
 * ```
 */
export class WorkList<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  add(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove the most recently added item.
   */
  takeLast(): T | undefined {
    if (this.isEmpty) return undefined;
    const item = this.items.pop();
    if (this.isEmpty) this.clear();
    return item;
  }

  /**
   * Remove the oldest item.
   */
  takeFirst(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    if (this.head > 1000 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  clear(): void {
    this.items = [];
    this.head = 0;
  }

  static from<T>(items: Iterable<T>): WorkList<T> {
    const list = new WorkList<T>();
    for (const item of items) {
      list.add(item);
    }
    return list;
  }
}

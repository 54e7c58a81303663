/**
 * Mutable accumulator for the currently open window
 */

export class RecordWindow<T> {
  private records: T[] = [];
  private anchorAt: number | undefined;

  /** Records held in the window */
  get size(): number {
    return this.records.length;
  }

  /** Anchor of the open window, undefined when no window is open */
  get anchor(): number | undefined {
    return this.anchorAt;
  }

  /**
   * Start a new window. Only valid while empty: a retained suffix keeps
   * the anchor of the window it came from.
   */
  open(anchor: number): void {
    this.anchorAt = anchor;
  }

  /** Append `items[start..end)` in order */
  append(items: readonly T[], start = 0, end = items.length): void {
    for (let i = start; i < end; i++) {
      this.records.push(items[i]);
    }
  }

  /** Copy of the buffered records, oldest first */
  toArray(): T[] {
    return this.records.slice();
  }

  /**
   * Drop the first `count` records (the committed prefix). The rest move to
   * the front in order. Dropping everything closes the window.
   */
  discard(count: number): void {
    if (count >= this.records.length) {
      this.records = [];
      this.anchorAt = undefined;
      return;
    }
    if (count > 0) {
      this.records = this.records.slice(count);
    }
  }
}

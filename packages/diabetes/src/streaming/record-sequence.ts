/**
 * Versioned accumulator.
 *
 * Every version is a [start, end) range over an append-only arena shared
 * with the versions it was derived from. Appending pushes onto the arena
 * when this version owns its tail, and copies its own range into a fresh
 * arena when another version has already appended past it, so a version
 * somebody still holds never changes.
 */
export class RecordSequence<T> {
  private constructor(
    private readonly arena: T[],
    private readonly start: number,
    private readonly end: number
  ) {}

  static empty<T>(): RecordSequence<T> {
    return new RecordSequence<T>([], 0, 0);
  }

  static of<T>(items: readonly T[]): RecordSequence<T> {
    return new RecordSequence<T>(items.slice(), 0, items.length);
  }

  get length(): number {
    return this.end - this.start;
  }

  append(item: T): RecordSequence<T> {
    if (this.end === this.arena.length) {
      this.arena.push(item);
      return new RecordSequence(this.arena, this.start, this.end + 1);
    }

    const arena = this.arena.slice(this.start, this.end);
    arena.push(item);
    return new RecordSequence(arena, 0, arena.length);
  }

  appendAll(items: readonly T[], start = 0, end = items.length): RecordSequence<T> {
    let sequence: RecordSequence<T> = this;
    for (let i = start; i < end; i++) {
      sequence = sequence.append(items[i]);
    }
    return sequence;
  }

  /** Version without the first `count` items */
  drop(count: number): RecordSequence<T> {
    if (count >= this.length) {
      return RecordSequence.empty<T>();
    }
    if (count <= 0) {
      return this;
    }
    return new RecordSequence(this.arena, this.start + count, this.end);
  }

  /** Items oldest first */
  toArray(): T[] {
    return this.arena.slice(this.start, this.end);
  }
}

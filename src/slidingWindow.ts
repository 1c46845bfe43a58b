/**
 * Fixed-capacity FIFO buffer. When full, the oldest entry is evicted before
 * the new one is appended, so insertion order (oldest first) is preserved.
 */
export class SlidingWindow<T> {
  private readonly _capacity: number;
  private readonly _entries: T[] = [];

  /**
   * @param capacity - Maximum number of entries (must be a positive integer).
   * @throws {RangeError} When `capacity` is not a positive integer.
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError('capacity must be a positive integer');
    }
    this._capacity = capacity;
  }

  push(value: T): void {
    if (this._entries.length >= this._capacity) {
      this._entries.shift();
    }
    this._entries.push(value);
  }

  clear(): void {
    this._entries.length = 0;
  }

  get size(): number {
    return this._entries.length;
  }

  get capacity(): number {
    return this._capacity;
  }

  /** Oldest retained entry, or `undefined` when empty. */
  first(): T | undefined {
    return this._entries[0];
  }

  /** Newest entry, or `undefined` when empty. */
  last(): T | undefined {
    return this._entries[this._entries.length - 1];
  }

  /** Read-only view of the entries, oldest first. */
  values(): ReadonlyArray<T> {
    return this._entries;
  }
}

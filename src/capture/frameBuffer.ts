/**
 * Capacity-one handoff with overwrite semantics. A value that is not taken before
 * the next `offer` is superseded and counted as dropped.
 */
export class LatestFrameBuffer<T> {
  private value: T | null = null;
  private superseded = 0;

  offer(value: T): void {
    if (this.value !== null) this.superseded += 1;
    this.value = value;
  }

  /** Returns the pending value and empties the slot. */
  take(): T | null {
    const value = this.value;
    this.value = null;
    return value;
  }

  peek(): T | null {
    return this.value;
  }

  clear(): void {
    this.value = null;
  }

  get dropped(): number {
    return this.superseded;
  }
}

/**
 * A single reference cell updated by compare-and-swap on reference identity.
 * Every write publishes a whole value; readers never see a partial update.
 */
export class AtomicReference<T> {
  constructor(private value: T) {}

  get(): T {
    return this.value;
  }

  set(next: T): void {
    this.value = next;
  }

  /** Returns false when the cell no longer holds `expected`: a lost race. */
  compareAndSet(expected: T, next: T): boolean {
    if (this.value !== expected) return false;
    this.value = next;
    return true;
  }
}

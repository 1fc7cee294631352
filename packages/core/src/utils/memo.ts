/**
 * One-time async computation. Concurrent callers share the in-flight promise;
 * the first success is kept for the slot's lifetime. A failure is handed to
 * everyone waiting on that attempt and the next call computes again.
 */
export class MemoSlot<T> {
  private settled: { value: T } | null = null;
  private inflight: Promise<T> | null = null;

  constructor(initial?: T) {
    if (initial !== undefined) this.settled = { value: initial };
  }

  computeOrUseCached(compute: () => Promise<T>): Promise<T> {
    if (this.settled) return Promise.resolve(this.settled.value);
    if (!this.inflight) {
      this.inflight = compute().then(
        (value) => {
          this.settled = { value };
          this.inflight = null;
          return value;
        },
        (err: unknown) => {
          this.inflight = null;
          throw err;
        }
      );
    }
    return this.inflight;
  }

  peek(): T | undefined {
    return this.settled?.value;
  }

  get isComputed(): boolean {
    return this.settled !== null;
  }
}

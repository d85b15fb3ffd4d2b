/**
 * Memoizes one asynchronous load until cleared.
 *
 * The in-flight promise is stored, so concurrent callers share a single load.
 * After `clear()` a load that was already running can still settle for its
 * own callers but never repopulates the slot. Rejections are not cached.
 */
export class MemoSlot<T> {
  private pending: Promise<T> | null = null;

  constructor(private readonly loader: () => Promise<T>) {}

  get(): Promise<T> {
    if (this.pending) {
      return this.pending;
    }

    const load: Promise<T> = this.loader().catch((error: unknown) => {
      if (this.pending === load) {
        this.pending = null;
      }
      throw error;
    });
    this.pending = load;
    return load;
  }

  clear(): void {
    this.pending = null;
  }

  get isPopulated(): boolean {
    return this.pending !== null;
  }
}

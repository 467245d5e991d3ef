/**
 * Single-flight execution - at most one in-progress call per key.
 * Callers arriving while a call is pending share its promise; once it
 * settles the key is free again.
 */
export class SingleFlight<TKey, TResult> {
  private pending = new Map<string, Promise<TResult>>();

  /**
   * Run `fn` for `key` unless a call for the same key is already pending,
   * in which case that call's promise is returned.
   */
  execute(key: TKey, fn: () => Promise<TResult>): Promise<TResult> {
    const keyStr = this.serializeKey(key);

    const existing = this.pending.get(keyStr);
    if (existing) {
      return existing;
    }

    const promise = Promise.resolve()
      .then(fn)
      .finally(() => {
        this.pending.delete(keyStr);
      });

    this.pending.set(keyStr, promise);
    return promise;
  }

  isPending(key: TKey): boolean {
    return this.pending.has(this.serializeKey(key));
  }

  /**
   * Get the number of pending calls.
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  private serializeKey(key: TKey): string {
    if (typeof key === 'string') {
      return key;
    }
    return JSON.stringify(key);
  }
}

/**
 * Per-document mutual exclusion.
 *
 * Every tool call that reads or writes a document runs inside `withLock` for that
 * document's name, so load-modify-save sequences on one file never interleave.
 * Calls on different names proceed in parallel.
 */
export class DocumentLock {
  private _tails = new Map<string, Promise<void>>();

  async withLock<T>(names: string | string[], task: () => Promise<T>): Promise<T> {
    // Sorted, de-duplicated acquisition order keeps multi-document calls deadlock free.
    const keys = [...new Set(Array.isArray(names) ? names : [names])].sort();
    const releases: Array<() => void> = [];
    try {
      for (const key of keys) {
        releases.push(await this.acquire(key));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) release();
    }
  }

  /** Number of names with a holder or waiters. */
  get activeCount(): number {
    return this._tails.size;
  }

  private async acquire(key: string): Promise<() => void> {
    const previous = this._tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>(resolve => { release = resolve; });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);
    await previous;
    return () => {
      release();
      if (this._tails.get(key) === tail) this._tails.delete(key);
    };
  }
}

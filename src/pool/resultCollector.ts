/**
 * Single-writer-per-key result map. Workers only ever report through record();
 * a second write for the same index is a scheduling bug and throws.
 */
export class ResultCollector<T> {
  private readonly results = new Map<number, T>();

  record(index: number, value: T): void {
    if (this.results.has(index)) {
      throw new Error(`Result for task ${index} recorded twice`);
    }
    this.results.set(index, value);
  }

  /** Snapshot ordered by ascending index, independent of completion order. */
  toSortedMap(): Map<number, T> {
    const keys = [...this.results.keys()].sort((a, b) => a - b);
    const sorted = new Map<number, T>();
    for (const key of keys) {
      const value = this.results.get(key);
      if (value !== undefined) sorted.set(key, value);
    }
    return sorted;
  }
}

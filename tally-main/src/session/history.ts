export interface HistoryEntry {
  input: string;
  result: number;
}

/** Fixed-capacity FIFO of evaluated statements; the oldest entry is evicted first. */
export class History {
  private entries: HistoryEntry[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  push(entry: HistoryEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  list(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

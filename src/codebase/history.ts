import type { HistoryEntry } from "./types.js";

/**
 * Bounded FIFO of completed exchanges. Entries are never changed after
 * append; the oldest is evicted first.
 */
export class ConversationHistory {
  private entries: HistoryEntry[] = [];
  private nextIndex = 0;

  constructor(
    readonly maxEntries = 4,
    readonly entryChars = 500
  ) {
    if (!Number.isInteger(maxEntries) || maxEntries < 0) {
      throw new Error(`Invalid history length: ${maxEntries}`);
    }
    if (!Number.isInteger(entryChars) || entryChars <= 0) {
      throw new Error(`Invalid history entry cap: ${entryChars}`);
    }
  }

  /** Store an exchange, capping query and answer to entryChars */
  append(query: string, answer: string): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      index: this.nextIndex++,
      query: query.slice(0, this.entryChars),
      answer: answer.slice(0, this.entryChars),
    });

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries = this.entries.slice(this.entries.length - this.maxEntries);
    }
    return entry;
  }

  /** Entries oldest first */
  render(): readonly HistoryEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}

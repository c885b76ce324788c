import type { MemoryPort, MemoryRecord } from "./MemoryPort.js";

/**
 * Process-local memory with keyword-overlap search.
 * Matches are ranked by shared terms, newest first on ties.
 */
export class InMemoryMemory implements MemoryPort {
  private readonly records: MemoryRecord[] = [];
  private readonly maxRecords: number;

  constructor(options: { maxRecords?: number } = {}) {
    this.maxRecords = options.maxRecords ?? 5_000;
  }

  async append(record: MemoryRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record }));
    if (this.records.length > this.maxRecords) {
      this.records.shift();
    }
  }

  async search(query: string, limit: number): Promise<MemoryRecord[]> {
    const terms = tokenize(query);
    if (terms.size === 0 || limit <= 0) return [];

    const scored: Array<{ record: MemoryRecord; score: number; index: number }> = [];
    this.records.forEach((record, index) => {
      let score = 0;
      for (const term of tokenize(record.content)) {
        if (terms.has(term)) score++;
      }
      if (score > 0) scored.push({ record, score, index });
    });

    scored.sort((a, b) => b.score - a.score || b.index - a.index);
    return scored.slice(0, limit).map((s) => s.record);
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records.length = 0;
  }
}

function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter((t) => t.length > 2),
  );
}

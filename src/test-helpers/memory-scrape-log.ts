import type { ScrapeLogEntry, ScrapeLogRepository } from '../db/scrape-log.js';

export class MemoryScrapeLogRepository implements ScrapeLogRepository {
  readonly entries: ScrapeLogEntry[] = [];
  failWith: Error | null = null;

  async record(entry: ScrapeLogEntry): Promise<number> {
    if (this.failWith) throw this.failWith;
    this.entries.push(entry);
    return this.entries.length;
  }

  async verifyWritable(): Promise<boolean> {
    return this.failWith === null;
  }
}

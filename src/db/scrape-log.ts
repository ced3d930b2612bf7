import { eq } from 'drizzle-orm';
import { errorMessage } from '../errors.js';
import type { Database } from './connection.js';
import { scrapeLogs, type NewScrapeLogRow } from './schema.js';

export type ScrapeStatus = 'started' | 'completed' | 'failed';

export interface ScrapeLogEntry {
  source: string;
  scrapeType: string;
  status: ScrapeStatus;
  startedAt: Date;
  completedAt?: Date | null;
  itemsProcessed: number;
  itemsFailed?: number;
  errorMessage?: string | null;
  metadata?: Record<string, unknown>;
}

/**
 * Audit trail of pipeline runs.
 */
export interface ScrapeLogRepository {
  /** Insert a row and return its id */
  record(entry: ScrapeLogEntry): Promise<number>;
  /** Insert a throwaway row and delete it again */
  verifyWritable(): Promise<boolean>;
}

export function toScrapeLogRow(entry: ScrapeLogEntry): NewScrapeLogRow {
  return {
    source: entry.source,
    scrapeType: entry.scrapeType,
    status: entry.status,
    startedAt: entry.startedAt,
    completedAt: entry.completedAt ?? null,
    itemsProcessed: entry.itemsProcessed,
    itemsFailed: entry.itemsFailed ?? 0,
    errorMessage: entry.errorMessage ?? null,
    scrapeMetadata: entry.metadata ?? null,
  };
}

export class DrizzleScrapeLogRepository implements ScrapeLogRepository {
  private db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async record(entry: ScrapeLogEntry): Promise<number> {
    const [row] = await this.db
      .insert(scrapeLogs)
      .values(toScrapeLogRow(entry))
      .returning({ id: scrapeLogs.id });

    if (!row) {
      throw new Error('Insert into scrape_logs returned no row');
    }
    return row.id;
  }

  async verifyWritable(): Promise<boolean> {
    try {
      const id = await this.record({
        source: 'test',
        scrapeType: 'connection_test',
        status: 'completed',
        startedAt: new Date(),
        itemsProcessed: 0,
      });
      await this.db.delete(scrapeLogs).where(eq(scrapeLogs.id, id));
      console.log(`[DB] Write test succeeded (row ${id} removed)`);
      return true;
    } catch (error) {
      console.error(`[DB] Write test failed: ${errorMessage(error)}`);
      return false;
    }
  }
}

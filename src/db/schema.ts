import {
  pgTable,
  serial,
  varchar,
  integer,
  text,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// ============================================================================
// SCRAPE LOG (one row per pipeline run)
// ============================================================================

export const scrapeLogs = pgTable('scrape_logs', {
  id: serial('id').primaryKey(),
  source: varchar('source', { length: 50 }).notNull().default('wahapedia'),
  scrapeType: varchar('scrape_type', { length: 50 }).notNull(), // 'full', 'partial', 'connection_test'
  status: varchar('status', { length: 20 }).notNull(), // 'started', 'completed', 'failed'
  startedAt: timestamp('started_at').notNull(),
  completedAt: timestamp('completed_at'),
  itemsProcessed: integer('items_processed').default(0),
  itemsFailed: integer('items_failed').default(0),
  errorMessage: text('error_message'),
  scrapeMetadata: jsonb('scrape_metadata').$type<Record<string, unknown>>(),
}, (table) => ({
  startedIdx: index('idx_scrape_logs_date').on(table.startedAt),
}));

export type ScrapeLogRow = typeof scrapeLogs.$inferSelect;
export type NewScrapeLogRow = typeof scrapeLogs.$inferInsert;

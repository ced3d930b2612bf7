import { describe, it, expect } from 'vitest';
import { toScrapeLogRow } from './scrape-log.js';

describe('toScrapeLogRow', () => {
  it('maps an entry onto the scrape_logs columns', () => {
    const startedAt = new Date('2024-06-01T10:00:00Z');
    const completedAt = new Date('2024-06-01T10:05:00Z');

    expect(toScrapeLogRow({
      source: 'wahapedia',
      scrapeType: 'full',
      status: 'completed',
      startedAt,
      completedAt,
      itemsProcessed: 42,
      itemsFailed: 2,
      metadata: { versionId: '10th' },
    })).toEqual({
      source: 'wahapedia',
      scrapeType: 'full',
      status: 'completed',
      startedAt,
      completedAt,
      itemsProcessed: 42,
      itemsFailed: 2,
      errorMessage: null,
      scrapeMetadata: { versionId: '10th' },
    });
  });

  it('fills optional columns with empty values', () => {
    const row = toScrapeLogRow({
      source: 'test',
      scrapeType: 'connection_test',
      status: 'completed',
      startedAt: new Date('2024-06-01T10:00:00Z'),
      itemsProcessed: 0,
    });

    expect(row.completedAt).toBeNull();
    expect(row.itemsFailed).toBe(0);
    expect(row.errorMessage).toBeNull();
    expect(row.scrapeMetadata).toBeNull();
  });
});

import { errorMessage } from '../../errors.js';
import type { ScraperPublisher } from '../../bus/publisher.js';
import type { ScraperSource } from '../sources/source.js';
import type { StageName } from '../types.js';

export interface StageContext {
  source: ScraperSource;
  publisher: ScraperPublisher;
}

export interface StageResult<T> {
  stage: StageName;
  records: T[];
  /** Input items the stage attempted */
  total: number;
  /** Items skipped after a fetch or parse failure */
  failed: number;
  /** Set when the stage could not run at all */
  error: string | null;
}

export interface ItemStage<I, T> {
  stage: StageName;
  items: readonly I[];
  label: (item: I) => string;
  extract: (item: I) => Promise<readonly T[]>;
  publish: (records: readonly T[]) => Promise<boolean>;
}

/**
 * Run one extraction stage over its input items, one at a time.
 *
 * Publishes `started`, then the batch (only when it has records), then
 * `completed` with `{task, count, failed, total}`. A failing item is logged
 * and skipped. Status messages go out even for zero items.
 */
export async function runItemStage<I, T>(
  publisher: ScraperPublisher,
  { stage, items, label, extract, publish }: ItemStage<I, T>
): Promise<StageResult<T>> {
  const prefix = `[Stage:${stage}]`;
  await publisher.publishStatus('started', { task: stage, total: items.length });

  const records: T[] = [];
  let failed = 0;

  for (const item of items) {
    try {
      records.push(...await extract(item));
    } catch (error) {
      failed++;
      console.warn(`${prefix} Skipping ${label(item)}: ${errorMessage(error)}`);
    }
  }

  if (records.length > 0) {
    await publish(records);
  }

  console.log(`${prefix} ${records.length} record(s) from ${items.length - failed}/${items.length} item(s)`);
  await publisher.publishStatus('completed', {
    task: stage,
    count: records.length,
    failed,
    total: items.length,
  });

  return { stage, records, total: items.length, failed, error: null };
}

/**
 * Result of a stage that never ran because its own input could not be loaded.
 */
export async function failStage<T>(
  publisher: ScraperPublisher,
  stage: StageName,
  error: unknown
): Promise<StageResult<T>> {
  console.error(`[Stage:${stage}] Failed: ${errorMessage(error)}`);
  await publisher.publishError(stage, error);
  return { stage, records: [], total: 0, failed: 0, error: errorMessage(error) };
}

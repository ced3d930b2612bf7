import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../../config.js';
import { createDatabase, type DatabaseHandle } from '../../db/connection.js';
import { DrizzleScrapeLogRepository } from '../../db/scrape-log.js';
import { ExtractionPipeline, type PipelineSummary } from '../../scraper/pipeline.js';
import { createSource } from '../../scraper/sources/index.js';
import { VersionedUrlResolver } from '../../scraper/url-resolver.js';
import { isStageName, STAGE_NAMES, type StageName } from '../../scraper/types.js';
import { createBus, createFetcher, openBus } from '../runtime.js';

interface RunOptions {
  version?: string;
  faction?: string[];
  stages?: StageName[];
  db: boolean;
}

function collectStage(value: string, previous: StageName[] = []): StageName[] {
  if (!isStageName(value)) {
    throw new InvalidArgumentError(`Unknown stage "${value}". Stages: ${STAGE_NAMES.join(', ')}`);
  }
  return [...previous, value];
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function printSummary(summary: PipelineSummary): void {
  console.log('');
  console.log(`Run ${summary.status} for ${summary.versionId}${summary.partial ? ' (partial)' : ''}`);
  for (const stage of STAGE_NAMES) {
    const result = summary.stages[stage];
    if (!result) continue;
    const mark = result.error ? '✗' : result.failed > 0 ? '!' : '✓';
    const detail = result.error ?? `${result.count} record(s), ${result.failed}/${result.total} skipped`;
    console.log(`  ${mark} ${stage.padEnd(13)} ${detail}`);
  }
}

export const runCommand = new Command('run')
  .description('Run the extraction pipeline and publish the results')
  .option('-v, --version <id>', 'Game version id (e.g. 10th)')
  .option('-f, --faction <code>', 'Limit to a faction code or name (repeatable)', collect)
  .option('-s, --stages <stage>', `Run a stage and its prerequisites (repeatable: ${STAGE_NAMES.join(', ')})`, collectStage)
  .option('--no-db', 'Do not write a scrape log row')
  .action(async (options: RunOptions) => {
    const config = loadConfig();
    const versionId = options.version ?? config.versionId;

    const bus = createBus(config);
    if (!await openBus(bus, config)) {
      process.exitCode = 1;
      return;
    }

    let database: DatabaseHandle | null = null;
    try {
      if (options.db && config.databaseUrl) {
        database = createDatabase(config.databaseUrl);
      } else if (options.db) {
        console.log('DATABASE_URL not set, scrape log disabled');
      }

      const source = createSource(config.service, {
        fetcher: createFetcher(config),
        resolver: new VersionedUrlResolver(versionId),
      });
      const pipeline = new ExtractionPipeline({
        source,
        bus,
        scrapeLog: database ? new DrizzleScrapeLogRepository(database.db) : null,
      });

      const summary = await pipeline.run({ factions: options.faction, stages: options.stages });
      printSummary(summary);

      if (summary.status === 'failed') {
        process.exitCode = 1;
      }
    } finally {
      await bus.close();
      await database?.close();
    }
  });

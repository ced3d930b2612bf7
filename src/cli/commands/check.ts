import { Command } from 'commander';
import { loadConfig } from '../../config.js';
import { maskRedisUrl } from '../../bus/connection.js';
import { createDatabase } from '../../db/connection.js';
import { DrizzleScrapeLogRepository } from '../../db/scrape-log.js';
import { createBus, parsePositiveInt } from '../runtime.js';

function report(label: string, ok: boolean): void {
  console.log(`${ok ? '✓' : '✗'} ${label}`);
}

export const checkCommand = new Command('check')
  .description('Check Redis (ping and publish/subscribe) and the database (write test)')
  .option('--timeout <ms>', 'Publish/subscribe round trip timeout', parsePositiveInt, 5000)
  .action(async (options: { timeout: number }) => {
    const config = loadConfig();
    let healthy = true;

    console.log(`Version: ${config.versionId}  Source: ${config.service}`);

    const bus = createBus(config);
    try {
      const connected = await bus.open();
      report(`Redis reachable at ${maskRedisUrl(config.redisUrl)}`, connected);
      healthy &&= connected;

      if (connected) {
        const roundTrip = await bus.selfTest(options.timeout);
        report('Publish/subscribe round trip', roundTrip);
        healthy &&= roundTrip;
      }
    } finally {
      await bus.close();
    }

    if (config.databaseUrl) {
      const database = createDatabase(config.databaseUrl);
      try {
        const writable = await new DrizzleScrapeLogRepository(database.db).verifyWritable();
        report('Database write test', writable);
        healthy &&= writable;
      } finally {
        await database.close();
      }
    } else {
      console.log('- Database check skipped (DATABASE_URL not set)');
    }

    if (!healthy) {
      process.exitCode = 1;
    }
  });

import { Command } from 'commander';
import { loadConfig } from '../../config.js';
import type { BusChannel } from '../../bus/channels.js';
import { createBus, openBus, parseChannel, parsePositiveInt } from '../runtime.js';

export const recentCommand = new Command('recent')
  .description('Print the buffered messages of a channel, newest first')
  .argument('<channel>', 'Channel name, e.g. scraper:faction:discovered', parseChannel)
  .option('-n, --limit <count>', 'Number of messages', parsePositiveInt, 10)
  .option('--json', 'Print full envelopes as JSON')
  .action(async (channel: BusChannel, options: { limit: number; json?: boolean }) => {
    const config = loadConfig();
    const bus = createBus(config);
    if (!await openBus(bus, config)) {
      process.exitCode = 1;
      return;
    }

    try {
      const envelopes = await bus.recent(channel, options.limit);
      if (envelopes.length === 0) {
        console.log(`No recent messages on ${channel}`);
        return;
      }

      for (const envelope of envelopes) {
        if (options.json) {
          console.log(JSON.stringify(envelope, null, 2));
        } else {
          const count = envelope.count === undefined ? '' : ` count=${envelope.count}`;
          console.log(`[${envelope.timestamp}] ${envelope.type}${count} ${envelope.status ?? ''}`.trimEnd());
        }
      }
    } finally {
      await bus.close();
    }
  });

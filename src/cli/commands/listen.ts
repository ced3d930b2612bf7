import { Command } from 'commander';
import { loadConfig } from '../../config.js';
import { ALL_CHANNELS, type BusChannel } from '../../bus/channels.js';
import type { Envelope } from '../../bus/envelope.js';
import { createBus, openBus, parseChannel } from '../runtime.js';

function collectChannel(value: string, previous: BusChannel[] = []): BusChannel[] {
  return [...previous, parseChannel(value)];
}

function printEnvelope(envelope: Envelope, channel: string): void {
  const count = envelope.count === undefined ? '' : ` count=${envelope.count}`;
  const status = envelope.status === undefined ? '' : ` status=${envelope.status}`;
  console.log(`[${envelope.timestamp}] ${channel} ${envelope.type}${count}${status}`);
  if (envelope.details) {
    console.log(`  ${JSON.stringify(envelope.details)}`);
  }
}

export const listenCommand = new Command('listen')
  .description('Print messages from scraper channels until interrupted')
  .argument('[channels...]', 'Channels to listen on (default: all scraper channels)', collectChannel)
  .action(async (selected: BusChannel[] | undefined) => {
    const config = loadConfig();
    const channels = selected && selected.length > 0 ? selected : ALL_CHANNELS;

    const bus = createBus(config);
    if (!await openBus(bus, config)) {
      process.exitCode = 1;
      return;
    }

    try {
      for (const channel of channels) {
        await bus.subscribe(channel, printEnvelope);
      }
      console.log(`Listening on ${channels.length} channel(s), Ctrl+C to stop`);

      await new Promise<void>((resolve) => {
        process.once('SIGINT', () => resolve());
        process.once('SIGTERM', () => resolve());
      });
    } finally {
      await bus.close();
    }
  });

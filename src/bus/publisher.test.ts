import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MessageBus } from './message-bus.js';
import { ScraperPublisher } from './publisher.js';
import { CHANNELS } from './channels.js';
import { FetchError } from '../errors.js';
import { FakeBroker, FakeRedis } from '../test-helpers/fake-redis.js';
import type { Faction } from '../scraper/types.js';

describe('ScraperPublisher', () => {
  let broker: FakeBroker;
  let bus: MessageBus;
  let publisher: ScraperPublisher;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    broker = new FakeBroker();
    bus = new MessageBus({
      url: 'redis://localhost:6379/0',
      source: 'wahapedia-scraper',
      createConnection: () => new FakeRedis(broker),
    });
    await bus.open();
    publisher = new ScraperPublisher(bus, '10th');
  });

  afterEach(async () => {
    await bus.close();
    vi.restoreAllMocks();
  });

  it('publishes factions as one batch with version and count', async () => {
    const factions: Faction[] = [
      { name: 'Orks', code: 'orks', url: 'https://wahapedia.ru/wh40k10ed/factions/orks', source: 'wahapedia', versionId: '10th' },
    ];

    expect(await publisher.publishFactions(factions)).toBe(true);

    const [latest] = await bus.recent(CHANNELS.factionDiscovered, 1);
    expect(latest?.type).toBe('faction_discovered');
    expect(latest?.version).toBe('10th');
    expect(latest?.count).toBe(1);
    expect(latest?.data).toEqual(factions);
    expect(console.log).toHaveBeenCalledWith(
      '[Publisher] Published 1 faction_discovered record(s) to scraper:faction:discovered'
    );
  });

  it('stores the published factions for lookup by code', async () => {
    const orks: Faction = { name: 'Orks', code: 'orks', url: 'https://wahapedia.ru/wh40k10ed/factions/orks', source: 'wahapedia', versionId: '10th' };
    const necrons: Faction = { ...orks, name: 'Necrons', code: 'necrons', url: 'https://wahapedia.ru/wh40k10ed/factions/necrons' };

    await publisher.publishFactions([orks, necrons]);

    const codes = broker.hashes.get('wahapedia:faction_codes');
    expect([...(codes?.keys() ?? [])]).toEqual(['orks', 'necrons']);
    expect(JSON.parse(codes?.get('necrons') ?? 'null')).toEqual(necrons);
    expect(broker.lists.get('wahapedia:faction_list')?.map((json) => JSON.parse(json).code)).toEqual(['orks', 'necrons']);
    expect(broker.ttls.get('wahapedia:faction_codes')).toBe(86400);
    expect(broker.ttls.get('wahapedia:faction_list')).toBe(86400);
    expect(console.log).toHaveBeenCalledWith('[Publisher] Stored 2 faction(s) in wahapedia:faction_codes');
  });

  it('still reports the faction batch as published when storing fails', async () => {
    broker.failing.add('del');

    expect(await publisher.publishFactions([])).toBe(true);
    expect(broker.published).toHaveLength(1);
    expect(console.error).toHaveBeenCalledWith('[Bus] Failed to store wahapedia:faction_codes: DEL failed');
  });

  it('leaves the stored factions alone when the publish fails', async () => {
    broker.failing.add('publish');

    const orks: Faction = { name: 'Orks', code: 'orks', url: 'https://wahapedia.ru/wh40k10ed/factions/orks', source: 'wahapedia', versionId: '10th' };
    expect(await publisher.publishFactions([orks])).toBe(false);
    expect(broker.hashes.size).toBe(0);
  });

  it('routes statuses to their own channels', async () => {
    await publisher.publishStatus('started', { task: 'units' });
    await publisher.publishStatus('completed', { task: 'units', count: 3, failed: 0, total: 3 });

    expect(broker.published.map((entry) => entry.channel)).toEqual([
      'scraper:status:started',
      'scraper:status:completed',
    ]);

    const [completed] = await bus.recent(CHANNELS.statusCompleted, 1);
    expect(completed?.type).toBe('status_update');
    expect(completed?.status).toBe('completed');
    expect(completed?.details).toEqual({ task: 'units', count: 3, failed: 0, total: 3 });
  });

  it('reports errors on the failed channel with the error code', async () => {
    await publisher.publishError('factions', new FetchError('https://wahapedia.ru/x', 'HTTP 404', 404));

    const [report] = await bus.recent(CHANNELS.statusFailed, 1);
    expect(report?.type).toBe('error_report');
    expect(report?.status).toBe('failed');
    expect(report?.details).toEqual({ task: 'factions', error: 'HTTP 404', code: 'FETCH' });
  });

  it('reports plain values as errors too', async () => {
    await publisher.publishError('units', 'gave up');

    const [report] = await bus.recent(CHANNELS.statusFailed, 1);
    expect(report?.details).toEqual({ task: 'units', error: 'gave up' });
  });

  it('announces version changes', async () => {
    await publisher.publishVersionChange('9th', '10th');

    const [change] = await bus.recent(CHANNELS.versionChange, 1);
    expect(change?.type).toBe('version_change');
    expect(change?.version).toBe('10th');
    expect(change?.details).toEqual({ previous: '9th', current: '10th' });
  });

  it('returns false once the bus is closed', async () => {
    await bus.close();

    expect(await publisher.publishUnits([])).toBe(false);
  });
});

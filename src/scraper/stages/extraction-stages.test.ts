import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  discoverFactions,
  extractArmyRules,
  extractDetachments,
  extractEnhancements,
  extractUnits,
  extractWargear,
} from './extraction-stages.js';
import type { StageContext } from './stage.js';
import { MessageBus } from '../../bus/message-bus.js';
import { ScraperPublisher } from '../../bus/publisher.js';
import { CHANNELS } from '../../bus/channels.js';
import { VersionedUrlResolver } from '../url-resolver.js';
import { WahapediaSource } from '../sources/wahapedia-source.js';
import { FakeBroker, FakeRedis } from '../../test-helpers/fake-redis.js';
import { FixtureFetcher } from '../../test-helpers/fixture-fetcher.js';
import { fixtureSite } from '../../test-helpers/fixtures.js';

describe('extraction stages', () => {
  let broker: FakeBroker;
  let bus: MessageBus;

  async function createContext(pages: Record<string, string> = fixtureSite()): Promise<StageContext> {
    await bus.open();
    return {
      source: new WahapediaSource({ fetcher: new FixtureFetcher(pages), resolver: new VersionedUrlResolver('10th') }),
      publisher: new ScraperPublisher(bus, '10th'),
    };
  }

  function publishedOn(channel: string): unknown[] {
    return broker.published
      .filter((entry) => entry.channel === channel)
      .map((entry): unknown => JSON.parse(entry.message));
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    broker = new FakeBroker();
    bus = new MessageBus({
      url: 'redis://localhost:6379/0',
      source: 'wahapedia-scraper',
      createConnection: () => new FakeRedis(broker),
    });
  });

  afterEach(async () => {
    await bus.close();
    vi.restoreAllMocks();
  });

  describe('discoverFactions', () => {
    it('publishes one faction_discovered message for the whole list', async () => {
      const context = await createContext();

      const result = await discoverFactions(context);

      expect(result.records.map((f) => f.code)).toEqual(['orks', 'necrons']);
      expect(publishedOn(CHANNELS.factionDiscovered)).toEqual([
        expect.objectContaining({ type: 'faction_discovered', count: 2, version: '10th' }),
      ]);
      expect(publishedOn(CHANNELS.statusCompleted)).toEqual([
        expect.objectContaining({
          status: 'completed',
          details: { task: 'factions', count: 2, failed: 0, total: 2 },
        }),
      ]);
    });

    it('limits the list to the requested factions by code or name', async () => {
      const context = await createContext();

      const byName = await discoverFactions(context, ['Necrons']);
      const byCode = await discoverFactions(context, ['orks']);

      expect(byName.records.map((f) => f.code)).toEqual(['necrons']);
      expect(byCode.records.map((f) => f.code)).toEqual(['orks']);
    });

    it('reports a failed stage when the index page is unavailable', async () => {
      const context = await createContext({});

      const result = await discoverFactions(context);

      expect(result.error).toBe('HTTP 404 Not Found');
      expect(result.records).toEqual([]);
      expect(publishedOn(CHANNELS.statusCompleted)).toEqual([]);
      expect(publishedOn(CHANNELS.statusFailed)).toEqual([
        expect.objectContaining({
          type: 'error_report',
          status: 'failed',
          details: { task: 'factions', error: 'HTTP 404 Not Found', code: 'FETCH' },
        }),
      ]);
    });
  });

  describe('extractArmyRules', () => {
    it('skips a faction without army rules and still completes', async () => {
      const context = await createContext();
      const { records: factions } = await discoverFactions(context);

      const result = await extractArmyRules(context, factions);

      expect(result.records.map((r) => r.armyRuleName)).toEqual(['Waaagh!']);
      expect(result.failed).toBe(1);
      expect(console.warn).toHaveBeenCalledWith(
        '[Stage:army_rules] Skipping faction Necrons: No Army Rules anchor found'
      );

      const [completed] = await bus.recent(CHANNELS.statusCompleted, 1);
      expect(completed?.details).toEqual({ task: 'army_rules', count: 1, failed: 1, total: 2 });
      expect(publishedOn(CHANNELS.armyRuleExtracted)).toEqual([
        expect.objectContaining({ type: 'army_rules_extracted', count: 1 }),
      ]);
    });
  });

  describe('faction and unit scoped stages', () => {
    it('feeds detachments into enhancements and units into wargear', async () => {
      const context = await createContext();
      const { records: factions } = await discoverFactions(context);

      const detachments = await extractDetachments(context, factions);
      const enhancements = await extractEnhancements(context, detachments.records);
      const units = await extractUnits(context, factions);
      const wargear = await extractWargear(context, units.records);

      expect(detachments.records.map((d) => d.code)).toEqual(['war-horde', 'da-big-hunt', 'awakened-dynasty']);
      expect(enhancements.records.map((e) => e.code)).toEqual([
        'follow-me-ladz',
        'headwoppa-s-killchoppa',
        'proper-killy',
        'enaegic-dermal-bond',
      ]);
      expect(units.records.map((u) => u.code)).toEqual(['boyz', 'warboss', 'gretchin', 'necron-warriors']);
      expect(wargear.records.map((w) => w.unitCode)).toEqual(['boyz', 'boyz', 'necron-warriors']);
      expect(wargear.failed).toBe(0);
    });
  });

  it('emits status messages for a stage with no input', async () => {
    const context = await createContext();

    const result = await extractWargear(context, []);

    expect(result).toEqual({ stage: 'wargear', records: [], total: 0, failed: 0, error: null });
    expect(publishedOn(CHANNELS.wargearFound)).toEqual([]);
    expect(publishedOn(CHANNELS.statusStarted)).toEqual([
      expect.objectContaining({ details: { task: 'wargear', total: 0 } }),
    ]);
    expect(publishedOn(CHANNELS.statusCompleted)).toEqual([
      expect.objectContaining({ details: { task: 'wargear', count: 0, failed: 0, total: 0 } }),
    ]);
  });

  it('keeps extracting while the broker is down', async () => {
    const context = await createContext();
    broker.available = false;

    const result = await discoverFactions(context);

    expect(result.records).toHaveLength(2);
    expect(result.error).toBeNull();
    expect(broker.published).toEqual([]);
  });
});

// Channel names and message types on the scraper bus. Both sets are closed.

export const CHANNELS = {
  factionDiscovered: 'scraper:faction:discovered',
  armyRuleExtracted: 'scraper:army_rule:extracted',
  detachmentFound: 'scraper:detachment:found',
  enhancementFound: 'scraper:enhancement:found',
  unitExtracted: 'scraper:unit:extracted',
  wargearFound: 'scraper:wargear:found',
  statusStarted: 'scraper:status:started',
  statusCompleted: 'scraper:status:completed',
  statusFailed: 'scraper:status:failed',
  versionChange: 'scraper:version:change',
} as const;

export type Channel = typeof CHANNELS[keyof typeof CHANNELS];

export const ALL_CHANNELS: readonly Channel[] = Object.values(CHANNELS);

/** Diagnostic channel used by the publish/subscribe self test */
export const SELF_TEST_CHANNEL = 'test:pubsub';

export type BusChannel = Channel | typeof SELF_TEST_CHANNEL;

export function isBusChannel(value: string): value is BusChannel {
  return value === SELF_TEST_CHANNEL || (ALL_CHANNELS as readonly string[]).includes(value);
}

export const MESSAGE_TYPES = [
  'faction_discovered',
  'army_rules_extracted',
  'detachment_found',
  'enhancement_found',
  'unit_extracted',
  'wargear_found',
  'status_update',
  'error_report',
  'version_change',
] as const;

export type MessageType = typeof MESSAGE_TYPES[number];

export const RECENT_CAPACITY = 100;
export const RECENT_TTL_SECONDS = 3600;

export function recentKey(channel: string): string {
  return `messages:${channel}:recent`;
}

/** Latest discovered factions, for lookup by code outside the scraper */
export const FACTION_STORE = {
  hashKey: 'wahapedia:faction_codes',
  listKey: 'wahapedia:faction_list',
  ttlSeconds: 86400,
} as const;

// Wahapedia host, game versions and faction tables

export const WAHAPEDIA_HOST = 'https://wahapedia.ru';

export const USER_AGENT = 'WahapediaScraper/1.0 (rules data pipeline; respectful scraping)';

// Abstract game-version ids and the path segment each one lives under
export const VERSION_PATHS = {
  '10th': 'wh40k10ed',
  '9th': 'wh40k9ed',
  '8th': 'wh40k8ed',
} as const;

export type VersionId = keyof typeof VERSION_PATHS;

export const DEFAULT_VERSION_ID: VersionId = '10th';

export function isKnownVersion(versionId: string): versionId is VersionId {
  return Object.prototype.hasOwnProperty.call(VERSION_PATHS, versionId);
}

// Named anchors on a faction page, keyed by section name
export const SECTION_ANCHORS = {
  army_rules: 'Army-Rules',
  detachments: 'Detachment-Rules',
  enhancements: 'Enhancements',
  stratagems: 'Stratagems',
  wargear_options: 'Wargear-Options',
  datasheets: 'Datasheets',
  introduction: 'Introduction',
  books: 'Books',
} as const;

export type SectionName = keyof typeof SECTION_ANCHORS;

// Known factions with their Wahapedia codes
export const FACTION_CODES = [
  // Imperium
  'adepta-sororitas',
  'adeptus-custodes',
  'adeptus-mechanicus',
  'astra-militarum',
  'grey-knights',
  'imperial-agents',
  'imperial-knights',
  'space-marines',

  // Chaos
  'chaos-daemons',
  'chaos-knights',
  'chaos-space-marines',
  'death-guard',
  'emperor-s-children',
  'thousand-sons',
  'world-eaters',

  // Xenos
  'aeldari',
  'drukhari',
  'genestealer-cults',
  'leagues-of-votann',
  'necrons',
  'orks',
  't-au-empire',
  'tyranids',

  // Unaligned
  'unaligned-forces',
] as const;

export type FactionCode = typeof FACTION_CODES[number];

/**
 * Display names whose code is not what the generic transform would give.
 * Keys are lowercased display names; values must be codes from FACTION_CODES.
 */
export const IRREGULAR_FACTION_NAMES: Readonly<Record<string, FactionCode>> = {
  "t'au empire": 't-au-empire',
  'tau empire': 't-au-empire',
  "emperor's children": 'emperor-s-children',
  'emperors children': 'emperor-s-children',
  'adeptus astartes': 'space-marines',
  'imperial guard': 'astra-militarum',
  'sisters of battle': 'adepta-sororitas',
  'craftworlds': 'aeldari',
  'eldar': 'aeldari',
  'dark eldar': 'drukhari',
  'heretic astartes': 'chaos-space-marines',
  'votann': 'leagues-of-votann',
  'agents of the imperium': 'imperial-agents',
  'questor imperialis': 'imperial-knights',
  'questor traitoris': 'chaos-knights',
};

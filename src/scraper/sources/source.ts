import type {
  ArmyRule,
  Detachment,
  Enhancement,
  Faction,
  Unit,
  Wargear,
} from '../types.js';

export const SOURCE_NAMES = ['wahapedia'] as const;

export type SourceName = typeof SOURCE_NAMES[number];

export function isSourceName(value: string): value is SourceName {
  return (SOURCE_NAMES as readonly string[]).includes(value);
}

/**
 * Extraction capabilities of one rules site.
 *
 * Per-item methods reject with a FetchError or ParseError when the item
 * cannot be extracted; the stages turn that into a skip.
 */
export interface ScraperSource {
  readonly name: SourceName;
  readonly versionId: string;

  discoverFactions(): Promise<Faction[]>;
  extractArmyRule(faction: Faction): Promise<ArmyRule>;
  extractDetachments(faction: Faction): Promise<Detachment[]>;
  extractEnhancements(detachment: Detachment): Promise<Enhancement[]>;
  extractUnits(faction: Faction): Promise<Unit[]>;
  extractWargear(unit: Unit): Promise<Wargear[]>;

  /** Forget pages fetched by a previous run */
  resetPageCache(): void;
}

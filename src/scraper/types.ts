// Records emitted by the extraction stages. Everything is readonly once built.

export const STAGE_NAMES = [
  'factions',
  'army_rules',
  'detachments',
  'enhancements',
  'units',
  'wargear',
] as const;

export type StageName = typeof STAGE_NAMES[number];

export function isStageName(value: string): value is StageName {
  return (STAGE_NAMES as readonly string[]).includes(value);
}

interface Provenance {
  readonly source: string;
  readonly versionId: string;
}

export interface Faction extends Provenance {
  readonly name: string;
  readonly code: string;
  readonly url: string;
}

export interface ArmyRule extends Provenance {
  readonly factionName: string;
  readonly factionCode: string;
  readonly factionUrl: string;
  readonly armyRuleName: string;
}

export interface Detachment extends Provenance {
  readonly factionCode: string;
  readonly factionName: string;
  readonly name: string;
  readonly code: string;
  /** Named anchor of the detachment's section on the faction page */
  readonly anchor: string;
  readonly detachmentRuleName: string | null;
  readonly sourceUrl: string;
}

export interface Enhancement extends Provenance {
  readonly factionCode: string;
  readonly detachmentCode: string;
  readonly detachmentName: string;
  readonly name: string;
  readonly code: string;
  readonly pointsCost: number;
}

export interface Wargear extends Provenance {
  readonly factionCode: string;
  readonly unitCode: string;
  readonly unitName: string;
  readonly description: string;
}

export interface Unit extends Provenance {
  readonly factionCode: string;
  readonly factionName: string;
  readonly name: string;
  readonly code: string;
  readonly anchor: string;
  readonly basePoints: number | null;
  readonly datasheetUrl: string;
  readonly wargear: readonly Wargear[];
}

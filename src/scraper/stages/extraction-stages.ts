import { normalizeFactionCode } from '../url-resolver.js';
import type {
  ArmyRule,
  Detachment,
  Enhancement,
  Faction,
  Unit,
  Wargear,
} from '../types.js';
import { failStage, runItemStage, type StageContext, type StageResult } from './stage.js';

/**
 * Faction discovery. Unlike the other stages it has no input items: when the
 * index page cannot be fetched or parsed the stage fails as a whole.
 *
 * `only` limits the result to the given codes or display names.
 */
export async function discoverFactions(
  { source, publisher }: StageContext,
  only: readonly string[] = []
): Promise<StageResult<Faction>> {
  await publisher.publishStatus('started', { task: 'factions' });

  let factions: Faction[];
  try {
    factions = await source.discoverFactions();
  } catch (error) {
    return failStage(publisher, 'factions', error);
  }

  if (only.length > 0) {
    const wanted = new Set(only.map(normalizeFactionCode));
    factions = factions.filter((f) => wanted.has(f.code) || wanted.has(normalizeFactionCode(f.name)));
  }

  if (factions.length > 0) {
    await publisher.publishFactions(factions);
  }

  console.log(`[Stage:factions] ${factions.length} faction(s)`);
  await publisher.publishStatus('completed', {
    task: 'factions',
    count: factions.length,
    failed: 0,
    total: factions.length,
  });

  return { stage: 'factions', records: factions, total: factions.length, failed: 0, error: null };
}

export function extractArmyRules(
  { source, publisher }: StageContext,
  factions: readonly Faction[]
): Promise<StageResult<ArmyRule>> {
  return runItemStage(publisher, {
    stage: 'army_rules',
    items: factions,
    label: (faction) => `faction ${faction.name}`,
    extract: async (faction) => [await source.extractArmyRule(faction)],
    publish: (rules) => publisher.publishArmyRules(rules),
  });
}

export function extractDetachments(
  { source, publisher }: StageContext,
  factions: readonly Faction[]
): Promise<StageResult<Detachment>> {
  return runItemStage(publisher, {
    stage: 'detachments',
    items: factions,
    label: (faction) => `faction ${faction.name}`,
    extract: (faction) => source.extractDetachments(faction),
    publish: (detachments) => publisher.publishDetachments(detachments),
  });
}

export function extractEnhancements(
  { source, publisher }: StageContext,
  detachments: readonly Detachment[]
): Promise<StageResult<Enhancement>> {
  return runItemStage(publisher, {
    stage: 'enhancements',
    items: detachments,
    label: (detachment) => `detachment ${detachment.factionName} / ${detachment.name}`,
    extract: (detachment) => source.extractEnhancements(detachment),
    publish: (enhancements) => publisher.publishEnhancements(enhancements),
  });
}

export function extractUnits(
  { source, publisher }: StageContext,
  factions: readonly Faction[]
): Promise<StageResult<Unit>> {
  return runItemStage(publisher, {
    stage: 'units',
    items: factions,
    label: (faction) => `faction ${faction.name}`,
    extract: (faction) => source.extractUnits(faction),
    publish: (units) => publisher.publishUnits(units),
  });
}

export function extractWargear(
  { source, publisher }: StageContext,
  units: readonly Unit[]
): Promise<StageResult<Wargear>> {
  return runItemStage(publisher, {
    stage: 'wargear',
    items: units,
    label: (unit) => `unit ${unit.factionName} / ${unit.name}`,
    extract: (unit) => source.extractWargear(unit),
    publish: (wargear) => publisher.publishWargear(wargear),
  });
}

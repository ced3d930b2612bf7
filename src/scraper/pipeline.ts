import { errorMessage } from '../errors.js';
import { CHANNELS } from '../bus/channels.js';
import type { MessageBus } from '../bus/message-bus.js';
import { ScraperPublisher } from '../bus/publisher.js';
import type { ScrapeLogRepository } from '../db/scrape-log.js';
import type { ScraperSource } from './sources/source.js';
import {
  discoverFactions,
  extractArmyRules,
  extractDetachments,
  extractEnhancements,
  extractUnits,
  extractWargear,
} from './stages/extraction-stages.js';
import type { StageContext, StageResult } from './stages/stage.js';
import {
  STAGE_NAMES,
  type ArmyRule,
  type Detachment,
  type Enhancement,
  type Faction,
  type StageName,
  type Unit,
  type Wargear,
} from './types.js';

export interface PipelineOptions {
  source: ScraperSource;
  bus: MessageBus;
  scrapeLog?: ScrapeLogRepository | null;
}

export interface RunOptions {
  /** Faction codes or display names; all factions when empty */
  factions?: readonly string[];
  /** Stages to run; prerequisites are added. All stages when empty */
  stages?: readonly StageName[];
}

export interface StageSummary {
  count: number;
  failed: number;
  total: number;
  error: string | null;
}

export interface PipelineSummary {
  status: 'completed' | 'failed';
  versionId: string;
  /** True when any item was skipped */
  partial: boolean;
  stages: Partial<Record<StageName, StageSummary>>;
  factions: Faction[];
  armyRules: ArmyRule[];
  detachments: Detachment[];
  enhancements: Enhancement[];
  /** Units with their wargear attached */
  units: Unit[];
  wargear: Wargear[];
  startedAt: Date;
  completedAt: Date;
}

const PREREQUISITES: Partial<Record<StageName, StageName>> = {
  enhancements: 'detachments',
  wargear: 'units',
};

/**
 * Requested stages plus what they depend on, in pipeline order.
 * Faction discovery always runs.
 */
export function planStages(requested: readonly StageName[] = []): StageName[] {
  if (requested.length === 0) return [...STAGE_NAMES];

  const planned = new Set<StageName>(['factions', ...requested]);
  for (const stage of requested) {
    const prerequisite = PREREQUISITES[stage];
    if (prerequisite) planned.add(prerequisite);
  }
  return STAGE_NAMES.filter((stage) => planned.has(stage));
}

/**
 * New unit objects carrying the wargear extracted for them.
 */
export function attachWargear(units: readonly Unit[], wargear: readonly Wargear[]): Unit[] {
  const byUnit = new Map<string, Wargear[]>();
  for (const item of wargear) {
    const key = `${item.factionCode}/${item.unitCode}`;
    const list = byUnit.get(key) ?? [];
    list.push(item);
    byUnit.set(key, list);
  }

  return units.map((unit) => ({
    ...unit,
    wargear: byUnit.get(`${unit.factionCode}/${unit.code}`) ?? [],
  }));
}

/**
 * Runs the extraction stages in order on a single worker: factions, then
 * army rules and detachments per faction, enhancements per detachment, units
 * per faction, and wargear per unit.
 */
export class ExtractionPipeline {
  private source: ScraperSource;
  private bus: MessageBus;
  private publisher: ScraperPublisher;
  private scrapeLog: ScrapeLogRepository | null;

  constructor(options: PipelineOptions) {
    this.source = options.source;
    this.bus = options.bus;
    this.publisher = new ScraperPublisher(options.bus, options.source.versionId);
    this.scrapeLog = options.scrapeLog ?? null;
  }

  async run(options: RunOptions = {}): Promise<PipelineSummary> {
    const startedAt = new Date();
    const versionId = this.source.versionId;
    const plan = new Set(planStages(options.stages));
    const context: StageContext = { source: this.source, publisher: this.publisher };
    const results: StageResult<unknown>[] = [];

    console.log(`[Pipeline] Starting ${this.source.name} ${versionId}: ${[...plan].join(', ')}`);
    this.source.resetPageCache();
    await this.announceVersion(versionId);

    const factions = await discoverFactions(context, options.factions);
    results.push(factions);

    let armyRules: ArmyRule[] = [];
    let detachments: Detachment[] = [];
    let enhancements: Enhancement[] = [];
    let units: Unit[] = [];
    let wargear: Wargear[] = [];

    if (factions.error === null) {
      if (plan.has('army_rules')) {
        const result = await extractArmyRules(context, factions.records);
        results.push(result);
        armyRules = result.records;
      }

      if (plan.has('detachments')) {
        const result = await extractDetachments(context, factions.records);
        results.push(result);
        detachments = result.records;
      }

      if (plan.has('enhancements')) {
        const result = await extractEnhancements(context, detachments);
        results.push(result);
        enhancements = result.records;
      }

      if (plan.has('units')) {
        const result = await extractUnits(context, factions.records);
        results.push(result);
        units = result.records;
      }

      if (plan.has('wargear')) {
        const result = await extractWargear(context, units);
        results.push(result);
        wargear = result.records;
      }
    } else {
      console.error('[Pipeline] Faction discovery failed, skipping remaining stages');
    }
    this.source.resetPageCache();

    const stages: Partial<Record<StageName, StageSummary>> = {};
    for (const result of results) {
      stages[result.stage] = {
        count: result.records.length,
        failed: result.failed,
        total: result.total,
        error: result.error,
      };
    }

    const failedStages = results.filter((result) => result.error !== null).map((result) => result.stage);
    const partial = results.some((result) => result.failed > 0);
    const status = failedStages.length === 0 ? 'completed' : 'failed';
    const completedAt = new Date();

    const summary: PipelineSummary = {
      status,
      versionId,
      partial,
      stages,
      factions: factions.records,
      armyRules,
      detachments,
      enhancements,
      units: attachWargear(units, wargear),
      wargear,
      startedAt,
      completedAt,
    };

    await this.publisher.publishStatus(status, {
      task: 'pipeline',
      stages,
      partial,
      failedStages,
      durationMs: completedAt.getTime() - startedAt.getTime(),
    });

    await this.recordRun(summary, failedStages);

    const processed = results.reduce((sum, result) => sum + result.records.length, 0);
    console.log(`[Pipeline] ${status}: ${processed} record(s)${partial ? ', some items skipped' : ''}`);
    return summary;
  }

  /**
   * Announce a version switch when the last published faction list was for
   * another version.
   */
  private async announceVersion(versionId: string): Promise<void> {
    if (!this.bus.isOpen) return;

    let previous: string | undefined;
    try {
      const [last] = await this.bus.recent(CHANNELS.factionDiscovered, 1);
      previous = last?.version;
    } catch (error) {
      console.warn(`[Pipeline] Could not read the last faction message: ${errorMessage(error)}`);
      return;
    }

    if (previous && previous !== versionId) {
      console.log(`[Pipeline] Version changed from ${previous} to ${versionId}`);
      await this.publisher.publishVersionChange(previous, versionId);
    }
  }

  private async recordRun(summary: PipelineSummary, failedStages: StageName[]): Promise<void> {
    if (!this.scrapeLog) return;

    const counts = Object.values(summary.stages).filter((stage): stage is StageSummary => stage !== undefined);
    try {
      await this.scrapeLog.record({
        source: this.source.name,
        scrapeType: summary.partial || Object.keys(summary.stages).length < STAGE_NAMES.length ? 'partial' : 'full',
        status: summary.status,
        startedAt: summary.startedAt,
        completedAt: summary.completedAt,
        itemsProcessed: counts.reduce((sum, stage) => sum + stage.count, 0),
        itemsFailed: counts.reduce((sum, stage) => sum + stage.failed, 0),
        errorMessage: failedStages.length > 0
          ? failedStages.map((stage) => `${stage}: ${summary.stages[stage]?.error ?? 'failed'}`).join('; ')
          : null,
        metadata: { versionId: summary.versionId, stages: summary.stages },
      });
    } catch (error) {
      console.error(`[Pipeline] Failed to write scrape log: ${errorMessage(error)}`);
    }
  }
}

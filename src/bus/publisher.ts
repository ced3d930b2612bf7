import { errorMessage, ScraperError } from '../errors.js';
import type {
  ArmyRule,
  Detachment,
  Enhancement,
  Faction,
  Unit,
  Wargear,
} from '../scraper/types.js';
import { CHANNELS, FACTION_STORE, type Channel, type MessageType } from './channels.js';
import type { MessageBus } from './message-bus.js';

export type RunStatus = 'started' | 'completed' | 'failed';

export type StatusDetails = Record<string, unknown>;

const STATUS_CHANNELS: Record<RunStatus, Channel> = {
  started: CHANNELS.statusStarted,
  completed: CHANNELS.statusCompleted,
  failed: CHANNELS.statusFailed,
};

/**
 * Typed publishing helpers over the message bus. Every result message carries
 * the game version it was extracted for.
 */
export class ScraperPublisher {
  private readonly bus: MessageBus;
  readonly versionId: string;

  constructor(bus: MessageBus, versionId: string) {
    this.bus = bus;
    this.versionId = versionId;
  }

  /**
   * Also replaces the faction snapshot (`wahapedia:faction_codes` hash and
   * `wahapedia:faction_list` list) once the batch is out. A failed snapshot
   * write is logged and does not change the result.
   */
  async publishFactions(factions: readonly Faction[]): Promise<boolean> {
    const ok = await this.publishBatch(CHANNELS.factionDiscovered, 'faction_discovered', factions);
    if (ok && await this.bus.replaceSnapshot(FACTION_STORE, factions.map((f) => [f.code, f] as const))) {
      console.log(`[Publisher] Stored ${factions.length} faction(s) in ${FACTION_STORE.hashKey}`);
    }
    return ok;
  }

  publishArmyRules(rules: readonly ArmyRule[]): Promise<boolean> {
    return this.publishBatch(CHANNELS.armyRuleExtracted, 'army_rules_extracted', rules);
  }

  publishDetachments(detachments: readonly Detachment[]): Promise<boolean> {
    return this.publishBatch(CHANNELS.detachmentFound, 'detachment_found', detachments);
  }

  publishEnhancements(enhancements: readonly Enhancement[]): Promise<boolean> {
    return this.publishBatch(CHANNELS.enhancementFound, 'enhancement_found', enhancements);
  }

  publishUnits(units: readonly Unit[]): Promise<boolean> {
    return this.publishBatch(CHANNELS.unitExtracted, 'unit_extracted', units);
  }

  publishWargear(wargear: readonly Wargear[]): Promise<boolean> {
    return this.publishBatch(CHANNELS.wargearFound, 'wargear_found', wargear);
  }

  /**
   * `failed` goes out as an error report, the other states as status updates.
   */
  publishStatus(status: RunStatus, details: StatusDetails = {}): Promise<boolean> {
    return this.bus.publish(STATUS_CHANNELS[status], {
      type: status === 'failed' ? 'error_report' : 'status_update',
      version: this.versionId,
      status,
      details,
    });
  }

  publishError(task: string, error: unknown): Promise<boolean> {
    const details: StatusDetails = { task, error: errorMessage(error) };
    if (error instanceof ScraperError) {
      details.code = error.code;
    }
    return this.publishStatus('failed', details);
  }

  publishVersionChange(previous: string, current: string): Promise<boolean> {
    return this.bus.publish(CHANNELS.versionChange, {
      type: 'version_change',
      version: current,
      details: { previous, current },
    });
  }

  private async publishBatch<T>(channel: Channel, type: MessageType, records: readonly T[]): Promise<boolean> {
    const ok = await this.bus.publish(channel, {
      type,
      version: this.versionId,
      count: records.length,
      data: records,
    });
    if (ok) {
      console.log(`[Publisher] Published ${records.length} ${type} record(s) to ${channel}`);
    }
    return ok;
  }
}

import { FetchError } from '../../errors.js';
import type { PageFetcher } from '../fetcher.js';
import type { VersionedUrlResolver } from '../url-resolver.js';
import { withSelectors, type SelectorOverrides, type SelectorRegistry } from '../selectors.js';
import { parseFactionList } from '../parsers/faction-list-parser.js';
import { parseArmyRule } from '../parsers/army-rule-parser.js';
import { parseDetachments } from '../parsers/detachment-parser.js';
import { parseEnhancements } from '../parsers/enhancement-parser.js';
import { findDatasheet, parseDatasheets, type ParsedDatasheet } from '../parsers/datasheet-parser.js';
import type {
  ArmyRule,
  Detachment,
  Enhancement,
  Faction,
  Unit,
  Wargear,
} from '../types.js';
import type { ScraperSource } from './source.js';

function pageKey(url: string): string {
  return url.replace(/#.*$/, '');
}

export interface WahapediaSourceOptions {
  fetcher: PageFetcher;
  resolver: VersionedUrlResolver;
  /** Per-group overrides of the default selectors */
  selectors?: SelectorOverrides;
}

/**
 * Wahapedia rules wiki. The faction list comes from the navigation dropdown
 * of the quick start guide; everything else from faction and datasheet pages.
 *
 * Pages are memoized per URL (fragment stripped) until `resetPageCache`, so
 * the army rule, detachment and enhancement stages share one fetch of each
 * faction page. Failed fetches are memoized too. Datasheet pages are parsed
 * once; units and wargear read from the parsed result.
 */
export class WahapediaSource implements ScraperSource {
  readonly name = 'wahapedia';
  private fetcher: PageFetcher;
  private resolver: VersionedUrlResolver;
  private selectors: SelectorRegistry;
  private pages = new Map<string, string | FetchError>();
  private datasheets = new Map<string, ParsedDatasheet[]>();

  constructor(options: WahapediaSourceOptions) {
    this.fetcher = options.fetcher;
    this.resolver = options.resolver;
    this.selectors = withSelectors(options.selectors);
  }

  get versionId(): string {
    return this.resolver.versionId;
  }

  async discoverFactions(): Promise<Faction[]> {
    const html = await this.loadPage(this.resolver.getQuickStartUrl());

    return parseFactionList(html, this.resolver.getBaseUrl(), this.selectors.factionList)
      .map((faction) => ({ ...faction, ...this.provenance() }));
  }

  async extractArmyRule(faction: Faction): Promise<ArmyRule> {
    const html = await this.loadPage(faction.url);

    return {
      factionName: faction.name,
      factionCode: faction.code,
      factionUrl: faction.url,
      armyRuleName: parseArmyRule(html, this.selectors.armyRule),
      ...this.provenance(),
    };
  }

  async extractDetachments(faction: Faction): Promise<Detachment[]> {
    const html = await this.loadPage(faction.url);

    return parseDetachments(html, this.selectors.detachment).map((detachment) => ({
      factionCode: faction.code,
      factionName: faction.name,
      name: detachment.name,
      code: detachment.code,
      anchor: detachment.anchor,
      detachmentRuleName: detachment.detachmentRuleName,
      sourceUrl: faction.url,
      ...this.provenance(),
    }));
  }

  async extractEnhancements(detachment: Detachment): Promise<Enhancement[]> {
    const html = await this.loadPage(detachment.sourceUrl);

    return parseEnhancements(html, detachment.anchor, this.selectors.enhancement, this.selectors.detachment)
      .map((enhancement) => ({
        factionCode: detachment.factionCode,
        detachmentCode: detachment.code,
        detachmentName: detachment.name,
        name: enhancement.name,
        code: enhancement.code,
        pointsCost: enhancement.pointsCost,
        ...this.provenance(),
      }));
  }

  async extractUnits(faction: Faction): Promise<Unit[]> {
    const url = this.resolver.getFactionDatasheetsUrl(faction.code);
    if (!url) {
      throw new FetchError(faction.url, `No datasheets URL for faction ${faction.code}`);
    }
    const datasheets = await this.loadDatasheets(url);

    return datasheets.map(({ unit }) => ({
      factionCode: faction.code,
      factionName: faction.name,
      name: unit.name,
      code: unit.code,
      anchor: unit.anchor,
      basePoints: unit.basePoints,
      datasheetUrl: this.resolver.getUnitDatasheetUrl(faction.code, unit.anchor) ?? url,
      wargear: [],
      ...this.provenance(),
    }));
  }

  async extractWargear(unit: Unit): Promise<Wargear[]> {
    const datasheets = await this.loadDatasheets(unit.datasheetUrl);

    return findDatasheet(datasheets, unit.code).wargearOptions
      .map((description) => ({
        factionCode: unit.factionCode,
        unitCode: unit.code,
        unitName: unit.name,
        description,
        ...this.provenance(),
      }));
  }

  resetPageCache(): void {
    this.pages.clear();
    this.datasheets.clear();
  }

  private async loadDatasheets(url: string): Promise<ParsedDatasheet[]> {
    const key = pageKey(url);
    const cached = this.datasheets.get(key);
    if (cached) return cached;

    const html = await this.loadPage(key);
    const datasheets = parseDatasheets(html, this.selectors.datasheet, this.selectors.wargear);
    this.datasheets.set(key, datasheets);
    return datasheets;
  }

  private async loadPage(url: string): Promise<string> {
    const key = pageKey(url);
    const cached = this.pages.get(key);
    if (cached instanceof FetchError) throw cached;
    if (cached !== undefined) return cached;

    const html = await this.fetcher.fetch(key);
    if (html === null) {
      const failure = this.fetcher.lastFailure;
      const error = failure && failure.url === key
        ? failure.cause
        : new FetchError(key, `Could not fetch ${key}`);
      this.pages.set(key, error);
      throw error;
    }

    this.pages.set(key, html);
    return html;
  }

  private provenance(): { source: string; versionId: string } {
    return { source: this.name, versionId: this.versionId };
  }
}

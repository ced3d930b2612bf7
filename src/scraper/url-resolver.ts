import {
  WAHAPEDIA_HOST,
  VERSION_PATHS,
  DEFAULT_VERSION_ID,
  SECTION_ANCHORS,
  FACTION_CODES,
  IRREGULAR_FACTION_NAMES,
  isKnownVersion,
  type SectionName,
  type VersionId,
} from './config.js';

export type UrlParams = Readonly<Record<string, string>>;

interface UrlPattern {
  required: readonly string[];
  build: (versionPath: string, params: UrlParams) => string;
}

const base = (versionPath: string) => `${WAHAPEDIA_HOST}/${versionPath}`;

/**
 * URL patterns by name. Every parameter listed in `required` is guaranteed
 * non-blank by the time `build` runs.
 */
const URL_PATTERNS = {
  quick_start: {
    required: [],
    build: (v) => `${base(v)}/the-rules/quick-start-guide/`,
  },
  core_rules: {
    required: [],
    build: (v) => `${base(v)}/the-rules/core-rules/`,
  },
  army_lists: {
    required: [],
    build: (v) => `${base(v)}/army-lists/`,
  },
  faction: {
    required: ['factionCode'],
    build: (v, p) => `${base(v)}/factions/${p.factionCode}`,
  },
  faction_datasheets: {
    required: ['factionCode'],
    build: (v, p) => `${base(v)}/factions/${p.factionCode}/datasheets`,
  },
  faction_stratagems: {
    required: ['factionCode'],
    build: (v, p) => `${base(v)}/factions/${p.factionCode}/stratagems`,
  },
  faction_section: {
    required: ['factionCode', 'section'],
    build: (v, p) => `${base(v)}/factions/${p.factionCode}#${sectionAnchor(p.section ?? '')}`,
  },
  unit_datasheet: {
    required: ['factionCode', 'unitCode'],
    build: (v, p) => `${base(v)}/factions/${p.factionCode}/datasheets#${p.unitCode}`,
  },
  search: {
    required: ['query'],
    build: (v, p) => `${base(v)}/search?${new URLSearchParams({ q: p.query ?? '' }).toString()}`,
  },
} satisfies Record<string, UrlPattern>;

export type UrlPatternName = keyof typeof URL_PATTERNS;

function isPatternName(name: string): name is UrlPatternName {
  return Object.prototype.hasOwnProperty.call(URL_PATTERNS, name);
}

function isSectionName(name: string): name is SectionName {
  return Object.prototype.hasOwnProperty.call(SECTION_ANCHORS, name);
}

/**
 * Anchor for a section name. Unregistered names are used verbatim so that a
 * renamed section upstream still produces a usable link.
 */
export function sectionAnchor(section: string): string {
  return isSectionName(section) ? SECTION_ANCHORS[section] : section;
}

/**
 * Convert a faction display name (or an existing code) to its URL code.
 *
 * @example "Space Marines" → "space-marines"
 * @example "T'au Empire" → "t-au-empire"
 * @example "Imperial Guard" → "astra-militarum"
 */
export function normalizeFactionCode(name: string): string {
  const key = name.trim().toLowerCase().replace(/\s+/g, ' ');
  const irregular = IRREGULAR_FACTION_NAMES[key];
  if (irregular) return irregular;

  return key
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function validateFactionCode(code: string): boolean {
  return (FACTION_CODES as readonly string[]).includes(code);
}

/**
 * Maps an abstract game version to Wahapedia URLs.
 * Resolved URLs are memoized per (pattern, params) for the lifetime of the instance.
 */
export class VersionedUrlResolver {
  readonly versionId: string;
  readonly versionPath: string;
  private cache = new Map<string, string>();

  constructor(versionId: string = DEFAULT_VERSION_ID) {
    this.versionId = versionId;

    let resolved: VersionId = DEFAULT_VERSION_ID;
    if (isKnownVersion(versionId)) {
      resolved = versionId;
    } else {
      console.warn(`[UrlResolver] Unknown version "${versionId}", using ${DEFAULT_VERSION_ID} URLs`);
    }
    this.versionPath = VERSION_PATHS[resolved];
  }

  getBaseUrl(): string {
    return WAHAPEDIA_HOST;
  }

  /**
   * Build a URL from a named pattern. Returns null for an unknown pattern or
   * a missing/blank parameter.
   */
  build(pattern: string, params: UrlParams = {}): string | null {
    if (!isPatternName(pattern)) {
      console.warn(`[UrlResolver] Unknown URL pattern: ${pattern}`);
      return null;
    }

    const entry: UrlPattern = URL_PATTERNS[pattern];
    const missing = entry.required.filter((key) => !params[key]?.trim());
    if (missing.length > 0) {
      console.warn(`[UrlResolver] Pattern ${pattern} is missing: ${missing.join(', ')}`);
      return null;
    }

    const cacheKey = `${pattern}|${JSON.stringify(Object.entries(params).sort(([a], [b]) => a.localeCompare(b)))}`;
    const cached = this.cache.get(cacheKey);
    if (cached) return cached;

    const url = entry.build(this.versionPath, params);
    this.cache.set(cacheKey, url);
    return url;
  }

  /**
   * Faction page URL, optionally with a section anchor. The code is normalized
   * first, so display names are accepted too.
   */
  resolve(entityCode: string, section?: string): string | null {
    const factionCode = normalizeFactionCode(entityCode);
    if (!factionCode) return null;

    if (section === undefined) {
      return this.getFactionUrl(factionCode);
    }
    return this.getFactionSectionUrl(factionCode, section);
  }

  getQuickStartUrl(): string {
    return `${base(this.versionPath)}/the-rules/quick-start-guide/`;
  }

  getFactionUrl(factionCode: string): string | null {
    return this.build('faction', { factionCode });
  }

  getFactionDatasheetsUrl(factionCode: string): string | null {
    return this.build('faction_datasheets', { factionCode });
  }

  getFactionSectionUrl(factionCode: string, section: string): string | null {
    return this.build('faction_section', { factionCode, section });
  }

  getUnitDatasheetUrl(factionCode: string, unitCode: string): string | null {
    return this.build('unit_datasheet', { factionCode, unitCode });
  }

  getSearchUrl(query: string): string | null {
    return this.build('search', { query });
  }

  /**
   * Absolute URL for a path under this version, e.g. "/factions/" →
   * "https://wahapedia.ru/wh40k10ed/factions/".
   */
  buildPath(path: string): string {
    return `${base(this.versionPath)}/${path.replace(/^\/+/, '')}`;
  }

  getAllSectionAnchors(): Readonly<Record<SectionName, string>> {
    return { ...SECTION_ANCHORS };
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }
}

/**
 * One-shot resolution for callers that do not hold a resolver.
 */
export function resolveVersionedUrl(versionId: string, entityCode: string, section?: string): string | null {
  return new VersionedUrlResolver(versionId).resolve(entityCode, section);
}

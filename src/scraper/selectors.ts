/**
 * CSS selectors for Wahapedia markup, grouped by page parser.
 *
 * Every parser takes its group as an optional argument so a markup change
 * upstream can be patched without touching parsing logic.
 */

export interface FactionListSelectors {
  navButton: string;
  dropdown: string;
  link: string;
}

export interface ArmyRuleSelectors {
  anchor: string;
  container: string;
  ruleBlock: string;
  ruleName: string;
  ruleNameFallback: string;
}

export interface DetachmentSelectors {
  /** Base name (numeric suffix stripped) of the anchor that follows a detachment anchor */
  ruleAnchorBase: string;
  header: string;
  ruleName: string;
}

export interface EnhancementSelectors {
  /** Prefix of the enhancements section anchor */
  anchorPrefix: string;
  list: string;
  span: string;
}

export interface DatasheetSelectors {
  datasheet: string;
  name: string;
  priceTag: string;
  anchor: string;
}

export interface WargearSelectors {
  headerText: string;
  list: string;
  item: string;
}

export interface SelectorRegistry {
  factionList: FactionListSelectors;
  armyRule: ArmyRuleSelectors;
  detachment: DetachmentSelectors;
  enhancement: EnhancementSelectors;
  datasheet: DatasheetSelectors;
  wargear: WargearSelectors;
}

export const WAHAPEDIA_SELECTORS: SelectorRegistry = {
  factionList: {
    navButton: '.NavBtn_Factions',
    dropdown: '.NavDropdown-content',
    link: '.BreakInsideAvoid a',
  },
  armyRule: {
    anchor: 'a[name="Army-Rules"]',
    container: 'div.Columns2',
    ruleBlock: 'div.BreakInsideAvoid',
    ruleName: 'h3',
    ruleNameFallback: 'h2',
  },
  detachment: {
    ruleAnchorBase: 'detachment-rule',
    header: 'h2.outline_header',
    ruleName: 'h3',
  },
  enhancement: {
    anchorPrefix: 'Enhancements',
    list: 'ul.EnhancementsPts',
    span: 'span',
  },
  datasheet: {
    // Hidden blocks are filtered by their inline style, see isHidden()
    datasheet: 'div.datasheet',
    name: '.dsH2Header > div',
    priceTag: '.PriceTag',
    anchor: 'a[name]',
  },
  wargear: {
    headerText: 'WARGEAR OPTIONS',
    list: 'ul',
    item: 'li',
  },
};

export type SelectorOverrides = {
  [K in keyof SelectorRegistry]?: Partial<SelectorRegistry[K]>;
};

/**
 * Merge per-group overrides over the defaults.
 */
export function withSelectors(overrides: SelectorOverrides = {}): SelectorRegistry {
  return {
    factionList: { ...WAHAPEDIA_SELECTORS.factionList, ...overrides.factionList },
    armyRule: { ...WAHAPEDIA_SELECTORS.armyRule, ...overrides.armyRule },
    detachment: { ...WAHAPEDIA_SELECTORS.detachment, ...overrides.detachment },
    enhancement: { ...WAHAPEDIA_SELECTORS.enhancement, ...overrides.enhancement },
    datasheet: { ...WAHAPEDIA_SELECTORS.datasheet, ...overrides.datasheet },
    wargear: { ...WAHAPEDIA_SELECTORS.wargear, ...overrides.wargear },
  };
}

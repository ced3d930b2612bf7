import * as cheerio from 'cheerio';
import type { CheerioAPI, Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../../errors.js';
import {
  WAHAPEDIA_SELECTORS,
  type DatasheetSelectors,
  type WargearSelectors,
} from '../selectors.js';
import {
  slugify,
  cleanText,
  extractFirstInteger,
  isHidden,
  DeduplicationTracker,
} from './utils.js';

export interface ParsedUnit {
  name: string;
  code: string;
  anchor: string;
  basePoints: number | null;
}

interface DatasheetBlock {
  unit: ParsedUnit;
  $block: Cheerio<Element>;
}

/**
 * Anchor of a datasheet block: the first `a[name]` inside it, otherwise the
 * closest named anchor directly in front of it.
 */
function blockAnchor($block: Cheerio<Element>, selector: string): string | null {
  const inner = $block.find(selector).first().attr('name');
  if (inner) return inner;

  const $prev = $block.prev();
  if ($prev.is(selector)) {
    return $prev.attr('name') ?? null;
  }
  return null;
}

function collectDatasheets($: CheerioAPI, selectors: DatasheetSelectors): DatasheetBlock[] {
  const blocks: DatasheetBlock[] = [];
  const seen = new DeduplicationTracker();

  $<Element, string>(selectors.datasheet).each((_, el) => {
    const $block = $(el);
    if (isHidden($block)) return;

    const name = cleanText($block.find(selectors.name).first().text());
    if (!name) return;

    const code = slugify(name);
    if (!code || !seen.addIfNew(code)) return;

    const priceText = cleanText($block.find(selectors.priceTag).first().text());

    blocks.push({
      unit: {
        name,
        code,
        anchor: blockAnchor($block, selectors.anchor) ?? code,
        basePoints: priceText ? extractFirstInteger(priceText) : null,
      },
      $block,
    });
  });

  return blocks;
}

export interface ParsedDatasheet {
  unit: ParsedUnit;
  wargearOptions: string[];
}

/**
 * Parse every visible datasheet of a faction's datasheets page in one pass,
 * with the wargear options of each. Hidden blocks (inline `display: none`,
 * e.g. Legends) are skipped.
 */
export function parseDatasheets(
  html: string,
  selectors: DatasheetSelectors = WAHAPEDIA_SELECTORS.datasheet,
  wargearSelectors: WargearSelectors = WAHAPEDIA_SELECTORS.wargear
): ParsedDatasheet[] {
  const $ = cheerio.load(html);
  const blocks = collectDatasheets($, selectors);

  if (blocks.length === 0) {
    throw new ParseError('No datasheets found');
  }

  return blocks.map((block) => ({
    unit: block.unit,
    wargearOptions: wargearOptionsOf($, block.$block, wargearSelectors),
  }));
}

export function findDatasheet(datasheets: readonly ParsedDatasheet[], unitCode: string): ParsedDatasheet {
  const datasheet = datasheets.find((d) => d.unit.code === unitCode);
  if (!datasheet) {
    throw new ParseError(`No datasheet found for unit ${unitCode}`);
  }
  return datasheet;
}

/**
 * Option lines under the "WARGEAR OPTIONS" header of a datasheet block.
 * A block without that header has no options.
 */
function wargearOptionsOf($: CheerioAPI, $block: Cheerio<Element>, selectors: WargearSelectors): string[] {
  const headerText = selectors.headerText.toUpperCase();
  const $header = $block
    .find('*')
    .filter((_, el) => cleanText($(el).text()).toUpperCase() === headerText)
    .last();

  if (!$header.length) {
    return [];
  }

  // The header may be nested (<div><b>WARGEAR OPTIONS</b></div>); walk up until a list follows
  let $current = $header;
  let $list = $current.nextAll(selectors.list).first();
  while (!$list.length) {
    $current = $current.parent();
    if (!$current.length || $current.is($block)) break;
    $list = $current.nextAll(selectors.list).first();
  }

  const options: string[] = [];
  $list.find(selectors.item).each((_, el) => {
    const text = cleanText($(el).text());
    if (text && text.toLowerCase() !== 'none') {
      options.push(text);
    }
  });

  return options;
}

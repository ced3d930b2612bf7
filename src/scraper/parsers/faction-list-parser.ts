import * as cheerio from 'cheerio';
import { ParseError } from '../../errors.js';
import { WAHAPEDIA_SELECTORS, type FactionListSelectors } from '../selectors.js';
import { normalizeFactionCode } from '../url-resolver.js';
import { DeduplicationTracker, absoluteUrl, cleanText } from './utils.js';

export interface ParsedFaction {
  name: string;
  code: string;
  url: string;
}

/**
 * Faction code from a faction URL.
 *
 * @example "/wh40k10ed/factions/space-marines/" → "space-marines"
 * @example "/wh40k10ed/the-rules/" → null
 */
export function extractFactionCode(url: string): string | null {
  const parts = url.replace(/[?#].*$/, '').replace(/\/+$/, '').split('/');
  const index = parts.indexOf('factions');
  if (index === -1 || index + 1 >= parts.length) return null;
  return parts[index + 1] || null;
}

/**
 * Parse the faction links out of the navigation dropdown.
 *
 * The dropdown is present in the page markup and only hidden by CSS, so it
 * can be read without interacting with the page.
 */
export function parseFactionList(
  html: string,
  baseUrl: string,
  selectors: FactionListSelectors = WAHAPEDIA_SELECTORS.factionList
): ParsedFaction[] {
  const $ = cheerio.load(html);

  const $button = $(selectors.navButton).first();
  if (!$button.length) {
    throw new ParseError('Could not find faction navigation button');
  }

  const $dropdown = $button.nextAll(selectors.dropdown).first();
  if (!$dropdown.length) {
    throw new ParseError('Could not find faction dropdown content');
  }

  const factions: ParsedFaction[] = [];
  const seen = new DeduplicationTracker();

  $dropdown.find(selectors.link).each((_, el) => {
    const $link = $(el);
    const name = cleanText($link.text());
    const href = $link.attr('href')?.trim();
    if (!name || !href) return;

    const url = absoluteUrl(href, baseUrl);
    const code = extractFactionCode(url) ?? normalizeFactionCode(name);
    if (!code || !seen.addIfNew(code)) return;

    factions.push({ name, code, url });
  });

  return factions;
}

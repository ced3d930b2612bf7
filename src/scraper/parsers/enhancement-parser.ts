import * as cheerio from 'cheerio';
import { ParseError } from '../../errors.js';
import { WAHAPEDIA_SELECTORS, type DetachmentSelectors, type EnhancementSelectors } from '../selectors.js';
import {
  slugify,
  cleanText,
  extractPointsCost,
  findParentDetachment,
  sectionElements,
  DeduplicationTracker,
} from './utils.js';

export interface ParsedEnhancement {
  name: string;
  code: string;
  pointsCost: number;
}

/**
 * Parse the enhancements of one detachment from its faction page.
 *
 * The Enhancements anchor is looked up between the detachment's anchor and
 * the next detachment anchor. Each `ul.EnhancementsPts` in that section holds
 * the name in its first span and the cost ("20 pts") in the second.
 */
export function parseEnhancements(
  html: string,
  detachmentAnchor: string,
  selectors: EnhancementSelectors = WAHAPEDIA_SELECTORS.enhancement,
  detachmentSelectors: DetachmentSelectors = WAHAPEDIA_SELECTORS.detachment
): ParsedEnhancement[] {
  const $ = cheerio.load(html);
  const anchors = $('a[name]').toArray();
  const anchorNames = anchors.map((el) => $(el).attr('name') ?? '');

  const sectionAnchors = anchors.filter((_, index) => {
    const name = anchorNames[index] ?? '';
    return name.startsWith(selectors.anchorPrefix)
      && findParentDetachment(anchorNames, index, detachmentSelectors.ruleAnchorBase) === detachmentAnchor;
  });

  if (sectionAnchors.length === 0) {
    throw new ParseError(`No Enhancements anchor found for detachment ${detachmentAnchor}`);
  }

  const enhancements: ParsedEnhancement[] = [];
  const seen = new DeduplicationTracker();

  for (const anchorEl of sectionAnchors) {
    const $section = sectionElements($, $(anchorEl));
    const $lists = $section.filter(selectors.list).add($section.find(selectors.list));

    $lists.each((_, el) => {
      const $spans = $(el).find(selectors.span);
      if ($spans.length < 2) return;

      const name = cleanText($spans.first().text());
      if (!name || !seen.addIfNew(name)) return;

      enhancements.push({
        name,
        code: slugify(name),
        pointsCost: extractPointsCost(cleanText($spans.eq(1).text())),
      });
    });
  }

  return enhancements;
}

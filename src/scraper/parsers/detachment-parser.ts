import * as cheerio from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../../errors.js';
import { WAHAPEDIA_SELECTORS, type DetachmentSelectors } from '../selectors.js';
import {
  slugify,
  cleanText,
  collectAnchorNames,
  findDetachmentAnchorIndices,
  DeduplicationTracker,
} from './utils.js';

export interface ParsedDetachment {
  name: string;
  code: string;
  anchor: string;
  ruleAnchor: string;
  detachmentRuleName: string | null;
}

// Rule subsections that sit in front of a Detachment-Rule anchor without being detachments
const INVALID_DETACHMENT_NAMES = new Set([
  'army rule',
  'army rules',
  'rules adaptations',
]);

/**
 * Clean up a detachment heading. Returns null when nothing usable is left.
 */
function cleanDetachmentName(name: string): string | null {
  const cleaned = cleanText(name)
    // Numbered anchor suffixes leak into some headings ("Feast of Pain 1")
    .replace(/\s+\d+$/, '')
    .trim();

  if (cleaned.length < 2 || INVALID_DETACHMENT_NAMES.has(cleaned.toLowerCase())) {
    return null;
  }

  return cleaned;
}

function findRuleHeading(
  $ruleAnchor: Cheerio<Element>,
  selector: string
): Cheerio<Element> {
  // <a name="Detachment-Rule"></a><h3>...</h3>
  let $heading = $ruleAnchor.nextAll(selector).first();

  // <div><a name="Detachment-Rule"></a>...<h3>...</h3></div>
  if (!$heading.length) {
    $heading = $ruleAnchor.parent().find(selector).first();
  }

  // <div><a name="Detachment-Rule"></a></div><div><h3>...</h3></div>
  if (!$heading.length) {
    $heading = $ruleAnchor.parent().next().find(selector).first();
  }

  return $heading;
}

/**
 * Parse detachments from a faction page.
 *
 * A detachment is a named anchor immediately followed (in anchor order) by a
 * Detachment-Rule anchor. Its name comes from the outline header after the
 * anchor, its rule name from the first h3 of the rule anchor's block.
 */
export function parseDetachments(
  html: string,
  selectors: DetachmentSelectors = WAHAPEDIA_SELECTORS.detachment
): ParsedDetachment[] {
  const $ = cheerio.load(html);
  const anchorNames = collectAnchorNames($);
  const indices = findDetachmentAnchorIndices(anchorNames, selectors.ruleAnchorBase);

  if (indices.length === 0) {
    throw new ParseError('No detachment rule anchors found');
  }

  const detachments: ParsedDetachment[] = [];
  const seen = new DeduplicationTracker();

  for (const index of indices) {
    const anchor = anchorNames[index];
    const ruleAnchor = anchorNames[index + 1];
    if (!anchor || !ruleAnchor) continue;

    const $anchor = $('a[name]').filter((_, el) => $(el).attr('name') === anchor).first();

    let $header = $anchor.nextAll(selectors.header).first();
    if (!$header.length) {
      $header = $anchor.parent().find(selectors.header).first();
    }

    const name = cleanDetachmentName($header.text() || anchor.replace(/-/g, ' '));
    if (!name) continue;
    if (!seen.addIfNew(name)) continue;

    const $ruleAnchor = $('a[name]').filter((_, el) => $(el).attr('name') === ruleAnchor).first();
    const ruleName = cleanText(findRuleHeading($ruleAnchor, selectors.ruleName).text());

    detachments.push({
      name,
      code: slugify(name),
      anchor,
      ruleAnchor,
      detachmentRuleName: ruleName || null,
    });
  }

  return detachments;
}

/**
 * Shared helpers for the Wahapedia page parsers.
 *
 * Slugification, text cleanup, deduplication and the anchor-walking logic
 * that several parsers need to find a section on a faction page.
 */

import type { CheerioAPI, Cheerio } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';

// =============================================================================
// SLUGIFY
// =============================================================================

/**
 * Convert text to URL-friendly slug.
 *
 * @example "Hive Tyrant" → "hive-tyrant"
 * @example "Space Marines 2.0" → "space-marines-2-0"
 */
export function slugify(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
}

// =============================================================================
// TEXT CLEANING
// =============================================================================

/**
 * Collapse whitespace and non-breaking spaces.
 *
 * @example "Hello  world" → "Hello world"
 * @example "Test&nbsp;text" → "Test text"
 */
export function cleanText(text: string): string {
  return text
    .replace(/&nbsp;|\u00a0/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// =============================================================================
// COST EXTRACTION
// =============================================================================

/**
 * Extract points cost from text containing an "X pts" pattern.
 * Returns 0 when there is no number.
 *
 * @example "20 pts" → 20
 * @example "35pts" → 35
 * @example "Free" → 0
 */
export function extractPointsCost(text: string): number {
  const match = text.match(/(\d+)\s*pts?\b/i) ?? text.match(/(\d+)/);
  return match?.[1] ? parseInt(match[1], 10) : 0;
}

/**
 * First integer in the text, or null.
 *
 * @example "5 models 90" → 5
 */
export function extractFirstInteger(text: string): number | null {
  const match = text.match(/\d+/);
  return match ? parseInt(match[0], 10) : null;
}

// =============================================================================
// DEDUPLICATION
// =============================================================================

/**
 * Tracks values already emitted by a parser.
 */
export class DeduplicationTracker {
  private seen = new Set<string>();
  private caseSensitive: boolean;

  constructor(caseSensitive = false) {
    this.caseSensitive = caseSensitive;
  }

  has(value: string): boolean {
    return this.seen.has(this.key(value));
  }

  add(value: string): void {
    this.seen.add(this.key(value));
  }

  /**
   * Returns true if the value was new (not seen before).
   */
  addIfNew(value: string): boolean {
    if (this.has(value)) {
      return false;
    }
    this.add(value);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private key(value: string): string {
    return this.caseSensitive ? value : value.toLowerCase();
  }
}

// =============================================================================
// ANCHOR & SECTION UTILITIES
// =============================================================================

/**
 * Standard Wahapedia anchor names that are NOT detachment names.
 */
export const SYSTEM_SECTIONS: ReadonlySet<string> = new Set([
  'detachment-rule', 'enhancements', 'stratagems', 'army-rules',
  'datasheets', 'books', 'introduction', 'contents', 'boarding-actions',
  'crusade-rules', 'allied-units', 'requisitions', 'agendas', 'battle-traits',
  'faq', 'keywords', 'faction-pack',
]);

/**
 * Remove the numeric suffix Wahapedia adds to repeated section anchors.
 *
 * @example "Stratagems-3" → "Stratagems"
 * @example "Enhancements" → "Enhancements"
 */
export function extractBaseSectionName(anchorName: string): string {
  return anchorName.replace(/-\d+$/, '');
}

/**
 * Names of every `a[name]` on the page, in document order.
 */
export function collectAnchorNames($: CheerioAPI): string[] {
  const names: string[] = [];
  $('a[name]').each((_, el) => {
    const name = $(el).attr('name');
    if (name) names.push(name);
  });
  return names;
}

/**
 * Indices of detachment anchors: non-system anchors immediately followed
 * by a detachment-rule anchor.
 */
export function findDetachmentAnchorIndices(anchorNames: readonly string[], ruleAnchorBase: string): number[] {
  const indices: number[] = [];

  for (let i = 0; i < anchorNames.length - 1; i++) {
    const baseName = extractBaseSectionName(anchorNames[i] ?? '').toLowerCase();
    if (SYSTEM_SECTIONS.has(baseName)) continue;

    const nextBaseName = extractBaseSectionName(anchorNames[i + 1] ?? '').toLowerCase();
    if (nextBaseName === ruleAnchorBase) {
      indices.push(i);
    }
  }

  return indices;
}

/**
 * Anchor name of the detachment that owns the anchor at `currentIndex`,
 * searching backwards. Null when the anchor precedes every detachment.
 */
export function findParentDetachment(
  anchorNames: readonly string[],
  currentIndex: number,
  ruleAnchorBase: string
): string | null {
  const detachmentIndices = findDetachmentAnchorIndices(anchorNames, ruleAnchorBase);

  for (let i = detachmentIndices.length - 1; i >= 0; i--) {
    const index = detachmentIndices[i];
    if (index !== undefined && index < currentIndex) {
      return anchorNames[index] ?? null;
    }
  }

  return null;
}

/**
 * Elements belonging to the section opened by a named anchor: its following
 * siblings up to the next named anchor. When the anchor is wrapped (no
 * siblings), the wrapper's following siblings are used instead, stopping at
 * the next element that is or contains a named anchor.
 */
export function sectionElements($: CheerioAPI, $anchor: Cheerio<Element>): Cheerio<Element> {
  const $siblings = $anchor.nextUntil('a[name]');
  if ($siblings.length > 0) {
    return $siblings;
  }

  const $wrapper = $anchor.parent();
  if (!$wrapper.length || $wrapper.is('body')) {
    return $siblings;
  }

  const elements: Element[] = [];
  for (const el of $wrapper.nextAll().toArray()) {
    const $el = $(el);
    if ($el.is('a[name]') || $el.find('a[name]').length > 0) break;
    elements.push(el);
  }
  return $(elements);
}

/**
 * First element matching `selector` among the given elements, themselves
 * included, in document order.
 */
export function findFirst(
  $: CheerioAPI,
  $elements: Cheerio<Element>,
  selector: string
): Cheerio<Element> {
  for (const el of $elements.toArray()) {
    const $el = $(el);
    if ($el.is(selector)) return $el;
    const $match = $el.find(selector).first();
    if ($match.length) return $match;
  }
  const none: Element[] = [];
  return $(none);
}

/**
 * Make a host-relative link absolute.
 */
export function absoluteUrl(href: string, baseUrl: string): string {
  if (/^https?:\/\//i.test(href)) return href;
  return `${baseUrl.replace(/\/+$/, '')}/${href.replace(/^\/+/, '')}`;
}

export function isHidden($el: Cheerio<AnyNode>): boolean {
  const style = $el.attr('style') ?? '';
  return /display\s*:\s*none/i.test(style);
}

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../../errors.js';
import { WAHAPEDIA_SELECTORS, type ArmyRuleSelectors } from '../selectors.js';
import { cleanText, findFirst, sectionElements } from './utils.js';

/**
 * Name of a faction's army rule.
 *
 * Structure: <a name="Army-Rules"> <h2>Army Rules</h2> <div class="Columns2">
 * <div class="BreakInsideAvoid"><h3>Rule name</h3>...</div></div>
 *
 * Only the Army-Rules section is searched (up to the next named anchor). When
 * the section has no Columns2 container, the first BreakInsideAvoid block in
 * the section is used instead.
 */
export function parseArmyRule(
  html: string,
  selectors: ArmyRuleSelectors = WAHAPEDIA_SELECTORS.armyRule
): string {
  const $ = cheerio.load(html);

  const $anchor = $<Element, string>(selectors.anchor).first();
  if (!$anchor.length) {
    throw new ParseError('No Army Rules anchor found');
  }

  const $section = sectionElements($, $anchor);
  const $container = findFirst($, $section, selectors.container);

  const $ruleBlock = $container.length
    ? $container.find(selectors.ruleBlock).first()
    : findFirst($, $section, selectors.ruleBlock);

  if (!$ruleBlock.length) {
    throw new ParseError(
      $container.length
        ? 'No rule block found inside the Army Rules container'
        : 'No rule container or rule block found in the Army Rules section'
    );
  }

  let $heading = $ruleBlock.find(selectors.ruleName).first();
  if (!$heading.length) {
    $heading = $ruleBlock.find(selectors.ruleNameFallback).first();
  }

  const name = cleanText($heading.text());
  if (!name) {
    throw new ParseError('No heading found in the Army Rules block');
  }

  return name;
}

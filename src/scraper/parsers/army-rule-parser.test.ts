import { describe, it, expect } from 'vitest';
import { parseArmyRule } from './army-rule-parser.js';
import { ParseError } from '../../errors.js';
import { ORKS_PAGE, NECRONS_PAGE } from '../../test-helpers/fixtures.js';

describe('parseArmyRule', () => {
  it('reads the first heading of the Columns2 rule block', () => {
    expect(parseArmyRule(ORKS_PAGE)).toBe('Waaagh!');
  });

  it('falls back to h2 when the block has no h3', () => {
    const html = `
      <a name="Army-Rules"></a>
      <h2>Army Rules</h2>
      <div class="Columns2">
        <div class="BreakInsideAvoid"><h2>Code Chivalric</h2><p>Oaths.</p></div>
      </div>
    `;

    expect(parseArmyRule(html)).toBe('Code Chivalric');
  });

  it('uses the first BreakInsideAvoid block when the section has no Columns2', () => {
    const html = `
      <a name="Army-Rules"></a>
      <h2>Army Rules</h2>
      <div class="BreakInsideAvoid"><h3>Reanimation Protocols</h3></div>
      <div class="BreakInsideAvoid"><h3>Command Protocols</h3></div>
    `;

    expect(parseArmyRule(html)).toBe('Reanimation Protocols');
  });

  it('prefers Columns2 over an earlier BreakInsideAvoid sibling', () => {
    const html = `
      <a name="Army-Rules"></a>
      <div class="BreakInsideAvoid"><h3>Flavour Text</h3></div>
      <div class="Columns2">
        <div class="BreakInsideAvoid"><h3>Oath of Moment</h3></div>
      </div>
    `;

    expect(parseArmyRule(html)).toBe('Oath of Moment');
  });

  it('does not search past the next named anchor', () => {
    const html = `
      <a name="Army-Rules"></a>
      <h2>Army Rules</h2>
      <a name="Gladius-Task-Force"></a>
      <div class="Columns2">
        <div class="BreakInsideAvoid"><h3>Combat Doctrines</h3></div>
      </div>
    `;

    expect(() => parseArmyRule(html)).toThrow(
      'No rule container or rule block found in the Army Rules section'
    );
  });

  it('looks beside a wrapped anchor', () => {
    const html = `
      <div><a name="Army-Rules"></a></div>
      <h2>Army Rules</h2>
      <div class="Columns2">
        <div class="BreakInsideAvoid"><h3>Synapse</h3></div>
      </div>
    `;

    expect(parseArmyRule(html)).toBe('Synapse');
  });

  it('does not fall back when Columns2 has no rule block', () => {
    const html = `
      <a name="Army-Rules"></a>
      <div class="Columns2"><p>Empty</p></div>
      <div class="BreakInsideAvoid"><h3>Unrelated</h3></div>
    `;

    expect(() => parseArmyRule(html)).toThrow('No rule block found inside the Army Rules container');
  });

  it('throws when the block has no heading', () => {
    const html = `
      <a name="Army-Rules"></a>
      <div class="Columns2"><div class="BreakInsideAvoid"><p>Just text</p></div></div>
    `;

    expect(() => parseArmyRule(html)).toThrow('No heading found in the Army Rules block');
  });

  it('throws a ParseError when the anchor is missing', () => {
    expect(() => parseArmyRule(NECRONS_PAGE)).toThrow(ParseError);
    expect(() => parseArmyRule(NECRONS_PAGE)).toThrow('No Army Rules anchor found');
  });
});

import { describe, it, expect } from 'vitest';
import { parseDatasheets, findDatasheet, type ParsedUnit } from './datasheet-parser.js';
import { ParseError } from '../../errors.js';
import { ORKS_DATASHEETS_PAGE, NECRONS_DATASHEETS_PAGE } from '../../test-helpers/fixtures.js';

function unitsOf(html: string): ParsedUnit[] {
  return parseDatasheets(html).map((d) => d.unit);
}

function wargearOf(html: string, unitCode: string): string[] {
  return findDatasheet(parseDatasheets(html), unitCode).wargearOptions;
}

describe('parseDatasheets', () => {
  it('reads visible datasheets with their points', () => {
    expect(unitsOf(ORKS_DATASHEETS_PAGE)).toEqual([
      { name: 'Boyz', code: 'boyz', anchor: 'Boyz', basePoints: 85 },
      { name: 'Warboss', code: 'warboss', anchor: 'Warboss', basePoints: 65 },
      { name: 'Gretchin', code: 'gretchin', anchor: 'gretchin', basePoints: null },
    ]);
  });

  it('takes the first integer of the price tag', () => {
    const html = `
      <div class="datasheet">
        <div class="dsH2Header"><div>Intercessor Squad</div><div class="PriceTag">5 models: 80</div></div>
      </div>
    `;

    expect(unitsOf(html)[0]?.basePoints).toBe(5);
  });

  it('skips hidden datasheets regardless of style spacing', () => {
    const html = `
      <div class="datasheet" style="display:none"><div class="dsH2Header"><div>Hidden One</div></div></div>
      <div class="datasheet" style="margin: 0; DISPLAY : NONE"><div class="dsH2Header"><div>Hidden Two</div></div></div>
      <div class="datasheet" style="display: block"><div class="dsH2Header"><div>Shown</div></div></div>
    `;

    expect(unitsOf(html).map((u) => u.name)).toEqual(['Shown']);
  });

  it('throws when there are no datasheets', () => {
    expect(() => unitsOf('<p>No units</p>')).toThrow(ParseError);
  });
});

describe('wargear options', () => {
  it('reads the list after the WARGEAR OPTIONS header', () => {
    expect(wargearOf(ORKS_DATASHEETS_PAGE, 'boyz')).toEqual([
      '1 Boy can be equipped with 1 big shoota.',
      'The Boss Nob can be equipped with 1 power klaw.',
    ]);
  });

  it('handles a nested header and drops "None"', () => {
    expect(wargearOf(ORKS_DATASHEETS_PAGE, 'warboss')).toEqual([]);
  });

  it('returns nothing when the datasheet has no wargear section', () => {
    expect(wargearOf(ORKS_DATASHEETS_PAGE, 'gretchin')).toEqual([]);
  });

  it('reads header and list placed directly in the block', () => {
    expect(wargearOf(NECRONS_DATASHEETS_PAGE, 'necron-warriors')).toEqual([
      'Any number of models can each have their gauss flayer replaced with 1 gauss reaper.',
    ]);
  });

  it('does not pick up the list of the next datasheet', () => {
    const html = `
      <div class="datasheet">
        <div class="dsH2Header"><div>Lonely Unit</div></div>
        <div class="dsHeader">WARGEAR OPTIONS</div>
      </div>
      <ul><li>Belongs elsewhere</li></ul>
    `;

    expect(wargearOf(html, 'lonely-unit')).toEqual([]);
  });

  it('throws for an unknown or hidden unit', () => {
    expect(() => wargearOf(ORKS_DATASHEETS_PAGE, 'legendary-squiggoth')).toThrow(
      'No datasheet found for unit legendary-squiggoth'
    );
  });
});

import { describe, it, expect } from 'vitest';
import { parseEnhancements } from './enhancement-parser.js';
import { ParseError } from '../../errors.js';
import { ORKS_PAGE } from '../../test-helpers/fixtures.js';

describe('parseEnhancements', () => {
  it('reads name and points from EnhancementsPts lists', () => {
    expect(parseEnhancements(ORKS_PAGE, 'War-Horde')).toEqual([
      { name: 'Follow Me Ladz', code: 'follow-me-ladz', pointsCost: 25 },
      { name: "Headwoppa's Killchoppa", code: 'headwoppa-s-killchoppa', pointsCost: 20 },
    ]);
  });

  it('stays inside the detachment section', () => {
    expect(parseEnhancements(ORKS_PAGE, 'Da-Big-Hunt')).toEqual([
      { name: 'Proper Killy', code: 'proper-killy', pointsCost: 20 },
    ]);
  });

  it('ignores lists without a points span', () => {
    const html = `
      <a name="Wolf-Pack"></a>
      <a name="Detachment-Rule"></a>
      <a name="Enhancements"></a>
      <ul class="EnhancementsPts"><li><span>Half Listed</span></li></ul>
      <ul class="EnhancementsPts"><li><span>Frost Blade</span><span>15pts</span></li></ul>
    `;

    expect(parseEnhancements(html, 'Wolf-Pack')).toEqual([
      { name: 'Frost Blade', code: 'frost-blade', pointsCost: 15 },
    ]);
  });

  it('throws when the detachment has no Enhancements anchor', () => {
    const html = `
      <a name="Wolf-Pack"></a>
      <a name="Detachment-Rule"></a>
      <a name="Stratagems"></a>
    `;

    expect(() => parseEnhancements(html, 'Wolf-Pack')).toThrow(ParseError);
    expect(() => parseEnhancements(ORKS_PAGE, 'Unknown-Detachment')).toThrow(
      'No Enhancements anchor found for detachment Unknown-Detachment'
    );
  });
});

import { describe, it, expect } from 'vitest';
import { parseDetachments } from './detachment-parser.js';
import { ParseError } from '../../errors.js';
import { ORKS_PAGE, NECRONS_PAGE } from '../../test-helpers/fixtures.js';

describe('parseDetachments', () => {
  it('finds anchors followed by a Detachment-Rule anchor', () => {
    expect(parseDetachments(ORKS_PAGE)).toEqual([
      {
        name: 'War Horde',
        code: 'war-horde',
        anchor: 'War-Horde',
        ruleAnchor: 'Detachment-Rule',
        detachmentRuleName: 'Get Stuck In',
      },
      {
        name: 'Da Big Hunt',
        code: 'da-big-hunt',
        anchor: 'Da-Big-Hunt',
        ruleAnchor: 'Detachment-Rule-2',
        detachmentRuleName: 'Da Hunt Is On',
      },
    ]);
  });

  it('handles a single detachment', () => {
    const detachments = parseDetachments(NECRONS_PAGE);

    expect(detachments).toHaveLength(1);
    expect(detachments[0]?.name).toBe('Awakened Dynasty');
    expect(detachments[0]?.detachmentRuleName).toBe('Command Protocols');
  });

  it('finds the rule heading in the block after a wrapped rule anchor', () => {
    const html = `
      <a name="Gladius-Task-Force"></a>
      <h2 class="outline_header">Gladius Task Force</h2>
      <div class="Columns2">
        <div><a name="Detachment-Rule"></a></div>
        <div><h3 class="dsColorBgSM">Combat Doctrines</h3></div>
      </div>
    `;

    expect(parseDetachments(html)[0]?.detachmentRuleName).toBe('Combat Doctrines');
  });

  it('derives the name from the anchor when there is no header', () => {
    const html = `
      <a name="Ironstorm-Spearhead"></a>
      <a name="Detachment-Rule"></a>
      <p>No heading here.</p>
    `;

    expect(parseDetachments(html)).toEqual([
      {
        name: 'Ironstorm Spearhead',
        code: 'ironstorm-spearhead',
        anchor: 'Ironstorm-Spearhead',
        ruleAnchor: 'Detachment-Rule',
        detachmentRuleName: null,
      },
    ]);
  });

  it('skips system sections and rule subsections', () => {
    const html = `
      <a name="Army-Rules"></a>
      <a name="Detachment-Rule"></a>
      <a name="Rules-Adaptations"></a>
      <h2 class="outline_header">Rules Adaptations</h2>
      <a name="Detachment-Rule-2"></a>
    `;

    expect(() => parseDetachments(html)).not.toThrow();
    expect(parseDetachments(html)).toEqual([]);
  });

  it('strips numbered suffixes from headings and drops duplicates', () => {
    const html = `
      <a name="Feast-of-Pain"></a>
      <h2 class="outline_header">Feast of Pain 1</h2>
      <a name="Detachment-Rule"></a>
      <a name="Feast-of-Pain-2"></a>
      <h2 class="outline_header">Feast of Pain</h2>
      <a name="Detachment-Rule-2"></a>
    `;

    const detachments = parseDetachments(html);

    expect(detachments.map((d) => d.name)).toEqual(['Feast of Pain']);
  });

  it('throws when the page has no detachment rules', () => {
    expect(() => parseDetachments('<a name="Army-Rules"></a><h2>Army Rules</h2>')).toThrow(ParseError);
  });
});

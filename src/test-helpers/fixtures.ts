// Minimal Wahapedia-shaped pages shared by parser, stage and pipeline tests

export const INDEX_PAGE = `
<html>
  <body>
    <div class="NavRow">
      <div class="NavBtn NavBtn_Factions">Factions</div>
      <div class="NavDropdown-content">
        <div class="BreakInsideAvoid"><a href="/factions/orks">Orks</a></div>
        <div class="BreakInsideAvoid"><a href="/factions/necrons">Necrons</a></div>
      </div>
    </div>
  </body>
</html>
`;

export const ORKS_PAGE = `
<html>
  <body>
    <a name="Introduction"></a>
    <h2>Introduction</h2>
    <p>Green and numerous.</p>

    <a name="Army-Rules"></a>
    <h2>Army Rules</h2>
    <div class="Columns2">
      <div class="BreakInsideAvoid">
        <h3>Waaagh!</h3>
        <p>Once per battle, call the Waaagh!</p>
      </div>
    </div>

    <a name="War-Horde"></a>
    <h2 class="outline_header">War Horde</h2>
    <div class="Columns2">
      <div>
        <a name="Detachment-Rule"></a>
        <h3>Get Stuck In</h3>
        <p>Melee weapons gain SUSTAINED HITS 1.</p>
      </div>
    </div>
    <a name="Enhancements"></a>
    <h2>Enhancements</h2>
    <div class="Columns2">
      <div class="BreakInsideAvoid">
        <ul class="EnhancementsPts"><li><span>Follow Me Ladz</span><span>25 pts</span></li></ul>
        <p>ORKS model only.</p>
      </div>
      <div class="BreakInsideAvoid">
        <ul class="EnhancementsPts"><li><span>Headwoppa's Killchoppa</span><span>20 pts</span></li></ul>
      </div>
    </div>
    <a name="Stratagems"></a>
    <h2>Stratagems</h2>

    <a name="Da-Big-Hunt"></a>
    <h2 class="outline_header">Da Big Hunt</h2>
    <div class="Columns2">
      <div>
        <a name="Detachment-Rule-2"></a>
        <h3>Da Hunt Is On</h3>
      </div>
    </div>
    <a name="Enhancements-2"></a>
    <h2>Enhancements</h2>
    <div class="Columns2">
      <div class="BreakInsideAvoid">
        <ul class="EnhancementsPts"><li><span>Proper Killy</span><span>20 pts</span></li></ul>
      </div>
    </div>
    <a name="Stratagems-2"></a>
    <h2>Stratagems</h2>
  </body>
</html>
`;

// Faction page without an Army-Rules anchor
export const NECRONS_PAGE = `
<html>
  <body>
    <a name="Introduction"></a>
    <h2>Introduction</h2>
    <a name="Awakened-Dynasty"></a>
    <h2 class="outline_header">Awakened Dynasty</h2>
    <div class="Columns2">
      <div>
        <a name="Detachment-Rule"></a>
        <h3>Command Protocols</h3>
      </div>
    </div>
    <a name="Enhancements"></a>
    <h2>Enhancements</h2>
    <div class="Columns2">
      <div class="BreakInsideAvoid">
        <ul class="EnhancementsPts"><li><span>Enaegic Dermal Bond</span><span>15 pts</span></li></ul>
      </div>
    </div>
  </body>
</html>
`;

export const ORKS_DATASHEETS_PAGE = `
<html>
  <body>
    <div class="datasheet">
      <a name="Boyz"></a>
      <div class="dsH2Header"><div>Boyz</div><div class="PriceTag">85</div></div>
      <div class="dsAbility">
        <div class="dsHeader">WARGEAR OPTIONS</div>
        <ul>
          <li>1 Boy can be equipped with 1 big shoota.</li>
          <li>The Boss Nob can be equipped with 1 power klaw.</li>
        </ul>
      </div>
    </div>
    <a name="Warboss"></a>
    <div class="datasheet">
      <div class="dsH2Header"><div>Warboss</div><div class="PriceTag">65</div></div>
      <div>
        <div class="dsHeader"><b>WARGEAR OPTIONS</b></div>
        <ul><li>None</li></ul>
      </div>
    </div>
    <div class="datasheet" style="display: none">
      <div class="dsH2Header"><div>Legendary Squiggoth</div><div class="PriceTag">300</div></div>
    </div>
    <div class="datasheet">
      <div class="dsH2Header"><div>Gretchin</div></div>
    </div>
  </body>
</html>
`;

export const NECRONS_DATASHEETS_PAGE = `
<html>
  <body>
    <div class="datasheet">
      <a name="Warriors"></a>
      <div class="dsH2Header"><div>Necron Warriors</div><div class="PriceTag">90</div></div>
      <div class="dsHeader">WARGEAR OPTIONS</div>
      <ul><li>Any number of models can each have their gauss flayer replaced with 1 gauss reaper.</li></ul>
    </div>
  </body>
</html>
`;

export const FIXTURE_URLS = {
  index: 'https://wahapedia.ru/wh40k10ed/the-rules/quick-start-guide/',
  orks: 'https://wahapedia.ru/factions/orks',
  necrons: 'https://wahapedia.ru/factions/necrons',
  orksDatasheets: 'https://wahapedia.ru/wh40k10ed/factions/orks/datasheets',
  necronsDatasheets: 'https://wahapedia.ru/wh40k10ed/factions/necrons/datasheets',
} as const;

/** Every fixture page keyed by the URL the 10th edition source asks for */
export function fixtureSite(): Record<string, string> {
  return {
    [FIXTURE_URLS.index]: INDEX_PAGE,
    [FIXTURE_URLS.orks]: ORKS_PAGE,
    [FIXTURE_URLS.necrons]: NECRONS_PAGE,
    [FIXTURE_URLS.orksDatasheets]: ORKS_DATASHEETS_PAGE,
    [FIXTURE_URLS.necronsDatasheets]: NECRONS_DATASHEETS_PAGE,
  };
}

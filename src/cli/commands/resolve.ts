import { Command } from 'commander';
import { loadConfig } from '../../config.js';
import {
  VersionedUrlResolver,
  normalizeFactionCode,
  validateFactionCode,
} from '../../scraper/url-resolver.js';

export const resolveCommand = new Command('resolve')
  .description('Print the Wahapedia URL of a faction page or section')
  .argument('<faction>', 'Faction code or name (e.g. "Space Marines")')
  .argument('[section]', 'Section name (army_rules, detachments, ...) or a literal anchor')
  .option('-v, --version <id>', 'Game version id (e.g. 10th)')
  .action((faction: string, section: string | undefined, options: { version?: string }) => {
    const versionId = options.version ?? loadConfig().versionId;
    const resolver = new VersionedUrlResolver(versionId);

    const code = normalizeFactionCode(faction);
    if (!validateFactionCode(code)) {
      console.warn(`"${code}" is not a known faction code`);
    }

    const url = resolver.resolve(faction, section);
    if (!url) {
      console.error(`Could not resolve a URL for "${faction}"`);
      process.exitCode = 1;
      return;
    }
    console.log(url);
  });

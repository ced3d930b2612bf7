import { ConfigurationError } from '../../errors.js';
import type { PageFetcher } from '../fetcher.js';
import type { VersionedUrlResolver } from '../url-resolver.js';
import { isSourceName, SOURCE_NAMES, type ScraperSource } from './source.js';
import { WahapediaSource } from './wahapedia-source.js';

export { SOURCE_NAMES, isSourceName, type ScraperSource, type SourceName } from './source.js';
export { WahapediaSource } from './wahapedia-source.js';

export interface SourceDependencies {
  fetcher: PageFetcher;
  resolver: VersionedUrlResolver;
}

/**
 * Resolve a configured source name to its implementation.
 */
export function createSource(name: string, deps: SourceDependencies): ScraperSource {
  if (!isSourceName(name)) {
    throw new ConfigurationError(`Unknown scraper source "${name}". Available: ${SOURCE_NAMES.join(', ')}`);
  }

  switch (name) {
    case 'wahapedia':
      return new WahapediaSource(deps);
  }
}

import { FetchError } from '../errors.js';
import type { FetchFailure, PageFetcher } from '../scraper/fetcher.js';

/**
 * Serves canned pages by URL. Unknown URLs fail like a 404.
 */
export class FixtureFetcher implements PageFetcher {
  readonly requests: string[] = [];
  lastFailure: FetchFailure | null = null;
  private pages: Map<string, string>;

  constructor(pages: Record<string, string>) {
    this.pages = new Map(Object.entries(pages));
  }

  async fetch(url: string): Promise<string | null> {
    this.requests.push(url);

    const html = this.pages.get(url);
    if (html === undefined) {
      const cause = new FetchError(url, 'HTTP 404 Not Found', 404);
      this.lastFailure = { url, cause, status: 404 };
      return null;
    }
    return html;
  }
}

import { WAHAPEDIA_HOST, USER_AGENT } from './config.js';
import { FetchError, errorMessage } from '../errors.js';

export interface FetcherConfig {
  /** Lower bound of the randomized gap between requests */
  minDelayMs: number;
  maxDelayMs: number;
  /** Retries after the first attempt for retryable failures */
  maxRetries: number;
  /** Backoff before retry n is backoffMs * 2^(n-1) */
  backoffMs: number;
  timeoutMs: number;
  baseUrl: string;
}

export const DEFAULT_FETCHER_CONFIG: FetcherConfig = {
  minDelayMs: 2000,
  maxDelayMs: 3000,
  maxRetries: 3,
  backoffMs: 1000,
  timeoutMs: 30000,
  baseUrl: WAHAPEDIA_HOST,
};

export interface FetchFailure {
  url: string;
  cause: FetchError;
  status: number | null;
}

/** Anything that can turn a URL into page markup, or null on failure. */
export interface PageFetcher {
  fetch(url: string): Promise<string | null>;
  /** Details of the most recent failed fetch */
  readonly lastFailure: FetchFailure | null;
}

/**
 * HTTP GET client for a single upstream host.
 *
 * Requests are spaced by a random delay in [minDelayMs, maxDelayMs]; the limit
 * is per instance, so components that share a limit must share a fetcher.
 * Never throws: failures are logged, kept in `lastFailure`, and surface as null.
 */
export class RateLimitedFetcher implements PageFetcher {
  private config: FetcherConfig;
  private lastRequestTime = 0;
  private requestCount = 0;
  private failureCount = 0;
  private _lastFailure: FetchFailure | null = null;

  constructor(config: Partial<FetcherConfig> = {}) {
    this.config = { ...DEFAULT_FETCHER_CONFIG, ...config };
  }

  get lastFailure(): FetchFailure | null {
    return this._lastFailure;
  }

  resolveUrl(url: string): string {
    if (/^https?:\/\//i.test(url)) return url;
    return `${this.config.baseUrl}/${url.replace(/^\/+/, '')}`;
  }

  async fetch(url: string): Promise<string | null> {
    const absoluteUrl = this.resolveUrl(url);

    await this.rateLimit();
    this.requestCount++;
    console.log(`[Fetch] GET ${absoluteUrl}`);

    try {
      return await this.fetchWithRetry(absoluteUrl);
    } catch (error) {
      const cause = error instanceof FetchError
        ? error
        : new FetchError(absoluteUrl, errorMessage(error), null, { cause: error });
      this.failureCount++;
      this._lastFailure = { url: absoluteUrl, cause, status: cause.status };
      console.error(`[Fetch] Failed to fetch ${absoluteUrl}: ${cause.message}`);
      return null;
    } finally {
      this.lastRequestTime = Date.now();
    }
  }

  getStats(): { requestCount: number; failureCount: number } {
    return {
      requestCount: this.requestCount,
      failureCount: this.failureCount,
    };
  }

  private async fetchWithRetry(url: string): Promise<string> {
    let lastError: FetchError | null = null;

    for (let attempt = 1; attempt <= this.config.maxRetries + 1; attempt++) {
      try {
        return await this.request(url);
      } catch (error) {
        lastError = error instanceof FetchError
          ? error
          : new FetchError(url, errorMessage(error), null, { cause: error });

        if (!lastError.retryable) {
          throw lastError;
        }

        console.error(`[Fetch] Attempt ${attempt} failed: ${lastError.message}`);

        if (attempt <= this.config.maxRetries) {
          const delay = this.config.backoffMs * Math.pow(2, attempt - 1);
          console.log(`[Fetch] Retrying in ${delay}ms...`);
          await this.sleep(delay);
        }
      }
    }

    throw lastError ?? new FetchError(url, 'Fetch failed');
  }

  private async request(url: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { 'User-Agent': USER_AGENT },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      if (controller.signal.aborted) {
        throw new FetchError(url, `Request timed out after ${this.config.timeoutMs}ms`, null, { cause: error });
      }
      throw new FetchError(url, errorMessage(error), null, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private async rateLimit(): Promise<void> {
    if (this.lastRequestTime === 0) return;

    const { minDelayMs, maxDelayMs } = this.config;
    const delay = minDelayMs + Math.random() * (maxDelayMs - minDelayMs);
    const elapsed = Date.now() - this.lastRequestTime;

    if (elapsed < delay) {
      await this.sleep(delay - elapsed);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

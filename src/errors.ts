/**
 * Error taxonomy for the scraper.
 *
 * Only ConfigurationError and MessageBusError ever reach callers as thrown
 * exceptions. Fetch and publish failures are reported as values (null / false)
 * and parse failures are caught per item by the extraction stages.
 */

export type ScraperErrorCode = 'FETCH' | 'PARSE' | 'PUBLISH' | 'CONFIGURATION' | 'MESSAGE_BUS';

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FetchError extends ScraperError {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('FETCH', message, options);
    this.url = url;
    this.status = status;
  }

  /** 429 and the 5xx gateway family are worth another attempt; network errors carry no status. */
  get retryable(): boolean {
    return this.status === null || RETRYABLE_STATUS_CODES.has(this.status);
  }
}

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export class ParseError extends ScraperError {
  constructor(message: string) {
    super('PARSE', message);
  }
}

export class PublishError extends ScraperError {
  readonly channel: string;

  constructor(channel: string, message: string, options?: { cause?: unknown }) {
    super('PUBLISH', message, options);
    this.channel = channel;
  }
}

export class ConfigurationError extends ScraperError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

export class MessageBusError extends ScraperError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MESSAGE_BUS', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

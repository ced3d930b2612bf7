import { InvalidArgumentError } from 'commander';
import type { AppConfig } from '../config.js';
import { MessageBus } from '../bus/message-bus.js';
import { isBusChannel, type BusChannel } from '../bus/channels.js';
import { maskRedisUrl } from '../bus/connection.js';
import { RateLimitedFetcher } from '../scraper/fetcher.js';

export function createBus(config: AppConfig): MessageBus {
  return new MessageBus({ url: config.redisUrl, source: config.messageSource });
}

export function createFetcher(config: AppConfig): RateLimitedFetcher {
  return new RateLimitedFetcher({
    minDelayMs: config.rateLimit.minDelayMs,
    maxDelayMs: config.rateLimit.maxDelayMs,
    timeoutMs: config.requestTimeoutMs,
  });
}

/**
 * Open the bus or report why not. Callers exit non-zero on false.
 */
export async function openBus(bus: MessageBus, config: AppConfig): Promise<boolean> {
  const ok = await bus.open();
  if (!ok) {
    console.error(`✗ Message bus unavailable (${maskRedisUrl(config.redisUrl)})`);
  }
  return ok;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseChannel(value: string): BusChannel {
  if (!isBusChannel(value)) {
    throw new InvalidArgumentError(`Unknown channel "${value}".`);
  }
  return value;
}

import { Redis, type RedisOptions } from 'ioredis';

export type TransactionResults = Array<[error: Error | null, result: unknown]>;

/**
 * Commands queued inside MULTI/EXEC. Nothing is applied until `exec`.
 */
export interface BusTransaction {
  del(key: string): BusTransaction;
  lpush(key: string, ...values: string[]): BusTransaction;
  rpush(key: string, ...values: string[]): BusTransaction;
  ltrim(key: string, start: number, stop: number): BusTransaction;
  hset(key: string, fields: Record<string, string>): BusTransaction;
  expire(key: string, seconds: number): BusTransaction;
  exec(): Promise<TransactionResults | null>;
}

/**
 * The subset of the ioredis client the message bus uses. Tests provide an
 * in-process implementation.
 */
export interface BusConnection {
  readonly status: string;
  ping(): Promise<string>;
  publish(channel: string, message: string): Promise<number>;
  multi(): BusTransaction;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  subscribe(...channels: string[]): Promise<unknown>;
  unsubscribe(...channels: string[]): Promise<unknown>;
  on(event: 'message', listener: (channel: string, message: string) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  quit(): Promise<string>;
  /** Second connection with the same settings (subscriber mode needs its own) */
  duplicate(): BusConnection;
}

export type ConnectionFactory = (url: string) => BusConnection;

/**
 * Fails fast when the broker is down: a few reconnect attempts, then
 * commands reject instead of queueing forever.
 */
export const busConnectionOptions: RedisOptions = {
  lazyConnect: true,
  connectTimeout: 5000,
  maxRetriesPerRequest: 1,
  retryStrategy(times: number) {
    if (times > 3) return null;
    return Math.min(times * 500, 2000);
  },
};

export function createRedisConnection(url: string): BusConnection {
  return new Redis(url, busConnectionOptions);
}

/**
 * Mask the password in a Redis URL for logging.
 */
export function maskRedisUrl(url: string): string {
  return url.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@');
}

import { MessageBusError, PublishError, errorMessage } from '../errors.js';
import {
  RECENT_CAPACITY,
  RECENT_TTL_SECONDS,
  SELF_TEST_CHANNEL,
  recentKey,
  type BusChannel,
} from './channels.js';
import {
  createRedisConnection,
  maskRedisUrl,
  type BusConnection,
  type BusTransaction,
  type ConnectionFactory,
} from './connection.js';
import { decodeEnvelope, type Envelope, type EnvelopeInput } from './envelope.js';

export type MessageHandler = (envelope: Envelope, channel: string) => void | Promise<void>;

export interface SnapshotStore {
  hashKey: string;
  listKey: string;
  ttlSeconds: number;
}

export interface MessageBusOptions {
  url: string;
  /** Fixed tag stamped on every envelope */
  source: string;
  createConnection?: ConnectionFactory;
}

/**
 * Redis publish/subscribe client.
 *
 * Publishing goes through one connection and also records each envelope in a
 * bounded per-channel list (`messages:<channel>:recent`). Subscriptions share
 * a second connection, and every received message goes through one dispatch
 * chain, so handlers see messages one at a time in arrival order.
 */
export class MessageBus {
  private readonly url: string;
  private readonly source: string;
  private readonly createConnection: ConnectionFactory;

  private client: BusConnection | null = null;
  private subscriber: BusConnection | null = null;
  private handlers = new Map<string, MessageHandler[]>();
  private dispatchChain: Promise<void> = Promise.resolve();
  private lastTimestampMs = 0;
  private _lastPublishError: PublishError | null = null;

  constructor(options: MessageBusOptions) {
    this.url = options.url;
    this.source = options.source;
    this.createConnection = options.createConnection ?? createRedisConnection;
  }

  get isOpen(): boolean {
    return this.client !== null;
  }

  /** Why the most recent failed publish did not go out */
  get lastPublishError(): PublishError | null {
    return this._lastPublishError;
  }

  /**
   * Connect and ping the broker. Returns false when it cannot be reached.
   */
  async open(): Promise<boolean> {
    if (this.client) return true;

    const client = this.createConnection(this.url);
    client.on('error', (error) => {
      console.error(`[Bus] Connection error: ${error.message}`);
    });

    try {
      await client.ping();
    } catch (error) {
      console.error(`[Bus] Cannot reach Redis at ${maskRedisUrl(this.url)}: ${errorMessage(error)}`);
      await this.quitQuietly(client);
      return false;
    }

    this.client = client;
    console.log(`[Bus] Connected to ${maskRedisUrl(this.url)}`);
    return true;
  }

  /**
   * Publish an envelope and record it in the channel's recent buffer.
   * Returns false instead of throwing; a failed buffer write is logged but
   * the message still counts as published.
   */
  async publish(channel: BusChannel, input: EnvelopeInput): Promise<boolean> {
    if (!this.client) {
      return this.publishFailed(new PublishError(channel, `Not connected, dropping ${input.type} message for ${channel}`));
    }

    let payload: string;
    try {
      payload = JSON.stringify(this.stamp(input));
    } catch (error) {
      return this.publishFailed(new PublishError(
        channel,
        `Failed to serialize ${input.type} message for ${channel}: ${errorMessage(error)}`,
        { cause: error }
      ));
    }

    try {
      await this.client.publish(channel, payload);
    } catch (error) {
      return this.publishFailed(new PublishError(
        channel,
        `Failed to publish to ${channel}: ${errorMessage(error)}`,
        { cause: error }
      ));
    }

    try {
      const key = recentKey(channel);
      await execTransaction(this.client.multi()
        .lpush(key, payload)
        .ltrim(key, 0, RECENT_CAPACITY - 1)
        .expire(key, RECENT_TTL_SECONDS));
    } catch (error) {
      console.error(`[Bus] Failed to store recent message for ${channel}: ${errorMessage(error)}`);
    }

    return true;
  }

  /**
   * Replace a keyed snapshot in one transaction: `hashKey` maps each entry's
   * key to its JSON, `listKey` holds the JSON in order. Both expire after
   * `ttlSeconds`. Returns false and logs when the write fails.
   */
  async replaceSnapshot(
    store: SnapshotStore,
    entries: ReadonlyArray<readonly [key: string, value: unknown]>
  ): Promise<boolean> {
    if (!this.client) {
      console.error(`[Bus] Not connected, cannot store ${store.hashKey}`);
      return false;
    }

    try {
      const serialized = entries.map(([key, value]): [string, string] => [key, JSON.stringify(value)]);
      const transaction = this.client.multi().del(store.hashKey).del(store.listKey);
      if (serialized.length > 0) {
        transaction
          .hset(store.hashKey, Object.fromEntries(serialized))
          .rpush(store.listKey, ...serialized.map(([, json]) => json))
          .expire(store.hashKey, store.ttlSeconds)
          .expire(store.listKey, store.ttlSeconds);
      }
      await execTransaction(transaction);
    } catch (error) {
      console.error(`[Bus] Failed to store ${store.hashKey}: ${errorMessage(error)}`);
      return false;
    }
    return true;
  }

  /**
   * Register a handler for a channel. The first call opens the subscriber
   * connection; later calls reuse it.
   */
  async subscribe(channel: string, handler: MessageHandler): Promise<void> {
    const subscriber = this.ensureSubscriber();

    const existing = this.handlers.get(channel);
    if (existing) {
      existing.push(handler);
      return;
    }

    this.handlers.set(channel, [handler]);
    try {
      await subscriber.subscribe(channel);
    } catch (error) {
      this.handlers.delete(channel);
      throw new MessageBusError(`Failed to subscribe to ${channel}: ${errorMessage(error)}`, { cause: error });
    }
    console.log(`[Bus] Subscribed to ${channel}`);
  }

  /**
   * Drop every handler of a channel.
   */
  async unsubscribe(channel: string): Promise<void> {
    if (!this.handlers.delete(channel) || !this.subscriber) return;

    try {
      await this.subscriber.unsubscribe(channel);
    } catch (error) {
      console.error(`[Bus] Failed to unsubscribe from ${channel}: ${errorMessage(error)}`);
    }
  }

  get subscribedChannels(): string[] {
    return [...this.handlers.keys()];
  }

  /**
   * Up to `limit` buffered envelopes of a channel, newest first.
   */
  async recent(channel: string, limit = 10): Promise<Envelope[]> {
    if (!this.client) {
      throw new MessageBusError('Message bus is not open');
    }
    if (limit <= 0) return [];

    const raw = await this.client.lrange(recentKey(channel), 0, limit - 1);
    const envelopes: Envelope[] = [];
    for (const item of raw) {
      const envelope = decodeEnvelope(item);
      if (envelope) {
        envelopes.push(envelope);
      } else {
        console.warn(`[Bus] Skipping malformed message in ${recentKey(channel)}`);
      }
    }
    return envelopes;
  }

  /**
   * Resolves once every message received so far has been dispatched.
   */
  drain(): Promise<void> {
    return this.dispatchChain;
  }

  /**
   * Round trip through the self-test channel.
   */
  async selfTest(timeoutMs = 5000): Promise<boolean> {
    const nonce = `${Date.now()}-${Math.random().toString(36).slice(2)}`;

    let settle: (ok: boolean) => void = () => {};
    const received = new Promise<boolean>((resolve) => {
      settle = resolve;
    });

    try {
      await this.subscribe(SELF_TEST_CHANNEL, (envelope) => {
        if (envelope.details?.nonce === nonce) settle(true);
      });
    } catch (error) {
      console.error(`[Bus] Self test subscribe failed: ${errorMessage(error)}`);
      return false;
    }

    const timer = setTimeout(() => settle(false), timeoutMs);
    const published = await this.publish(SELF_TEST_CHANNEL, {
      type: 'status_update',
      status: 'self_test',
      details: { nonce },
    });

    const ok = published && await received;
    clearTimeout(timer);
    await this.unsubscribe(SELF_TEST_CHANNEL);
    return ok;
  }

  /**
   * Stop dispatching and disconnect. Messages already received are handled
   * before the subscriber connection closes. Safe to call when never opened.
   */
  async close(): Promise<void> {
    const subscriber = this.subscriber;
    this.subscriber = null;

    if (subscriber) {
      const channels = [...this.handlers.keys()];
      if (channels.length > 0) {
        try {
          await subscriber.unsubscribe(...channels);
        } catch (error) {
          console.error(`[Bus] Failed to unsubscribe on close: ${errorMessage(error)}`);
        }
      }
      await this.dispatchChain;
      await this.quitQuietly(subscriber);
    }

    this.handlers.clear();

    const client = this.client;
    this.client = null;
    if (client) {
      await this.quitQuietly(client);
      console.log('[Bus] Disconnected');
    }
  }

  private ensureSubscriber(): BusConnection {
    if (this.subscriber) return this.subscriber;
    if (!this.client) {
      throw new MessageBusError('Cannot subscribe: message bus is not open');
    }

    const subscriber = this.client.duplicate();
    subscriber.on('error', (error) => {
      console.error(`[Bus] Subscriber error: ${error.message}`);
    });
    subscriber.on('message', (channel, message) => {
      this.dispatchChain = this.dispatchChain.then(() => this.dispatch(channel, message));
    });

    this.subscriber = subscriber;
    return subscriber;
  }

  private async dispatch(channel: string, raw: string): Promise<void> {
    const envelope = decodeEnvelope(raw);
    if (!envelope) {
      console.warn(`[Bus] Dropping invalid message on ${channel}`);
      return;
    }

    // Copy: a handler may subscribe or unsubscribe while we iterate
    const handlers = [...(this.handlers.get(channel) ?? [])];
    for (const handler of handlers) {
      try {
        await handler(envelope, channel);
      } catch (error) {
        console.error(`[Bus] Handler for ${channel} failed: ${errorMessage(error)}`);
      }
    }
  }

  private stamp(input: EnvelopeInput): Envelope {
    // Never let the clock run backwards within one bus
    const now = Math.max(Date.now(), this.lastTimestampMs);
    this.lastTimestampMs = now;

    return {
      ...input,
      timestamp: new Date(now).toISOString(),
      source: this.source,
    };
  }

  private publishFailed(error: PublishError): false {
    this._lastPublishError = error;
    console.error(`[Bus] ${error.message}`);
    return false;
  }

  private async quitQuietly(connection: BusConnection): Promise<void> {
    try {
      await connection.quit();
    } catch (error) {
      console.warn(`[Bus] Error while disconnecting: ${errorMessage(error)}`);
    }
  }
}

async function execTransaction(transaction: BusTransaction): Promise<void> {
  const results = await transaction.exec();
  if (!results) {
    throw new Error('Transaction aborted');
  }
  for (const [error] of results) {
    if (error) throw error;
  }
}

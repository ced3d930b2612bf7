import { EventEmitter } from 'node:events';
import type { BusConnection, BusTransaction, TransactionResults } from '../bus/connection.js';

type Command =
  | 'ping'
  | 'publish'
  | 'del'
  | 'lpush'
  | 'rpush'
  | 'ltrim'
  | 'hset'
  | 'expire'
  | 'exec'
  | 'lrange'
  | 'subscribe';

/**
 * State shared by a connection and its duplicates, like one Redis server.
 */
export class FakeBroker {
  readonly lists = new Map<string, string[]>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly ttls = new Map<string, number>();
  readonly connections: FakeRedis[] = [];
  readonly published: Array<{ channel: string; message: string }> = [];
  /** Commands that reject on every connection */
  readonly failing = new Set<Command>();
  available = true;

  /** Number of transactions applied */
  transactions = 0;

  deliver(channel: string, message: string): number {
    this.published.push({ channel, message });
    let receivers = 0;
    for (const connection of this.connections) {
      if (connection.channels.has(channel)) {
        receivers++;
        connection.emit('message', channel, message);
      }
    }
    return receivers;
  }
}

function sliceRange(length: number, start: number, stop: number): [number, number] {
  const from = start < 0 ? Math.max(length + start, 0) : start;
  const to = stop < 0 ? length + stop : Math.min(stop, length - 1);
  return [from, to];
}

/**
 * In-process stand-in for an ioredis connection. Published messages are
 * delivered synchronously to subscribed duplicates.
 */
export class FakeRedis extends EventEmitter implements BusConnection {
  status = 'wait';
  readonly channels = new Set<string>();
  quitCalls = 0;

  constructor(readonly broker: FakeBroker = new FakeBroker()) {
    super();
    broker.connections.push(this);
  }

  async ping(): Promise<string> {
    this.check('ping');
    this.status = 'ready';
    return 'PONG';
  }

  async publish(channel: string, message: string): Promise<number> {
    this.check('publish');
    return this.broker.deliver(channel, message);
  }

  multi(): FakeTransaction {
    return new FakeTransaction(this.broker, (command) => this.check(command));
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.check('lrange');
    const list = this.broker.lists.get(key) ?? [];
    const [from, to] = sliceRange(list.length, start, stop);
    return list.slice(from, to + 1);
  }

  async subscribe(...channels: string[]): Promise<unknown> {
    this.check('subscribe');
    for (const channel of channels) this.channels.add(channel);
    return this.channels.size;
  }

  async unsubscribe(...channels: string[]): Promise<unknown> {
    const targets = channels.length > 0 ? channels : [...this.channels];
    for (const channel of targets) this.channels.delete(channel);
    return this.channels.size;
  }

  async quit(): Promise<string> {
    this.quitCalls++;
    this.status = 'end';
    this.channels.clear();
    return 'OK';
  }

  duplicate(): FakeRedis {
    return new FakeRedis(this.broker);
  }

  private check(command: Command): void {
    if (!this.broker.available) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
    if (this.broker.failing.has(command)) {
      throw new Error(`${command.toUpperCase()} failed`);
    }
  }
}

type QueuedCommand = { command: Command; apply: () => unknown };

/**
 * MULTI/EXEC stand-in. A failing queued command discards the whole
 * transaction, so the broker never sees a partial write.
 */
export class FakeTransaction implements BusTransaction {
  private queue: QueuedCommand[] = [];

  constructor(
    private readonly broker: FakeBroker,
    private readonly check: (command: Command) => void
  ) {}

  del(key: string): this {
    return this.enqueue('del', () => {
      const existed = this.broker.lists.delete(key) || this.broker.hashes.delete(key);
      this.broker.ttls.delete(key);
      return existed ? 1 : 0;
    });
  }

  lpush(key: string, ...values: string[]): this {
    return this.enqueue('lpush', () => {
      const list = this.broker.lists.get(key) ?? [];
      for (const value of values) list.unshift(value);
      this.broker.lists.set(key, list);
      return list.length;
    });
  }

  rpush(key: string, ...values: string[]): this {
    return this.enqueue('rpush', () => {
      const list = this.broker.lists.get(key) ?? [];
      list.push(...values);
      this.broker.lists.set(key, list);
      return list.length;
    });
  }

  ltrim(key: string, start: number, stop: number): this {
    return this.enqueue('ltrim', () => {
      const list = this.broker.lists.get(key) ?? [];
      const [from, to] = sliceRange(list.length, start, stop);
      this.broker.lists.set(key, list.slice(from, to + 1));
      return 'OK';
    });
  }

  hset(key: string, fields: Record<string, string>): this {
    return this.enqueue('hset', () => {
      const hash = this.broker.hashes.get(key) ?? new Map<string, string>();
      let added = 0;
      for (const [field, value] of Object.entries(fields)) {
        if (!hash.has(field)) added++;
        hash.set(field, value);
      }
      this.broker.hashes.set(key, hash);
      return added;
    });
  }

  expire(key: string, seconds: number): this {
    return this.enqueue('expire', () => {
      if (!this.broker.lists.has(key) && !this.broker.hashes.has(key)) return 0;
      this.broker.ttls.set(key, seconds);
      return 1;
    });
  }

  async exec(): Promise<TransactionResults | null> {
    const queued = this.queue;
    this.queue = [];

    this.check('exec');
    for (const { command } of queued) this.check(command);

    this.broker.transactions++;
    return queued.map(({ apply }): [Error | null, unknown] => [null, apply()]);
  }

  private enqueue(command: Command, apply: () => unknown): this {
    this.queue.push({ command, apply });
    return this;
  }
}

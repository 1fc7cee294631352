// packages/mongo/src/connection.ts
// Shared, leased store clients keyed by connection identity.
import { ConnectionError, silentLogger, type Logger, type RelationConfig } from '@docbridge/core';
import { classifyMongoError, mongoConnector, type ConnectionTarget, type StoreClient, type StoreConnector } from './store.js';

export interface ConnectionHandle {
  readonly id: number;
  readonly key: string;
  readonly client: StoreClient;
  release(): void;
}

export interface PoolStats {
  pools: number;
  leased: number;
  waiting: number;
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
}

interface PoolEntry {
  key: string;
  maxLeases: number;
  client: Promise<StoreClient>;
  leases: number;
  waiters: Waiter[];
}

export function targetFor(config: RelationConfig): ConnectionTarget {
  return {
    hosts: config.hosts,
    credentials: config.credentials,
    tls: config.tls,
    database: config.database,
    options: {
      readPreference: config.readPreference,
      connectTimeoutMs: config.connectTimeoutMs,
      socketTimeoutMs: config.socketTimeoutMs,
      maxPoolSize: config.maxPoolSize
    }
  };
}

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonical(v)])
    );
  }
  return value;
}

/** Same cluster, identity and client options => same key, regardless of property or host order. */
export function poolKey(target: ConnectionTarget): string {
  return JSON.stringify(
    canonical({
      hosts: [...target.hosts].sort(),
      credentials: target.credentials.map((c) => ({ ...c, source: c.source ?? target.database })),
      tls: target.tls ?? null,
      options: target.options
    })
  );
}

export interface ConnectionManagerOptions {
  connector?: StoreConnector;
  logger?: Logger;
}

export class ConnectionManager {
  private readonly pools = new Map<string, PoolEntry>();
  private readonly connector: StoreConnector;
  private readonly log: Logger;
  private nextId = 1;

  constructor(opts: ConnectionManagerOptions = {}) {
    this.connector = opts.connector ?? mongoConnector;
    this.log = opts.logger ?? silentLogger;
  }

  async acquire(target: ConnectionTarget): Promise<ConnectionHandle> {
    const entry = this.entryFor(target);
    const client = await entry.client;
    await this.lease(entry);

    const id = this.nextId++;
    let released = false;
    this.log.debug({ id, leases: entry.leases }, 'connection-acquired');
    return {
      id,
      key: entry.key,
      client,
      release: () => {
        if (released) return;
        released = true;
        const next = entry.waiters.shift();
        // hand the lease straight to the next waiter
        if (next) next.resolve();
        else entry.leases--;
        this.log.debug({ id, leases: entry.leases }, 'connection-released');
      }
    };
  }

  /** Scoped lease: released on every exit path of `fn`. */
  async using<T>(target: ConnectionTarget, fn: (handle: ConnectionHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire(target);
    try {
      return await fn(handle);
    } finally {
      handle.release();
    }
  }

  stats(): PoolStats {
    let leased = 0;
    let waiting = 0;
    for (const e of this.pools.values()) {
      leased += e.leases;
      waiting += e.waiters.length;
    }
    return { pools: this.pools.size, leased, waiting };
  }

  /** Closes clients nobody holds a lease on or waits for. */
  async closeIdle(): Promise<number> {
    const idle = [...this.pools.values()].filter((e) => e.leases === 0 && e.waiters.length === 0);
    idle.forEach((e) => this.pools.delete(e.key));
    await this.closeEntries(idle);
    return idle.length;
  }

  /** Closes every client, busy or not; queued acquirers are rejected. */
  async closeAll(): Promise<void> {
    const entries = [...this.pools.values()];
    this.pools.clear();
    for (const e of entries) {
      for (const w of e.waiters.splice(0)) w.reject(new ConnectionError('closed', 'Connection manager closed'));
    }
    await this.closeEntries(entries);
  }

  private entryFor(target: ConnectionTarget): PoolEntry {
    const key = poolKey(target);
    const existing = this.pools.get(key);
    if (existing) return existing;

    const entry: PoolEntry = {
      key,
      maxLeases: target.options.maxPoolSize,
      leases: 0,
      waiters: [],
      client: this.connector(target, this.log).catch((e: unknown) => {
        if (this.pools.get(key) === entry) this.pools.delete(key);
        const err = classifyMongoError(e);
        this.log.warn({ hosts: target.hosts, err: err.message }, 'connection-failed');
        throw err;
      })
    };
    this.pools.set(key, entry);
    this.log.info({ hosts: target.hosts, maxLeases: entry.maxLeases }, 'connection-pool-created');
    return entry;
  }

  private lease(entry: PoolEntry): Promise<void> {
    if (entry.leases < entry.maxLeases) {
      entry.leases++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => entry.waiters.push({ resolve, reject }));
  }

  private async closeEntries(entries: PoolEntry[]): Promise<void> {
    const results = await Promise.allSettled(entries.map(async (e) => (await e.client).close()));
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        this.log.warn({ key: entries[i].key, err: String(r.reason) }, 'connection-close-failed');
      }
    });
  }
}

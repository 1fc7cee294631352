// packages/mongo/src/store.ts
// The narrow surface the rest of the package talks to, and its MongoDB implementation.
import {
  MongoClient,
  MongoNetworkError,
  MongoNotConnectedError,
  MongoServerError,
  MongoServerSelectionError,
  MongoTopologyClosedError,
  type AnyBulkWriteOperation,
  type Collection,
  type Document as BsonDocument,
  type FindCursor,
  type FindOptions,
  type MongoClientOptions
} from 'mongodb';
import {
  ConnectionError,
  TransientIOError,
  isDocbridgeError,
  isFullRange,
  silentLogger,
  type Bound,
  type CollectionTopology,
  type Credential,
  type KeyPatternValue,
  type Logger,
  type RelationConfig,
  type TlsOptions
} from '@docbridge/core';
import { boundToBson, boundsFromBson, fromBson } from './bson.js';

// --------------------
// Seam
// --------------------
export interface KeyRange {
  key: string;
  min: Bound;
  max: Bound;
}

export interface NativeQuery {
  filter: BsonDocument;
  projection?: BsonDocument;
  range?: KeyRange;
  limit?: number;
}

export interface DocumentCursor extends AsyncIterable<BsonDocument> {
  close(): Promise<void>;
}

export interface WriteSummary {
  inserted: number;
  upserted: number;
  modified: number;
}

export interface StoreCollection {
  find(query: NativeQuery): DocumentCursor;
  bulkWrite(ops: AnyBulkWriteOperation<BsonDocument>[]): Promise<WriteSummary>;
  drop(): Promise<boolean>;
}

export interface TopologyRequest {
  splitKey: string;
  splitSizeMb: number;
  hosts: string[];
}

export interface StoreClient {
  ping(): Promise<void>;
  collection(database: string, name: string): StoreCollection;
  topology(database: string, collection: string, req: TopologyRequest): Promise<CollectionTopology>;
  close(): Promise<void>;
}

export interface ClientOptions {
  readPreference: RelationConfig['readPreference'];
  connectTimeoutMs: number;
  socketTimeoutMs: number;
  maxPoolSize: number;
}

export interface ConnectionTarget {
  hosts: string[];
  credentials: Credential[];
  tls?: TlsOptions;
  database: string; // default authSource
  options: ClientOptions;
}

export type StoreConnector = (target: ConnectionTarget, logger: Logger) => Promise<StoreClient>;

// --------------------
// Errors
// --------------------
const AUTH_FAILED = 18;
const UNAUTHORIZED = 13;

export function classifyMongoError(e: unknown): Error {
  if (isDocbridgeError(e)) return e;
  if (e instanceof MongoServerError && (e.code === AUTH_FAILED || e.codeName === 'AuthenticationFailed')) {
    return new ConnectionError('auth', `Authentication failed: ${e.message}`, { cause: e });
  }
  if (e instanceof MongoServerSelectionError) {
    return new ConnectionError('unreachable', `No reachable server: ${e.message}`, { cause: e });
  }
  if (e instanceof MongoTopologyClosedError || e instanceof MongoNotConnectedError) {
    return new ConnectionError('closed', e.message, { cause: e });
  }
  if (e instanceof MongoNetworkError) {
    return new TransientIOError(`Network error: ${e.message}`, { cause: e });
  }
  return e instanceof Error ? e : new Error(String(e));
}

// --------------------
// MongoDB implementation
// --------------------
export function buildUri(hosts: string[]): string {
  return `mongodb://${hosts.join(',')}/`;
}

export function clientOptionsFor(target: ConnectionTarget): MongoClientOptions {
  const opts: MongoClientOptions = {
    readPreference: target.options.readPreference,
    connectTimeoutMS: target.options.connectTimeoutMs,
    socketTimeoutMS: target.options.socketTimeoutMs,
    maxPoolSize: target.options.maxPoolSize,
    serverSelectionTimeoutMS: target.options.connectTimeoutMs
  };
  const [cred] = target.credentials;
  if (cred) {
    opts.auth = { username: cred.user, password: cred.password };
    opts.authSource = cred.source ?? target.database;
    if (cred.mechanism && cred.mechanism !== 'DEFAULT') opts.authMechanism = cred.mechanism;
  }
  const tls = target.tls;
  if (tls?.enabled) {
    opts.tls = true;
    if (tls.caFile) opts.tlsCAFile = tls.caFile;
    if (tls.certificateKeyFile) opts.tlsCertificateKeyFile = tls.certificateKeyFile;
    if (tls.certificateKeyFilePassword) opts.tlsCertificateKeyFilePassword = tls.certificateKeyFilePassword;
    if (tls.allowInvalidCertificates) opts.tlsAllowInvalidCertificates = true;
    if (tls.allowInvalidHostnames) opts.tlsAllowInvalidHostnames = true;
  }
  return opts;
}

function findOptions(q: NativeQuery): FindOptions {
  const opts: FindOptions = { promoteValues: false };
  if (q.projection) opts.projection = q.projection;
  if (q.limit) opts.limit = q.limit;
  const r = q.range;
  if (r && !isFullRange(r)) {
    // index bounds instead of $gte/$lt: no type bracketing, so mixed-type keys stay in range
    opts.hint = { [r.key]: 1 };
    if (r.min.kind !== 'min') opts.min = { [r.key]: boundToBson(r.min) };
    if (r.max.kind !== 'max') opts.max = { [r.key]: boundToBson(r.max) };
  }
  return opts;
}

async function* iterate(cursor: FindCursor<BsonDocument>): AsyncGenerator<BsonDocument> {
  try {
    for await (const doc of cursor) yield doc;
  } catch (e) {
    throw classifyMongoError(e);
  }
}

class MongoStoreCollection implements StoreCollection {
  constructor(private readonly coll: Collection<BsonDocument>) {}

  find(q: NativeQuery): DocumentCursor {
    const cursor = this.coll.find(q.filter, findOptions(q));
    return {
      [Symbol.asyncIterator]: () => iterate(cursor),
      close: () => cursor.close()
    };
  }

  async bulkWrite(ops: AnyBulkWriteOperation<BsonDocument>[]): Promise<WriteSummary> {
    try {
      const res = await this.coll.bulkWrite(ops, { ordered: false });
      return { inserted: res.insertedCount, upserted: res.upsertedCount, modified: res.modifiedCount };
    } catch (e) {
      throw classifyMongoError(e);
    }
  }

  async drop(): Promise<boolean> {
    try {
      return await this.coll.drop();
    } catch (e) {
      // NamespaceNotFound: nothing to drop
      if (e instanceof MongoServerError && e.code === 26) return false;
      throw classifyMongoError(e);
    }
  }
}

export function keyPatternFromBson(key: object): Record<string, KeyPatternValue> {
  const out: Record<string, KeyPatternValue> = {};
  for (const [field, spec] of Object.entries(key)) {
    if (typeof spec === 'string') out[field] = 'hashed';
    else out[field] = Number(spec) < 0 ? -1 : 1;
  }
  return out;
}

export function parseShardHosts(host: string): string[] {
  // "rs0/h1:27017,h2:27017" or "h1:27017"
  const list = host.includes('/') ? host.slice(host.indexOf('/') + 1) : host;
  return list.split(',').map((h) => h.trim()).filter(Boolean);
}

export class MongoStoreClient implements StoreClient {
  constructor(
    private readonly client: MongoClient,
    private readonly log: Logger = silentLogger
  ) {}

  static async connect(target: ConnectionTarget, logger: Logger = silentLogger): Promise<MongoStoreClient> {
    const client = new MongoClient(buildUri(target.hosts), clientOptionsFor(target));
    try {
      await client.connect();
    } catch (e) {
      await client.close().catch((closeErr: unknown) =>
        logger.debug({ err: String(closeErr) }, 'close-after-failed-connect')
      );
      throw classifyMongoError(e);
    }
    return new MongoStoreClient(client, logger);
  }

  async ping(): Promise<void> {
    try {
      await this.client.db('admin').command({ ping: 1 });
    } catch (e) {
      throw classifyMongoError(e);
    }
  }

  collection(database: string, name: string): StoreCollection {
    return new MongoStoreCollection(this.client.db(database).collection(name));
  }

  async topology(database: string, collection: string, req: TopologyRequest): Promise<CollectionTopology> {
    const ns = `${database}.${collection}`;
    const config = this.client.db('config');
    try {
      const meta = await config.collection<BsonDocument & { _id: string }>('collections').findOne({ _id: ns });
      if (meta && meta.dropped !== true && meta.key && typeof meta.key === 'object') {
        const chunkFilter = meta.uuid ? { uuid: meta.uuid } : { ns };
        const chunks = await config
          .collection('chunks')
          .find(chunkFilter, { promoteValues: false })
          .sort({ min: 1 })
          .toArray();
        const shards = await config.collection('shards').find({}).toArray();
        return {
          kind: 'sharded',
          keyPattern: keyPatternFromBson(meta.key),
          chunks: chunks.map((c) => ({
            shard: String(c.shard),
            min: boundsFromBson(c.min),
            max: boundsFromBson(c.max)
          })),
          shards: Object.fromEntries(shards.map((s) => [String(s._id), parseShardHosts(String(s.host))]))
        };
      }
    } catch (e) {
      if (!(e instanceof MongoServerError && e.code === UNAUTHORIZED)) throw classifyMongoError(e);
      this.log.warn({ ns }, 'no access to config database; treating collection as unsharded');
    }

    try {
      const res = await this.client.db(database).command(
        { splitVector: ns, keyPattern: { [req.splitKey]: 1 }, maxChunkSize: req.splitSizeMb },
        { promoteValues: false }
      );
      const keys: unknown[] = Array.isArray(res.splitKeys) ? res.splitKeys : [];
      const splitPoints = keys.flatMap((k) => {
        if (!k || typeof k !== 'object') return [];
        const entry = Object.entries(k).find(([name]) => name === req.splitKey);
        return entry ? [fromBson(entry[1])] : [];
      });
      return { kind: 'split', key: req.splitKey, splitPoints, hosts: req.hosts };
    } catch (e) {
      if (!(e instanceof MongoServerError)) throw classifyMongoError(e);
      // splitVector is refused on mongos, on views and without the privilege
      this.log.info({ ns, reason: e.codeName ?? e.message }, 'splitVector unavailable; single partition');
      return { kind: 'unsharded', hosts: req.hosts };
    }
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}

export const mongoConnector: StoreConnector = (target, logger) => MongoStoreClient.connect(target, logger);

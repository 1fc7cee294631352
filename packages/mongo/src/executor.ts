// packages/mongo/src/executor.ts
import { setTimeout as delay } from 'node:timers/promises';
import type { Document as BsonDocument } from 'mongodb';
import {
  TransientIOError,
  matchesAll,
  silentLogger,
  toRow,
  type Document,
  type Logger,
  type PartitionDescriptor,
  type RelationConfig,
  type Row,
  type WarningHandler
} from '@docbridge/core';
import { documentFromBson } from './bson.js';
import { targetFor, type ConnectionManager } from './connection.js';
import type { ConnectionTarget, DocumentCursor } from './store.js';
import type { ScanPlan } from './translate.js';

export interface DocumentQuery {
  filter?: BsonDocument;
  projection?: BsonDocument;
  limit?: number;
}

export interface ScanExecutorOptions {
  connections: ConnectionManager;
  config: RelationConfig;
  logger?: Logger;
  onWarning?: WarningHandler;
  sleep?: (ms: number) => Promise<void>;
}

export class ScanExecutor {
  private readonly connections: ConnectionManager;
  private readonly config: RelationConfig;
  private readonly target: ConnectionTarget;
  private readonly log: Logger;
  private readonly onWarning: WarningHandler;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: ScanExecutorOptions) {
    this.connections = opts.connections;
    this.config = opts.config;
    this.target = targetFor(opts.config);
    this.log = opts.logger ?? silentLogger;
    this.onWarning = opts.onWarning ?? ((w) => this.log.warn({ ...w }, 'conversion-warning'));
    this.sleep = opts.sleep ?? ((ms) => delay(ms));
  }

  /**
   * Raw documents of one partition. A transient failure before the first
   * document restarts the read with backoff; after that it propagates.
   */
  async *documents(partition: PartitionDescriptor, query: DocumentQuery = {}): AsyncGenerator<Document> {
    const { attempts, backoffMs } = this.config.retry;
    for (let attempt = 1; ; attempt++) {
      const handle = await this.connections.acquire(this.target);
      let cursor: DocumentCursor | undefined;
      let started = false;
      try {
        cursor = handle.client.collection(this.config.database, this.config.collection).find({
          filter: query.filter ?? {},
          projection: query.projection,
          limit: query.limit,
          range: { key: partition.key, min: partition.min, max: partition.max }
        });
        for await (const raw of cursor) {
          started = true;
          yield documentFromBson(raw);
        }
        return;
      } catch (e) {
        if (started || !(e instanceof TransientIOError) || attempt >= attempts) throw e;
        this.log.warn({ partition: partition.index, attempt, err: e.message }, 'scan-retry');
      } finally {
        if (cursor) {
          await cursor.close().catch((err: unknown) =>
            this.log.warn({ partition: partition.index, err: String(err) }, 'cursor-close-failed')
          );
        }
        handle.release();
      }
      await this.sleep(backoffMs * 2 ** (attempt - 1));
    }
  }

  /** Rows of one partition. Each call is an independent run. */
  async *scan(partition: PartitionDescriptor, plan: ScanPlan, limit?: number): AsyncGenerator<Row> {
    const residual = plan.residual;
    // with residual filters the store cannot know how many documents survive
    const pushLimit = residual.length ? undefined : limit;
    let produced = 0;
    let read = 0;
    this.log.debug({ partition: partition.index, filter: plan.filter, projection: plan.projection }, 'scan-start');

    for await (const doc of this.documents(partition, { filter: plan.filter, projection: plan.projection, limit: pushLimit })) {
      read++;
      if (residual.length && !matchesAll(residual, doc)) continue;
      yield toRow(doc, plan.schema, this.onWarning);
      produced++;
      if (limit !== undefined && produced >= limit) break;
    }
    this.log.debug({ partition: partition.index, read, produced }, 'scan-done');
  }

  async isEmpty(partition: PartitionDescriptor, filter: BsonDocument = {}): Promise<boolean> {
    for await (const _doc of this.documents(partition, { filter, projection: { _id: 1 }, limit: 1 })) {
      return false;
    }
    return true;
  }
}

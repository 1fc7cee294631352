// packages/mongo/src/relation.ts
// One collection exposed as a typed, scannable, writable table.
import { createHash } from 'node:crypto';
import type { AnyBulkWriteOperation, Document as BsonDocument } from 'mongodb';
import {
  MemoSlot,
  SchemaInferenceError,
  inferSchema,
  parseRelationConfig,
  planPartitions,
  schemaToJson,
  silentLogger,
  toDocument,
  type Document,
  type FilterNode,
  type Logger,
  type PartitionDescriptor,
  type RelationConfig,
  type RelationConfigInput,
  type RequiredColumn,
  type Row,
  type Scannable,
  type ScanProducer,
  type SchemaProvider,
  type TypedSchema,
  type WarningHandler,
  type Writable
} from '@docbridge/core';
import { toBsonDocument } from './bson.js';
import { ConnectionManager, targetFor } from './connection.js';
import { ScanExecutor } from './executor.js';
import type { ConnectionTarget } from './store.js';
import { translate } from './translate.js';

export interface MongoRelationOptions {
  config: RelationConfigInput;
  /** Skips inference when given. */
  schema?: TypedSchema;
  connections?: ConnectionManager;
  logger?: Logger;
  onWarning?: WarningHandler;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class MongoRelation implements SchemaProvider, Scannable, Writable {
  readonly config: RelationConfig;
  readonly executor: ScanExecutor;
  private readonly connections: ConnectionManager;
  private readonly ownsConnections: boolean;
  private readonly target: ConnectionTarget;
  private readonly log: Logger;
  private readonly random?: () => number;
  private readonly onWarning?: WarningHandler;
  private schemaSlot: MemoSlot<TypedSchema>;
  private partitionSlot = new MemoSlot<readonly PartitionDescriptor[]>();

  constructor(opts: MongoRelationOptions) {
    this.config = parseRelationConfig(opts.config);
    this.log = opts.logger ?? silentLogger;
    this.ownsConnections = !opts.connections;
    this.connections = opts.connections ?? new ConnectionManager({ logger: this.log });
    this.target = targetFor(this.config);
    this.random = opts.random;
    this.onWarning = opts.onWarning;
    this.schemaSlot = new MemoSlot<TypedSchema>(opts.schema);
    this.executor = new ScanExecutor({
      connections: this.connections,
      config: this.config,
      logger: this.log,
      onWarning: opts.onWarning,
      sleep: opts.sleep
    });
  }

  get namespace(): string {
    return `${this.config.database}.${this.config.collection}`;
  }

  /** Computed at most once per relation; a failed attempt is retried by the next caller. */
  schema(): Promise<TypedSchema> {
    return this.schemaSlot.computeOrUseCached(() => this.inferFromStore());
  }

  partitions(): Promise<readonly PartitionDescriptor[]> {
    return this.partitionSlot.computeOrUseCached(async () => {
      const { database, collection, splitKey, splitSizeMb, hosts } = this.config;
      const topology = await this.connections.using(this.target, (h) =>
        h.client.topology(database, collection, { splitKey, splitSizeMb, hosts })
      );
      return planPartitions(topology, this.log);
    });
  }

  async buildScan(requiredColumns: RequiredColumn[], filters: FilterNode[], limit?: number): Promise<ScanProducer> {
    const [schema, partitions] = await Promise.all([this.schema(), this.partitions()]);
    const plan = translate(schema, requiredColumns, filters);
    const executor = this.executor;
    this.log.debug(
      { ns: this.namespace, pushed: plan.pushed.length, residual: plan.residual.length, partitions: partitions.length },
      'scan-planned'
    );

    return {
      schema: plan.schema,
      partitions,
      residual: plan.residual,
      rows: (partition) => executor.scan(partition, plan, limit),
      async *all() {
        let left = limit;
        for (const p of partitions) {
          for await (const row of executor.scan(p, plan, left)) {
            yield row;
            if (left !== undefined && --left <= 0) return;
          }
        }
      }
    };
  }

  /**
   * Layout for rows about to be written: `schema` when given, else the
   * relation's own. An empty collection with no schema has nothing to offer.
   */
  async writeLayout(schema?: TypedSchema): Promise<TypedSchema> {
    if (schema) return schema;
    try {
      return await this.schema();
    } catch (e) {
      if (!(e instanceof SchemaInferenceError)) throw e;
      throw new SchemaInferenceError(
        `Cannot lay out rows for ${this.namespace}: the collection has no documents to infer from and no schema was given`,
        { cause: e }
      );
    }
  }

  /**
   * Writes rows laid out as `schema` (the relation's schema by default).
   * With `overwrite` the collection is dropped first.
   */
  async insert(
    rows: Iterable<Row> | AsyncIterable<Row>,
    overwrite: boolean,
    schema?: TypedSchema
  ): Promise<{ written: number }> {
    // resolve before dropping: inference needs the old contents
    const layout = await this.writeLayout(schema);
    const { database, collection, writeBatchSize } = this.config;

    const written = await this.connections.using(this.target, async (h) => {
      const coll = h.client.collection(database, collection);
      if (overwrite) {
        const dropped = await coll.drop();
        this.partitionSlot = new MemoSlot();
        // the collection now holds only rows of the given layout
        if (schema) this.schemaSlot = new MemoSlot<TypedSchema>(schema);
        this.log.info({ ns: this.namespace, dropped }, 'collection-overwrite');
      }

      let count = 0;
      let batch: AnyBulkWriteOperation<BsonDocument>[] = [];
      for await (const row of rows) {
        batch.push(this.writeOp(toDocument(row, layout, this.onWarning)));
        if (batch.length >= writeBatchSize) {
          await coll.bulkWrite(batch);
          count += batch.length;
          batch = [];
        }
      }
      if (batch.length) {
        await coll.bulkWrite(batch);
        count += batch.length;
      }
      return count;
    });

    this.log.info({ ns: this.namespace, written, overwrite }, 'insert-done');
    return { written };
  }

  async isEmptyCollection(): Promise<boolean> {
    for (const p of await this.partitions()) {
      if (!(await this.executor.isEmpty(p))) return false;
    }
    return true;
  }

  async hashCode(): Promise<string> {
    return createHash('sha1').update(await this.identity()).digest('hex');
  }

  async equals(other: MongoRelation): Promise<boolean> {
    if (other === this) return true;
    const [a, b] = await Promise.all([this.identity(), other.identity()]);
    return a === b;
  }

  /** Releases the connection manager when this relation created it. */
  async close(): Promise<void> {
    if (this.ownsConnections) await this.connections.closeAll();
  }

  private writeOp(doc: Document): AnyBulkWriteOperation<BsonDocument> {
    const bson = toBsonDocument(doc);
    const keys = this.config.upsertFields;
    const keyed = keys.every((k) => bson[k] !== undefined && bson[k] !== null);
    if (!keyed) return { insertOne: { document: bson } };
    const filter: BsonDocument = {};
    for (const k of keys) filter[k] = bson[k];
    return { replaceOne: { filter, replacement: bson, upsert: true } };
  }

  private async inferFromStore(): Promise<TypedSchema> {
    const partitions = await this.partitions();
    const executor = this.executor;
    async function* everything(): AsyncGenerator<Document> {
      for (const p of partitions) yield* executor.documents(p);
    }
    return inferSchema(everything(), {
      samplingRatio: this.config.samplingRatio,
      random: this.random,
      logger: this.log
    });
  }

  private async identity(): Promise<string> {
    return JSON.stringify({ config: this.config, schema: schemaToJson(await this.schema()) });
  }
}

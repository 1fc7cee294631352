// --------------------
// Values (document side)
// --------------------
export type Value =
  | { type: 'null' }
  | { type: 'boolean'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'long'; value: bigint }
  | { type: 'double'; value: number }
  | { type: 'decimal'; value: string }
  | { type: 'string'; value: string }
  | { type: 'timestamp'; value: Date }
  | { type: 'objectId'; value: string } // 24-char hex
  | { type: 'binary'; value: Uint8Array }
  | RecordValue
  | { type: 'array'; items: Value[] };

export interface RecordValue {
  type: 'record';
  fields: Map<string, Value>; // insertion order = document order
}

// A store document is always a record at the top level.
export type Document = RecordValue;

// --------------------
// Rows (table side)
// --------------------
export type Cell =
  | null
  | boolean
  | number
  | bigint
  | string
  | Date
  | Uint8Array
  | Row
  | readonly Cell[];

export class Row {
  constructor(public readonly values: readonly Cell[]) {}

  get length(): number {
    return this.values.length;
  }

  get(i: number): Cell {
    return i >= 0 && i < this.values.length ? this.values[i] : null;
  }
}

// --------------------
// Schema
// --------------------
export type PrimitiveName =
  | 'null'      // only nulls / empty arrays seen so far
  | 'boolean'
  | 'int'
  | 'long'
  | 'double'
  | 'decimal'
  | 'string'
  | 'timestamp'
  | 'objectId'
  | 'binary'
  | 'any';      // conflicting observations; cells carry canonical text

export type DataType =
  | { kind: 'primitive'; name: PrimitiveName }
  | { kind: 'record'; fields: readonly Field[] }
  | { kind: 'array'; element: DataType; containsNull: boolean };

export interface FieldMetadata {
  idx?: number;     // array element index for pruned pseudo-fields
  colname?: string; // origin field of the pseudo-field
}

export interface Field {
  name: string;
  type: DataType;
  nullable: boolean;
  metadata?: FieldMetadata;
}

export interface TypedSchema {
  readonly fields: readonly Field[];
}

// ["tags", 1] style request: a top-level name with an optional array index
export type RequiredColumn = string | { name: string; index?: number };

// --------------------
// Filters (abstract, built by the caller)
// --------------------
export type FilterLiteral = null | boolean | number | bigint | string | Date;

export type ComparisonOp = 'eq' | 'gt' | 'gte' | 'lt' | 'lte';
export type StringOp = 'startsWith' | 'endsWith' | 'contains';

export type FilterNode =
  | { op: ComparisonOp; field: string; value: FilterLiteral }
  | { op: 'in'; field: string; values: FilterLiteral[] }
  | { op: StringOp; field: string; value: string }
  | { op: 'isNull' | 'isNotNull'; field: string }
  | { op: 'and' | 'or'; filters: FilterNode[] }
  | { op: 'not'; filter: FilterNode }
  // evaluated client-side only; the store never sees it
  | { op: 'predicate'; field: string; name: string; test: (value: Value) => boolean };

// --------------------
// Partitions & topology
// --------------------
export type Bound =
  | { kind: 'min' }
  | { kind: 'max' }
  | { kind: 'value'; value: Value };

export interface PartitionDescriptor {
  index: number;
  key: string;        // field the range applies to
  min: Bound;         // inclusive
  max: Bound;         // exclusive
  hosts: string[];    // preferred hosts (locality hint only)
}

export interface ChunkInfo {
  min: Record<string, Bound>;
  max: Record<string, Bound>;
  shard: string;
}

/** Per-field value of a shard key document, e.g. `{ userId: 'hashed' }`. */
export type KeyPatternValue = 1 | -1 | 'hashed';

export type CollectionTopology =
  | { kind: 'unsharded'; hosts: string[] }
  | { kind: 'split'; key: string; splitPoints: Value[]; hosts: string[] }
  | {
      kind: 'sharded';
      keyPattern: Record<string, KeyPatternValue>;  // in key order
      chunks: ChunkInfo[];
      shards: Record<string, string[]>;
    };

// --------------------
// Capabilities exposed to a host engine
// --------------------
export interface ScanProducer {
  schema: TypedSchema;            // pruned
  partitions: readonly PartitionDescriptor[];
  residual: readonly FilterNode[];
  rows(partition: PartitionDescriptor): AsyncGenerator<Row>;
  all(): AsyncGenerator<Row>;
}

export interface SchemaProvider {
  schema(): Promise<TypedSchema>;
}

export interface Scannable {
  buildScan(requiredColumns: RequiredColumn[], filters: FilterNode[]): Promise<ScanProducer>;
}

export interface Writable {
  /**
   * `schema` is the layout of `rows`. It may be left out only when the
   * target already has a schema (supplied or inferable from its documents).
   */
  insert(
    rows: Iterable<Row> | AsyncIterable<Row>,
    overwrite: boolean,
    schema?: TypedSchema
  ): Promise<{ written: number }>;
}

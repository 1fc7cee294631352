// packages/core/src/inference.ts
// Schema inference over a (sampled) document stream.
import { SchemaInferenceError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';
import { T, field, schemaOf } from './schema.js';
import type { DataType, Document, Field, PrimitiveName, TypedSchema, Value } from './types.js';

export interface InferOptions {
  samplingRatio?: number;        // (0, 1]; 1 reads every document
  random?: () => number;         // injectable for deterministic sampling
  fallback?: TypedSchema;        // returned instead of failing on an empty sample
  logger?: Logger;
}

const NUMERIC_RANK: Partial<Record<PrimitiveName, number>> = { int: 0, long: 1, double: 2 };

function mergePrimitive(a: PrimitiveName, b: PrimitiveName): PrimitiveName {
  if (a === b) return a;
  if (a === 'null') return b;
  if (b === 'null') return a;
  if (a === 'any' || b === 'any') return 'any';

  const ra = NUMERIC_RANK[a];
  const rb = NUMERIC_RANK[b];
  if (ra !== undefined && rb !== undefined) return ra >= rb ? a : b;

  // decimal absorbs integers, loses to double
  if (a === 'decimal' || b === 'decimal') {
    const other = a === 'decimal' ? b : a;
    if (other === 'int' || other === 'long') return 'decimal';
    if (other === 'double') return 'double';
  }
  return 'any';
}

export function mergeTypes(a: DataType, b: DataType): DataType {
  if (a.kind === 'primitive' && a.name === 'null') return b;
  if (b.kind === 'primitive' && b.name === 'null') return a;

  if (a.kind === 'primitive' && b.kind === 'primitive') {
    return { kind: 'primitive', name: mergePrimitive(a.name, b.name) };
  }
  if (a.kind === 'record' && b.kind === 'record') {
    return T.record(mergeFieldLists(a.fields, b.fields));
  }
  if (a.kind === 'array' && b.kind === 'array') {
    return T.array(mergeTypes(a.element, b.element), a.containsNull || b.containsNull);
  }
  return T.any;
}

function isNullType(t: DataType): boolean {
  return t.kind === 'primitive' && t.name === 'null';
}

/** Union of two field lists, sorted by name; a field missing on one side becomes nullable. */
export function mergeFieldLists(a: readonly Field[], b: readonly Field[]): Field[] {
  const byName = new Map<string, Field>();
  for (const f of a) byName.set(f.name, { ...f, nullable: f.nullable || !b.some((g) => g.name === f.name) });
  for (const g of b) {
    const f = byName.get(g.name);
    if (!f) {
      byName.set(g.name, { ...g, nullable: true });
      continue;
    }
    const type = mergeTypes(f.type, g.type);
    byName.set(g.name, field(g.name, type, f.nullable || g.nullable || isNullType(type)));
  }
  return [...byName.values()].sort((x, y) => (x.name < y.name ? -1 : x.name > y.name ? 1 : 0));
}

export function mergeSchemas(a: TypedSchema, b: TypedSchema): TypedSchema {
  return schemaOf(mergeFieldLists(a.fields, b.fields));
}

export function inferValueType(value: Value): DataType {
  switch (value.type) {
    case 'null': return T.null;
    case 'boolean': return T.boolean;
    case 'int': return T.int;
    case 'long': return T.long;
    case 'double': return T.double;
    case 'decimal': return T.decimal;
    case 'string': return T.string;
    case 'timestamp': return T.timestamp;
    case 'objectId': return T.objectId;
    case 'binary': return T.binary;
    case 'array': {
      // [] leaves the element as the `null` placeholder until a later sample fills it
      const element = value.items.reduce<DataType>((acc, v) => mergeTypes(acc, inferValueType(v)), T.null);
      return T.array(element, value.items.some((v) => v.type === 'null'));
    }
    case 'record':
      return T.record(inferRecordFields(value));
  }
}

function inferRecordFields(doc: Document): Field[] {
  const fields: Field[] = [];
  for (const [name, v] of doc.fields) {
    fields.push(field(name, inferValueType(v), v.type === 'null'));
  }
  return fields.sort((x, y) => (x.name < y.name ? -1 : x.name > y.name ? 1 : 0));
}

export function inferDocumentSchema(doc: Document): TypedSchema {
  return schemaOf(inferRecordFields(doc));
}

export async function inferSchema(
  documents: AsyncIterable<Document> | Iterable<Document>,
  opts: InferOptions = {}
): Promise<TypedSchema> {
  const ratio = opts.samplingRatio ?? 1;
  if (!(ratio > 0 && ratio <= 1)) {
    throw new SchemaInferenceError(`samplingRatio must be in (0, 1], got ${ratio}`);
  }
  const random = opts.random ?? Math.random;
  const log = opts.logger ?? silentLogger;

  let fields: Field[] | null = null;
  let sampled = 0;
  for await (const doc of documents) {
    if (ratio < 1 && random() >= ratio) continue;
    const docFields = inferRecordFields(doc);
    fields = fields ? mergeFieldLists(fields, docFields) : docFields;
    sampled++;
  }

  if (!fields) {
    if (opts.fallback) {
      log.warn({ samplingRatio: ratio }, 'empty sample; using supplied schema');
      return opts.fallback;
    }
    throw new SchemaInferenceError('Cannot infer a schema: the sample contained no documents');
  }

  log.info({ sampled, samplingRatio: ratio, fields: fields.length }, 'schema-inferred');
  return schemaOf(fields);
}

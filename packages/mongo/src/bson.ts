// packages/mongo/src/bson.ts
// BSON wire values <-> the closed Value model.
import {
  Binary,
  BSONRegExp,
  Decimal128,
  Double,
  Int32,
  Long,
  MaxKey,
  MinKey,
  ObjectId,
  Timestamp,
  type Document as BsonDocument
} from 'mongodb';
import { V, fromPlain, type Bound, type Document, type FilterLiteral, type Value, type ValueHook } from '@docbridge/core';

export const bsonHook: ValueHook = (x) => {
  if (x instanceof ObjectId) return V.oid(x.toHexString());
  if (x instanceof Int32) return V.int(x.value);
  if (x instanceof Double) return V.double(x.value);
  // Timestamp is Long-shaped; check it first
  if (x instanceof Timestamp) return V.ts(new Date(x.t * 1000));
  if (x instanceof Long) return V.long(x.toBigInt());
  if (x instanceof Decimal128) return V.decimal(x.toString());
  if (x instanceof Binary) return V.bin(new Uint8Array(x.buffer.subarray(0, x.position)));
  if (x instanceof BSONRegExp) return V.str(x.pattern);
  return undefined;
};

export function fromBson(raw: unknown): Value {
  return fromPlain(raw, bsonHook);
}

export function documentFromBson(raw: BsonDocument): Document {
  const v = fromBson(raw);
  return v.type === 'record' ? v : V.record({});
}

export function toBson(value: Value): unknown {
  switch (value.type) {
    case 'null': return null;
    case 'boolean': return value.value;
    case 'int': return new Int32(value.value);
    case 'long': return Long.fromBigInt(value.value);
    case 'double': return new Double(value.value);
    case 'decimal': return Decimal128.fromString(value.value);
    case 'string': return value.value;
    case 'timestamp': return value.value;
    case 'objectId': return ObjectId.createFromHexString(value.value);
    case 'binary': return new Binary(value.value);
    case 'array': return value.items.map(toBson);
    case 'record': return toBsonDocument(value);
  }
}

export function toBsonDocument(doc: Document): BsonDocument {
  const out: BsonDocument = {};
  for (const [k, v] of doc.fields) out[k] = toBson(v);
  return out;
}

export function literalToBson(lit: FilterLiteral): unknown {
  return typeof lit === 'bigint' ? Long.fromBigInt(lit) : lit;
}

export function boundFromBson(raw: unknown): Bound {
  if (raw instanceof MinKey) return { kind: 'min' };
  if (raw instanceof MaxKey) return { kind: 'max' };
  return { kind: 'value', value: fromBson(raw) };
}

export function boundToBson(b: Bound): unknown {
  if (b.kind === 'min') return new MinKey();
  if (b.kind === 'max') return new MaxKey();
  return toBson(b.value);
}

export function boundsFromBson(doc: BsonDocument): Record<string, Bound> {
  const out: Record<string, Bound> = {};
  for (const [k, v] of Object.entries(doc)) out[k] = boundFromBson(v);
  return out;
}

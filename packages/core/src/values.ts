// packages/core/src/values.ts
import type { Bound, Document, RecordValue, Value } from './types.js';

const INT32_MAX = 2 ** 31 - 1;
const INT32_MIN = -(2 ** 31);

export const V = {
  null: (): Value => ({ type: 'null' }),
  bool: (value: boolean): Value => ({ type: 'boolean', value }),
  int: (value: number): Value => ({ type: 'int', value }),
  long: (value: bigint): Value => ({ type: 'long', value }),
  double: (value: number): Value => ({ type: 'double', value }),
  decimal: (value: string): Value => ({ type: 'decimal', value }),
  str: (value: string): Value => ({ type: 'string', value }),
  ts: (value: Date): Value => ({ type: 'timestamp', value }),
  oid: (value: string): Value => ({ type: 'objectId', value: value.toLowerCase() }),
  bin: (value: Uint8Array): Value => ({ type: 'binary', value }),
  array: (items: Value[]): Value => ({ type: 'array', items }),
  record: (fields: Record<string, Value> | Iterable<[string, Value]>): RecordValue => ({
    type: 'record',
    fields: new Map(isIterable(fields) ? fields : Object.entries(fields))
  })
};

function isIterable(x: object): x is Iterable<[string, Value]> {
  return Symbol.iterator in x;
}

export function isInt32(n: number): boolean {
  return Number.isInteger(n) && n >= INT32_MIN && n <= INT32_MAX;
}

/** Lets a store plug in its own wire types (e.g. BSON classes) ahead of the plain-JS rules. */
export type ValueHook = (input: unknown) => Value | undefined;

export function fromPlain(input: unknown, hook?: ValueHook): Value {
  const hooked = hook?.(input);
  if (hooked) return hooked;

  if (input === null || input === undefined) return V.null();
  if (typeof input === 'boolean') return V.bool(input);
  if (typeof input === 'number') {
    if (isInt32(input)) return V.int(input);
    if (Number.isSafeInteger(input)) return V.long(BigInt(input));
    return V.double(input);
  }
  if (typeof input === 'bigint') return V.long(input);
  if (typeof input === 'string') return V.str(input);
  if (input instanceof Date) return V.ts(input);
  if (input instanceof Uint8Array) return V.bin(input);
  if (Array.isArray(input)) return V.array(input.map((x) => fromPlain(x, hook)));
  if (typeof input === 'object') {
    const fields = new Map<string, Value>();
    for (const [k, v] of Object.entries(input)) {
      if (v === undefined) continue;
      fields.set(k, fromPlain(v, hook));
    }
    return { type: 'record', fields };
  }
  return V.str(String(input));
}

export function documentFromPlain(input: Record<string, unknown>, hook?: ValueHook): Document {
  const v = fromPlain(input, hook);
  return v.type === 'record' ? v : V.record({});
}

/** JSON-compatible rendering; used for `any` cells and for diagnostics. */
export function toJsonLike(value: Value): unknown {
  switch (value.type) {
    case 'null': return null;
    case 'boolean':
    case 'int':
    case 'double':
    case 'string':
    case 'decimal':
    case 'objectId':
      return value.value;
    case 'long': return value.value.toString();
    case 'timestamp': return value.value.toISOString();
    case 'binary': return Buffer.from(value.value).toString('base64');
    case 'array': return value.items.map(toJsonLike);
    case 'record': {
      const out: Record<string, unknown> = {};
      for (const [k, v] of value.fields) out[k] = toJsonLike(v);
      return out;
    }
  }
}

export function renderValue(value: Value): string {
  const j = toJsonLike(value);
  return typeof j === 'string' ? j : JSON.stringify(j);
}

/** Dotted lookup; numeric segments index arrays. `undefined` = absent. */
export function getPath(doc: Document, path: string): Value | undefined {
  let cur: Value | undefined = doc;
  for (const seg of path.split('.')) {
    if (!cur) return undefined;
    if (cur.type === 'record') {
      cur = cur.fields.get(seg);
    } else if (cur.type === 'array' && /^\d+$/.test(seg)) {
      cur = cur.items[Number(seg)];
    } else {
      return undefined;
    }
  }
  return cur;
}

// --------------------
// Ordering (BSON comparison order)
// --------------------
const TYPE_RANK: Record<Value['type'], number> = {
  null: 1,
  int: 2,
  long: 2,
  double: 2,
  decimal: 2,
  string: 3,
  record: 4,
  array: 5,
  binary: 6,
  objectId: 7,
  boolean: 8,
  timestamp: 9
};

function sign(n: number): -1 | 0 | 1 {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareNumeric(a: Value, b: Value): -1 | 0 | 1 {
  if ((a.type === 'int' || a.type === 'long') && (b.type === 'int' || b.type === 'long')) {
    const x = BigInt(a.value);
    const y = BigInt(b.value);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  const x = numericValue(a);
  const y = numericValue(b);
  // NaN equals NaN and sorts below every other number
  if (Number.isNaN(x) || Number.isNaN(y)) {
    if (Number.isNaN(x) && Number.isNaN(y)) return 0;
    return Number.isNaN(x) ? -1 : 1;
  }
  return x < y ? -1 : x > y ? 1 : 0;
}

export function isNaNValue(v: Value): boolean {
  return (v.type === 'double' || v.type === 'decimal') && Number.isNaN(numericValue(v));
}

export function numericValue(v: Value): number {
  switch (v.type) {
    case 'int':
    case 'double':
      return v.value;
    case 'long':
      return Number(v.value);
    case 'decimal':
      return Number(v.value);
    default:
      return Number.NaN;
  }
}

export function isNumeric(v: Value): boolean {
  return v.type === 'int' || v.type === 'long' || v.type === 'double' || v.type === 'decimal';
}

export function compareValues(a: Value, b: Value): -1 | 0 | 1 {
  const ra = TYPE_RANK[a.type];
  const rb = TYPE_RANK[b.type];
  if (ra !== rb) return ra < rb ? -1 : 1;

  if (isNumeric(a)) return compareNumeric(a, b);
  if (a.type === 'null') return 0;
  if (a.type === 'string' && b.type === 'string') return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  if (a.type === 'objectId' && b.type === 'objectId') return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  if (a.type === 'boolean' && b.type === 'boolean') return sign(Number(a.value) - Number(b.value));
  if (a.type === 'timestamp' && b.type === 'timestamp') return sign(a.value.getTime() - b.value.getTime());
  if (a.type === 'binary' && b.type === 'binary') {
    if (a.value.length !== b.value.length) return a.value.length < b.value.length ? -1 : 1;
    for (let i = 0; i < a.value.length; i++) {
      if (a.value[i] !== b.value[i]) return a.value[i] < b.value[i] ? -1 : 1;
    }
    return 0;
  }
  if (a.type === 'array' && b.type === 'array') {
    const n = Math.min(a.items.length, b.items.length);
    for (let i = 0; i < n; i++) {
      const c = compareValues(a.items[i], b.items[i]);
      if (c !== 0) return c;
    }
    return sign(a.items.length - b.items.length);
  }
  if (a.type === 'record' && b.type === 'record') {
    const ea = [...a.fields];
    const eb = [...b.fields];
    const n = Math.min(ea.length, eb.length);
    // per field: type, then name, then value
    for (let i = 0; i < n; i++) {
      const [ka, va] = ea[i];
      const [kb, vb] = eb[i];
      const ra = TYPE_RANK[va.type];
      const rb = TYPE_RANK[vb.type];
      if (ra !== rb) return ra < rb ? -1 : 1;
      if (ka !== kb) return ka < kb ? -1 : 1;
      const c = compareValues(va, vb);
      if (c !== 0) return c;
    }
    return sign(ea.length - eb.length);
  }
  return 0;
}

export function compareBounds(a: Bound, b: Bound): -1 | 0 | 1 {
  if (a.kind === b.kind && a.kind !== 'value') return 0;
  if (a.kind === 'min' || b.kind === 'max') return -1;
  if (a.kind === 'max' || b.kind === 'min') return 1;
  return compareValues(a.value, b.value);
}

export function valuesEqual(a: Value, b: Value): boolean {
  return compareValues(a, b) === 0;
}

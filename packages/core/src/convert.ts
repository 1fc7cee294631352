// packages/core/src/convert.ts
// Document <-> Row conversion. Pure: no I/O, never throws on bad data.
import { ErrorCodes, type WarningHandler } from './errors.js';
import { isArrayElementField } from './prune.js';
import { formatType } from './schema.js';
import {
  Row,
  type Cell,
  type DataType,
  type Document,
  type Field,
  type RecordValue,
  type TypedSchema,
  type Value
} from './types.js';
import { isInt32, isNumeric, numericValue, renderValue } from './values.js';

const FAILED = Symbol('conversion-failed');
type Converted = Cell | typeof FAILED;

// --------------------
// Read path: Document -> Row
// --------------------
function integral(v: Value): bigint | null {
  if (v.type === 'int') return BigInt(v.value);
  if (v.type === 'long') return v.value;
  if (v.type === 'double' && Number.isInteger(v.value)) return BigInt(v.value);
  if (v.type === 'decimal' && /^-?\d+(\.0*)?$/.test(v.value)) return BigInt(v.value.split('.')[0]);
  return null;
}

function toCell(value: Value, type: DataType, path: string, warn: WarningHandler | undefined): Converted {
  if (value.type === 'null') return null;

  if (type.kind === 'record') {
    return value.type === 'record' ? recordToRow(value, type.fields, path, warn) : FAILED;
  }
  if (type.kind === 'array') {
    if (value.type !== 'array') return FAILED;
    return value.items.map((item, i) => {
      const c = toCell(item, type.element, `${path}[${i}]`, warn);
      if (c === FAILED) {
        report(warn, `${path}[${i}]`, type.element, item);
        return null;
      }
      return c;
    });
  }

  switch (type.name) {
    case 'null':
      return FAILED;
    case 'any':
      return renderValue(value);
    case 'boolean':
      return value.type === 'boolean' ? value.value : FAILED;
    case 'int': {
      const n = integral(value);
      return n !== null && isInt32(Number(n)) ? Number(n) : FAILED;
    }
    case 'long': {
      return integral(value) ?? FAILED;
    }
    case 'double':
      return isNumeric(value) ? numericValue(value) : FAILED;
    case 'decimal':
      if (value.type === 'decimal') return value.value;
      if (value.type === 'long') return value.value.toString();
      return isNumeric(value) ? String(numericValue(value)) : FAILED;
    case 'string':
      if (value.type === 'record' || value.type === 'array' || value.type === 'binary') return FAILED;
      return renderValue(value);
    case 'timestamp':
      return value.type === 'timestamp' ? value.value : FAILED;
    case 'objectId':
      return value.type === 'objectId' ? value.value : FAILED;
    case 'binary':
      return value.type === 'binary' ? value.value : FAILED;
  }
}

function report(warn: WarningHandler | undefined, path: string, expected: DataType, actual: Value): void {
  warn?.({ code: ErrorCodes.CONVERSION, path, expected: formatType(expected), actual: actual.type });
}

function convertField(value: Value | undefined, f: Field, path: string, warn: WarningHandler | undefined): Cell {
  if (value === undefined) return null;
  const c = toCell(value, f.type, path, warn);
  if (c === FAILED) {
    report(warn, path, f.type, value);
    return null;
  }
  return c;
}

function recordToRow(doc: RecordValue, fields: readonly Field[], prefix: string, warn: WarningHandler | undefined): Row {
  return new Row(
    fields.map((f) => {
      const path = prefix ? `${prefix}.${f.name}` : f.name;
      if (isArrayElementField(f)) {
        const origin = doc.fields.get(f.metadata.colname);
        if (!origin || origin.type !== 'array') return null;
        return convertField(origin.items[f.metadata.idx], f, path, warn);
      }
      return convertField(doc.fields.get(f.name), f, path, warn);
    })
  );
}

export function toRow(doc: Document, schema: TypedSchema, onWarning?: WarningHandler): Row {
  return recordToRow(doc, schema.fields, '', onWarning);
}

// --------------------
// Write path: Row -> Document
// --------------------
function isCellArray(cell: Cell): cell is readonly Cell[] {
  return Array.isArray(cell);
}

function toValue(cell: Cell, type: DataType, path: string, warn: WarningHandler | undefined): Value | typeof FAILED {
  if (cell === null) return { type: 'null' };

  if (type.kind === 'record') {
    return cell instanceof Row ? rowToRecord(cell, type.fields, path, warn) : FAILED;
  }
  if (type.kind === 'array') {
    if (!isCellArray(cell)) return FAILED;
    return {
      type: 'array',
      items: cell.map((c, i) => {
        const v = toValue(c, type.element, `${path}[${i}]`, warn);
        if (v === FAILED) {
          warn?.({ code: ErrorCodes.CONVERSION, path: `${path}[${i}]`, expected: formatType(type.element), actual: typeof c });
          return { type: 'null' };
        }
        return v;
      })
    };
  }

  switch (type.name) {
    case 'null':
      return FAILED;
    case 'any':
    case 'string':
      return typeof cell === 'string' ? { type: 'string', value: cell } : FAILED;
    case 'boolean':
      return typeof cell === 'boolean' ? { type: 'boolean', value: cell } : FAILED;
    case 'int':
      return typeof cell === 'number' && isInt32(cell) ? { type: 'int', value: cell } : FAILED;
    case 'long':
      if (typeof cell === 'bigint') return { type: 'long', value: cell };
      return typeof cell === 'number' && Number.isSafeInteger(cell) ? { type: 'long', value: BigInt(cell) } : FAILED;
    case 'double':
      return typeof cell === 'number' ? { type: 'double', value: cell } : FAILED;
    case 'decimal':
      return typeof cell === 'string' || typeof cell === 'number' || typeof cell === 'bigint'
        ? { type: 'decimal', value: String(cell) }
        : FAILED;
    case 'timestamp':
      return cell instanceof Date ? { type: 'timestamp', value: cell } : FAILED;
    case 'objectId':
      return typeof cell === 'string' && /^[0-9a-f]{24}$/i.test(cell) ? { type: 'objectId', value: cell.toLowerCase() } : FAILED;
    case 'binary':
      return cell instanceof Uint8Array ? { type: 'binary', value: cell } : FAILED;
  }
}

function rowToRecord(row: Row, fields: readonly Field[], prefix: string, warn: WarningHandler | undefined): RecordValue {
  const out = new Map<string, Value>();
  fields.forEach((f, i) => {
    // pruned pseudo-fields only exist on the read side
    if (isArrayElementField(f)) return;
    const cell = row.get(i);
    if (cell === null) return;
    const path = prefix ? `${prefix}.${f.name}` : f.name;
    const v = toValue(cell, f.type, path, warn);
    if (v === FAILED) {
      warn?.({ code: ErrorCodes.CONVERSION, path, expected: formatType(f.type), actual: typeof cell });
      return;
    }
    out.set(f.name, v);
  });
  return { type: 'record', fields: out };
}

export function toDocument(row: Row, schema: TypedSchema, onWarning?: WarningHandler): Document {
  return rowToRecord(row, schema.fields, '', onWarning);
}

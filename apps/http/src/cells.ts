// apps/http/src/cells.ts
// Row cells <-> JSON. JSON has no bigint, Date or bytes: they travel as
// decimal strings, ISO-8601 strings and base64.
import { Row, ValidationError, type Cell, type DataType, type TypedSchema } from '@docbridge/core';

function isCellList(cell: Cell): cell is readonly Cell[] {
  return Array.isArray(cell);
}

export function encodeCell(cell: Cell): unknown {
  if (cell === null) return null;
  if (typeof cell === 'bigint') return cell.toString();
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : String(cell);
  if (cell instanceof Date) return cell.toISOString();
  if (cell instanceof Uint8Array) return Buffer.from(cell).toString('base64');
  if (cell instanceof Row) return encodeRow(cell);
  if (isCellList(cell)) return cell.map(encodeCell);
  return cell;
}

export function encodeRow(row: Row): unknown[] {
  return row.values.map(encodeCell);
}

function invalid(path: string, msg: string): ValidationError {
  return new ValidationError('Invalid row data', [{ path, msg }]);
}

export function decodeCell(value: unknown, type: DataType, path: string): Cell {
  if (value === null || value === undefined) return null;

  if (type.kind === 'record') {
    if (Array.isArray(value)) {
      return new Row(type.fields.map((f, i) => decodeCell(value[i], f.type, `${path}.${f.name}`)));
    }
    if (typeof value === 'object') {
      const byName = new Map(Object.entries(value));
      return new Row(type.fields.map((f) => decodeCell(byName.get(f.name), f.type, `${path}.${f.name}`)));
    }
    throw invalid(path, 'expected an array or an object');
  }
  if (type.kind === 'array') {
    if (!Array.isArray(value)) throw invalid(path, 'expected an array');
    return value.map((item, i) => decodeCell(item, type.element, `${path}[${i}]`));
  }

  switch (type.name) {
    case 'long':
      if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value);
      break;
    case 'timestamp':
      if (typeof value === 'string' || typeof value === 'number') {
        const d = new Date(value);
        if (!Number.isNaN(d.getTime())) return d;
      }
      break;
    case 'binary':
      if (typeof value === 'string') return new Uint8Array(Buffer.from(value, 'base64'));
      break;
    default:
      break;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  throw invalid(path, `unexpected ${Array.isArray(value) ? 'array' : typeof value}`);
}

/** Positional JSON row laid out as `schema`. Type mismatches the converter can report are left to it. */
export function decodeRow(values: readonly unknown[], schema: TypedSchema, at: number): Row {
  if (values.length > schema.fields.length) {
    throw invalid(`rows.${at}`, `expected at most ${schema.fields.length} values, got ${values.length}`);
  }
  return new Row(schema.fields.map((f, i) => decodeCell(values[i], f.type, `rows.${at}.${f.name}`)));
}

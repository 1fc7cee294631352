// packages/core/src/prune.ts
import { field, schemaOf } from './schema.js';
import type { Field, RequiredColumn, TypedSchema } from './types.js';

export interface ColumnRequest {
  name: string;
  index?: number;
}

export function normalizeColumn(col: RequiredColumn): ColumnRequest {
  return typeof col === 'string' ? { name: col } : col;
}

export function pseudoFieldName(name: string, idx: number): string {
  return `${name}[${idx}]`;
}

export function isArrayElementField(f: Field): f is Field & { metadata: { idx: number; colname: string } } {
  return f.metadata?.idx !== undefined && f.metadata.colname !== undefined;
}

/**
 * Reduce `schema` to the requested columns, in request order.
 * Unknown names, and indexes on non-array fields, are left out rather than rejected.
 */
export function pruneSchema(schema: TypedSchema, requiredColumns: readonly RequiredColumn[]): TypedSchema {
  const byName = new Map(schema.fields.map((f) => [f.name, f] as const));
  const out: Field[] = [];
  const taken = new Set<string>();

  for (const raw of requiredColumns) {
    const { name, index } = normalizeColumn(raw);
    const f = byName.get(name);
    if (!f) continue;

    if (index === undefined) {
      if (!taken.has(f.name)) out.push(f);
      taken.add(f.name);
      continue;
    }
    if (f.type.kind !== 'array' || !Number.isInteger(index) || index < 0) continue;

    const pseudo = pseudoFieldName(name, index);
    if (taken.has(pseudo)) continue;
    taken.add(pseudo);
    out.push(field(pseudo, f.type.element, true, { idx: index, colname: name }));
  }
  return schemaOf(out);
}

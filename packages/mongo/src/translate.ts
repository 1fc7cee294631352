// packages/mongo/src/translate.ts
// Abstract filters + required columns -> native query document and projection.
import type { Document as BsonDocument } from 'mongodb';
import {
  isArrayElementField,
  pruneSchema,
  referencedFields,
  type DataType,
  type FilterLiteral,
  type FilterNode,
  type RequiredColumn,
  type TypedSchema
} from '@docbridge/core';
import { literalToBson } from './bson.js';

interface Native {
  doc: BsonDocument;
  exact: boolean; // false: the store returns a superset, re-check client-side
}

export interface FilterTranslation {
  filter: BsonDocument;
  pushed: FilterNode[];
  residual: FilterNode[];
}

export interface ScanPlan extends FilterTranslation {
  schema: TypedSchema;
  projection: BsonDocument;
}

const CMP = { eq: '$eq', gt: '$gt', gte: '$gte', lt: '$lt', lte: '$lte' } as const;

export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function lookup(type: DataType | undefined, segment: string): DataType | undefined {
  if (!type) return undefined;
  if (type.kind === 'record') return type.fields.find((f) => f.name === segment)?.type;
  if (type.kind === 'array' && /^\d+$/.test(segment)) return type.element;
  return undefined;
}

/**
 * True when `path` resolves to a known scalar. The store matches array fields
 * element-wise, which the client-side semantics do not, so anything else is inexact.
 */
export function isScalarPath(schema: TypedSchema | undefined, path: string): boolean {
  if (!schema) return false;
  let type: DataType | undefined = { kind: 'record', fields: schema.fields };
  for (const seg of path.split('.')) type = lookup(type, seg);
  return type?.kind === 'primitive' && type.name !== 'any' && type.name !== 'null';
}

function regexFor(op: 'startsWith' | 'endsWith' | 'contains', value: string): string {
  const body = escapeRegex(value);
  return op === 'startsWith' ? `^${body}` : op === 'endsWith' ? `${body}$` : body;
}

function toNative(node: FilterNode, schema: TypedSchema | undefined): Native | null {
  switch (node.op) {
    case 'eq':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte': {
      if (node.value === null) {
        // {f: null} also matches missing fields; ordering against null has no counterpart
        return node.op === 'eq' ? { doc: { [node.field]: null }, exact: false } : null;
      }
      return {
        doc: { [node.field]: { [CMP[node.op]]: literalToBson(node.value) } },
        exact: isScalarPath(schema, node.field)
      };
    }
    case 'in': {
      const hasNull = node.values.some((v: FilterLiteral) => v === null);
      return {
        doc: { [node.field]: { $in: node.values.map(literalToBson) } },
        exact: !hasNull && isScalarPath(schema, node.field)
      };
    }
    case 'startsWith':
    case 'endsWith':
    case 'contains':
      return {
        doc: { [node.field]: { $regex: regexFor(node.op, node.value) } },
        exact: isScalarPath(schema, node.field)
      };
    case 'isNull':
      return { doc: { [node.field]: null }, exact: isScalarPath(schema, node.field) };
    case 'isNotNull':
      return { doc: { [node.field]: { $ne: null } }, exact: isScalarPath(schema, node.field) };
    case 'and': {
      const parts = node.filters.map((f) => toNative(f, schema));
      const ok = parts.filter((p): p is Native => p !== null);
      if (!ok.length) return null;
      // untranslatable conjuncts are dropped: the pushed part is a superset
      return {
        doc: ok.length === 1 ? ok[0].doc : { $and: ok.map((p) => p.doc) },
        exact: ok.length === parts.length && ok.every((p) => p.exact)
      };
    }
    case 'or': {
      if (!node.filters.length) return null;
      const parts: Native[] = [];
      for (const f of node.filters) {
        const p = toNative(f, schema);
        if (!p) return null;
        parts.push(p);
      }
      return { doc: { $or: parts.map((p) => p.doc) }, exact: parts.every((p) => p.exact) };
    }
    case 'not': {
      const inner = toNative(node.filter, schema);
      if (!inner || !inner.exact) return null;
      // NOT(unknown) is unknown client-side but $nor keeps it: superset
      return { doc: { $nor: [inner.doc] }, exact: false };
    }
    case 'predicate':
      return null;
  }
}

function conjuncts(filters: readonly FilterNode[]): FilterNode[] {
  return filters.flatMap((f) => (f.op === 'and' ? conjuncts(f.filters) : [f]));
}

/**
 * Split filters into what the store evaluates and what must be re-evaluated on
 * each returned document. Inexact translations land in both.
 */
export function translateFilters(filters: readonly FilterNode[], schema?: TypedSchema): FilterTranslation {
  const pushed: FilterNode[] = [];
  const residual: FilterNode[] = [];
  const docs: BsonDocument[] = [];

  for (const f of conjuncts(filters)) {
    const native = toNative(f, schema);
    if (!native) {
      residual.push(f);
      continue;
    }
    pushed.push(f);
    docs.push(native.doc);
    if (!native.exact) residual.push(f);
  }

  const filter = docs.length === 0 ? {} : docs.length === 1 ? docs[0] : { $and: docs };
  return { filter, pushed, residual };
}

/**
 * Inclusion projection for the pruned schema plus whatever the residual
 * filters read. Index-only array columns fetch just the prefix they need.
 */
export function buildProjection(pruned: TypedSchema, residual: readonly FilterNode[] = []): BsonDocument {
  const include = new Set<string>();
  const slices = new Map<string, number>();

  for (const f of pruned.fields) {
    if (isArrayElementField(f)) {
      const { colname, idx } = f.metadata;
      slices.set(colname, Math.max(slices.get(colname) ?? 0, idx + 1));
    } else {
      include.add(f.name);
    }
  }
  for (const node of residual) {
    for (const path of referencedFields(node)) include.add(path.split('.')[0]);
  }

  const projection: BsonDocument = {};
  for (const name of include) projection[name] = 1;
  for (const [name, n] of slices) {
    if (!include.has(name)) projection[name] = { $slice: n };
  }
  if (!include.size) return slices.size ? { ...projection, _id: 1 } : { _id: 1 };
  if (!include.has('_id')) projection._id = 0;
  return projection;
}

export function translate(
  schema: TypedSchema,
  requiredColumns: readonly RequiredColumn[],
  filters: readonly FilterNode[]
): ScanPlan {
  const pruned = pruneSchema(schema, requiredColumns);
  const t = translateFilters(filters, schema);
  return { ...t, schema: pruned, projection: buildProjection(pruned, t.residual) };
}

// packages/core/src/filter.ts
// Client-side evaluation of abstract filters, used for whatever the store
// could not (or not exactly) evaluate. Three-valued: null = unknown.
import type { Document, FilterLiteral, FilterNode, Value } from './types.js';
import { compareValues, fromPlain, getPath, isNaNValue } from './values.js';

type Truth = boolean | null;

export function literalToValue(lit: FilterLiteral): Value {
  return fromPlain(lit);
}

function present(v: Value | undefined): v is Value {
  return v !== undefined && v.type !== 'null';
}

function sameBracket(a: Value, b: Value): boolean {
  const numeric = (v: Value) => v.type === 'int' || v.type === 'long' || v.type === 'double' || v.type === 'decimal';
  return a.type === b.type || (numeric(a) && numeric(b));
}

function compareOp(op: 'eq' | 'gt' | 'gte' | 'lt' | 'lte', v: Value | undefined, lit: FilterLiteral): Truth {
  if (lit === null || !present(v)) return null;
  const rhs = literalToValue(lit);
  if (!sameBracket(v, rhs)) return op === 'eq' ? false : null;
  // NaN only matches NaN, under eq, gte and lte
  if (isNaNValue(v) !== isNaNValue(rhs)) return false;
  const c = compareValues(v, rhs);
  switch (op) {
    case 'eq': return c === 0;
    case 'gt': return c > 0;
    case 'gte': return c >= 0;
    case 'lt': return c < 0;
    case 'lte': return c <= 0;
  }
}

function not(t: Truth): Truth {
  return t === null ? null : !t;
}

export function evaluateFilter(node: FilterNode, doc: Document): Truth {
  switch (node.op) {
    case 'eq':
    case 'gt':
    case 'gte':
    case 'lt':
    case 'lte':
      return compareOp(node.op, getPath(doc, node.field), node.value);
    case 'in': {
      const v = getPath(doc, node.field);
      if (!present(v)) return null;
      let sawNull = false;
      for (const lit of node.values) {
        const r = compareOp('eq', v, lit);
        if (r === true) return true;
        if (r === null) sawNull = true;
      }
      return sawNull ? null : false;
    }
    case 'startsWith':
    case 'endsWith':
    case 'contains': {
      const v = getPath(doc, node.field);
      if (!present(v)) return null;
      if (v.type !== 'string') return false;
      if (node.op === 'startsWith') return v.value.startsWith(node.value);
      if (node.op === 'endsWith') return v.value.endsWith(node.value);
      return v.value.includes(node.value);
    }
    case 'isNull':
      return !present(getPath(doc, node.field));
    case 'isNotNull':
      return present(getPath(doc, node.field));
    case 'and': {
      let out: Truth = true;
      for (const f of node.filters) {
        const r = evaluateFilter(f, doc);
        if (r === false) return false;
        if (r === null) out = null;
      }
      return out;
    }
    case 'or': {
      let out: Truth = false;
      for (const f of node.filters) {
        const r = evaluateFilter(f, doc);
        if (r === true) return true;
        if (r === null) out = null;
      }
      return out;
    }
    case 'not':
      return not(evaluateFilter(node.filter, doc));
    case 'predicate':
      return node.test(getPath(doc, node.field) ?? { type: 'null' });
  }
}

/** A document survives only when every filter is definitely true. */
export function matchesAll(filters: readonly FilterNode[], doc: Document): boolean {
  return filters.every((f) => evaluateFilter(f, doc) === true);
}

export function referencedFields(node: FilterNode, out: Set<string> = new Set()): Set<string> {
  switch (node.op) {
    case 'and':
    case 'or':
      node.filters.forEach((f) => referencedFields(f, out));
      break;
    case 'not':
      referencedFields(node.filter, out);
      break;
    default:
      out.add(node.field);
  }
  return out;
}

export function describeFilter(node: FilterNode): string {
  switch (node.op) {
    case 'and':
    case 'or':
      return `(${node.filters.map(describeFilter).join(` ${node.op.toUpperCase()} `)})`;
    case 'not':
      return `NOT ${describeFilter(node.filter)}`;
    case 'in':
      return `${node.field} IN (${node.values.map(String).join(', ')})`;
    case 'isNull':
      return `${node.field} IS NULL`;
    case 'isNotNull':
      return `${node.field} IS NOT NULL`;
    case 'predicate':
      return `${node.name}(${node.field})`;
    default:
      return `${node.field} ${node.op} ${String(node.value)}`;
  }
}

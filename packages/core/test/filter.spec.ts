/* packages/core/test/filter.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  describeFilter,
  documentFromPlain,
  evaluateFilter,
  matchesAll,
  referencedFields,
  type FilterNode,
  type Value
} from '../src/index.js';

const doc = documentFromPlain({ n: 5, s: 'hello', gone: null, tags: ['a', 'b'], sub: { x: 1 } });

const eq = (field: string, value: string | number | null): FilterNode => ({
  op: 'eq',
  field,
  value
});

describe('evaluateFilter', () => {
  it.each<[string, FilterNode, boolean | null]>([
    ['eq match', eq('n', 5), true],
    ['gt miss', { op: 'gt', field: 'n', value: 10 }, false],
    ['lte match', { op: 'lte', field: 'n', value: 5 }, true],
    ['eq across types', eq('n', 'five'), false],
    ['order across types', { op: 'gt', field: 'n', value: 'a' }, null],
    ['eq on absent field', eq('zzz', 1), null],
    ['eq on null field', eq('gone', 1), null],
    ['eq against null literal', eq('n', null), null],
    ['in match', { op: 'in', field: 'n', values: [1, 5] }, true],
    ['in miss', { op: 'in', field: 'n', values: [1, 2] }, false],
    ['in miss with null literal', { op: 'in', field: 'n', values: [1, null] }, null],
    ['startsWith', { op: 'startsWith', field: 's', value: 'he' }, true],
    ['endsWith', { op: 'endsWith', field: 's', value: 'lo' }, true],
    ['contains', { op: 'contains', field: 's', value: 'ell' }, true],
    ['string op on a number', { op: 'startsWith', field: 'n', value: '5' }, false],
    ['isNull on null', { op: 'isNull', field: 'gone' }, true],
    ['isNull on absent', { op: 'isNull', field: 'zzz' }, true],
    ['isNotNull', { op: 'isNotNull', field: 'n' }, true],
    ['dotted path', eq('sub.x', 1), true],
    ['array index path', eq('tags.1', 'b'), true],
    ['and with unknown', { op: 'and', filters: [eq('n', 5), eq('zzz', 1)] }, null],
    ['and with false', { op: 'and', filters: [eq('n', 6), eq('zzz', 1)] }, false],
    ['or with true', { op: 'or', filters: [eq('zzz', 1), eq('n', 5)] }, true],
    ['or with unknown', { op: 'or', filters: [eq('n', 6), eq('zzz', 1)] }, null],
    ['not of unknown', { op: 'not', filter: eq('zzz', 1) }, null],
    ['not of true', { op: 'not', filter: eq('n', 5) }, false]
  ])('%s', (_name, node, expected) => {
    expect(evaluateFilter(node, doc)).toBe(expected);
  });

  it('matches NaN only against NaN', () => {
    const nan = documentFromPlain({ x: Number.NaN });
    expect(evaluateFilter(eq('x', 5), nan)).toBe(false);
    expect(evaluateFilter({ op: 'not', filter: eq('x', 5) }, nan)).toBe(true);
    expect(evaluateFilter({ op: 'gte', field: 'x', value: 5 }, nan)).toBe(false);
    expect(evaluateFilter({ op: 'lt', field: 'x', value: 5 }, nan)).toBe(false);
    expect(evaluateFilter(eq('x', Number.NaN), nan)).toBe(true);
    expect(evaluateFilter({ op: 'lte', field: 'x', value: Number.NaN }, nan)).toBe(true);
    expect(evaluateFilter({ op: 'gt', field: 'x', value: Number.NaN }, nan)).toBe(false);
    expect(evaluateFilter(eq('n', Number.NaN), doc)).toBe(false);
  });

  it('hands predicates the value, or null when absent', () => {
    const seen: Value[] = [];
    const test = (v: Value) => {
      seen.push(v);
      return v.type === 'int';
    };
    expect(evaluateFilter({ op: 'predicate', field: 'n', name: 'isInt', test }, doc)).toBe(true);
    expect(evaluateFilter({ op: 'predicate', field: 'zzz', name: 'isInt', test }, doc)).toBe(false);
    expect(seen).toEqual([{ type: 'int', value: 5 }, { type: 'null' }]);
  });
});

describe('matchesAll', () => {
  it('keeps a document only when every filter is true', () => {
    expect(matchesAll([eq('n', 5), { op: 'isNotNull', field: 's' }], doc)).toBe(true);
    expect(matchesAll([eq('n', 5), eq('zzz', 1)], doc)).toBe(false);
    expect(matchesAll([], doc)).toBe(true);
  });
});

describe('filter helpers', () => {
  const node: FilterNode = {
    op: 'and',
    filters: [eq('n', 5), { op: 'not', filter: { op: 'isNull', field: 'sub.x' } }]
  };

  it('lists referenced fields', () => {
    expect([...referencedFields(node)]).toEqual(['n', 'sub.x']);
  });

  it('describes a filter tree', () => {
    expect(describeFilter(node)).toBe('(n eq 5 AND NOT sub.x IS NULL)');
  });
});

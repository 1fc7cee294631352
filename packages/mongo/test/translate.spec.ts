/* packages/mongo/test/translate.spec.ts */
import { describe, it, expect } from 'vitest';
import { Long } from 'mongodb';
import { T, field, pruneSchema, schemaOf, type FilterNode } from '@docbridge/core';
import { buildProjection, escapeRegex, isScalarPath, translate, translateFilters } from '../src/index.js';

const schema = schemaOf([
  field('_id', T.int, false),
  field('n', T.int),
  field('s', T.string),
  field('tags', T.array(T.string)),
  field('sub', T.record([field('x', T.int)])),
  field('mixed', T.any)
]);

const eq = (f: string, value: string | number | null): FilterNode => ({ op: 'eq', field: f, value });
const pred: FilterNode = { op: 'predicate', field: 'mixed', name: 'isOdd', test: () => true };

describe('translateFilters', () => {
  it('pushes an exact comparison on a scalar field', () => {
    const node = eq('n', 5);
    expect(translateFilters([node], schema)).toEqual({ filter: { n: { $eq: 5 } }, pushed: [node], residual: [] });
  });

  it('re-checks comparisons on array fields client-side', () => {
    const node = eq('tags', 'a');
    expect(translateFilters([node], schema)).toEqual({ filter: { tags: { $eq: 'a' } }, pushed: [node], residual: [node] });
  });

  it('treats fields of unknown or mixed type as inexact', () => {
    expect(translateFilters([eq('mixed', 1)], schema).residual).toHaveLength(1);
    expect(translateFilters([eq('nope', 1)], schema).residual).toHaveLength(1);
    expect(translateFilters([eq('n', 1)]).residual).toHaveLength(1);
  });

  it('pushes equality with null as a superset', () => {
    const node = eq('n', null);
    expect(translateFilters([node], schema)).toEqual({ filter: { n: null }, pushed: [node], residual: [node] });
  });

  it('keeps ordering against null client-side only', () => {
    const node: FilterNode = { op: 'gt', field: 'n', value: null };
    expect(translateFilters([node], schema)).toEqual({ filter: {}, pushed: [], residual: [node] });
  });

  it('translates in-lists, inexact when they hold null', () => {
    expect(translateFilters([{ op: 'in', field: 'n', values: [1, 2] }], schema)).toMatchObject({
      filter: { n: { $in: [1, 2] } },
      residual: []
    });
    expect(translateFilters([{ op: 'in', field: 'n', values: [1, null] }], schema).residual).toHaveLength(1);
  });

  it('sends bigint literals as Long', () => {
    const { filter } = translateFilters([{ op: 'gt', field: 'n', value: 5n }], schema);
    expect(filter).toEqual({ n: { $gt: Long.fromBigInt(5n) } });
  });

  it('turns string operators into anchored, escaped regexes', () => {
    const t = translateFilters(
      [
        { op: 'startsWith', field: 's', value: 'a.b' },
        { op: 'endsWith', field: 's', value: 'z' },
        { op: 'contains', field: 's', value: '(x)' }
      ],
      schema
    );
    expect(t.filter).toEqual({
      $and: [{ s: { $regex: '^a\\.b' } }, { s: { $regex: 'z$' } }, { s: { $regex: '\\(x\\)' } }]
    });
    expect(t.residual).toEqual([]);
  });

  it('maps null checks', () => {
    expect(translateFilters([{ op: 'isNull', field: 's' }], schema).filter).toEqual({ s: null });
    expect(translateFilters([{ op: 'isNotNull', field: 'sub.x' }], schema)).toMatchObject({
      filter: { 'sub.x': { $ne: null } },
      residual: []
    });
  });

  it('pushes a fully translatable or', () => {
    const node: FilterNode = { op: 'or', filters: [eq('n', 1), eq('s', 'a')] };
    expect(translateFilters([node], schema)).toEqual({
      filter: { $or: [{ n: { $eq: 1 } }, { s: { $eq: 'a' } }] },
      pushed: [node],
      residual: []
    });
  });

  it('keeps an or with an untranslatable branch client-side', () => {
    const node: FilterNode = { op: 'or', filters: [eq('n', 1), pred] };
    expect(translateFilters([node], schema)).toEqual({ filter: {}, pushed: [], residual: [node] });
  });

  it('pushes not as $nor and still re-checks it', () => {
    const node: FilterNode = { op: 'not', filter: eq('n', 1) };
    expect(translateFilters([node], schema)).toEqual({ filter: { $nor: [{ n: { $eq: 1 } }] }, pushed: [node], residual: [node] });
  });

  it('does not negate an inexact translation', () => {
    const node: FilterNode = { op: 'not', filter: eq('tags', 'a') };
    expect(translateFilters([node], schema)).toEqual({ filter: {}, pushed: [], residual: [node] });
  });

  it('pushes the translatable part of a nested and as a superset', () => {
    const node: FilterNode = { op: 'or', filters: [{ op: 'and', filters: [eq('n', 1), pred] }, eq('s', 'a')] };
    expect(translateFilters([node], schema)).toEqual({
      filter: { $or: [{ n: { $eq: 1 } }, { s: { $eq: 'a' } }] },
      pushed: [node],
      residual: [node]
    });
  });

  it('flattens top-level conjunctions', () => {
    const a = eq('n', 1);
    const b = eq('s', 'x');
    const t = translateFilters([{ op: 'and', filters: [a, pred] }, b], schema);
    expect(t).toEqual({ filter: { $and: [{ n: { $eq: 1 } }, { s: { $eq: 'x' } }] }, pushed: [a, b], residual: [pred] });
  });
});

describe('isScalarPath', () => {
  it('follows records and array indexes', () => {
    expect(isScalarPath(schema, 'sub.x')).toBe(true);
    expect(isScalarPath(schema, 'tags.0')).toBe(true);
    expect(isScalarPath(schema, 'tags')).toBe(false);
    expect(isScalarPath(schema, 'sub')).toBe(false);
  });
});

describe('buildProjection', () => {
  it('includes requested columns and hides _id', () => {
    expect(buildProjection(pruneSchema(schema, ['n', 's']))).toEqual({ n: 1, s: 1, _id: 0 });
  });

  it('keeps _id when requested', () => {
    expect(buildProjection(pruneSchema(schema, ['_id', 'n']))).toEqual({ _id: 1, n: 1 });
  });

  it('slices arrays read only by index', () => {
    const pruned = pruneSchema(schema, [{ name: 'tags', index: 2 }, { name: 'tags', index: 0 }]);
    expect(buildProjection(pruned)).toEqual({ tags: { $slice: 3 }, _id: 1 });
    expect(buildProjection(pruneSchema(schema, ['n', { name: 'tags', index: 0 }]))).toEqual({
      n: 1,
      tags: { $slice: 1 },
      _id: 0
    });
  });

  it('adds the top-level fields residual filters read', () => {
    const pruned = pruneSchema(schema, ['n', { name: 'tags', index: 0 }]);
    expect(buildProjection(pruned, [eq('sub.x', 1), eq('tags', 'a')])).toEqual({ n: 1, sub: 1, tags: 1, _id: 0 });
  });

  it('asks for _id only when nothing is requested', () => {
    expect(buildProjection(pruneSchema(schema, []))).toEqual({ _id: 1 });
  });
});

describe('translate', () => {
  it('plans schema, filter and projection together', () => {
    const plan = translate(schema, ['n', { name: 'tags', index: 0 }], [eq('s', 'a'), pred]);
    expect(plan.schema.fields.map((f) => f.name)).toEqual(['n', 'tags[0]']);
    expect(plan.filter).toEqual({ s: { $eq: 'a' } });
    expect(plan.residual).toEqual([pred]);
    expect(plan.projection).toEqual({ n: 1, mixed: 1, tags: { $slice: 1 }, _id: 0 });
  });

  it('escapes regex metacharacters', () => {
    expect(escapeRegex('a+b*[c]')).toBe('a\\+b\\*\\[c\\]');
  });
});

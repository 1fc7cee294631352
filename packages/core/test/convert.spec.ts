/* packages/core/test/convert.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  Row,
  T,
  V,
  field,
  inferDocumentSchema,
  pruneSchema,
  schemaOf,
  toDocument,
  toRow,
  type ConversionWarning
} from '../src/index.js';
import { plain } from '../../../tests/helpers.js';

function collector() {
  const warnings: ConversionWarning[] = [];
  return { warnings, onWarning: (w: ConversionWarning) => warnings.push(w) };
}

describe('toRow', () => {
  const schema = schemaOf([field('a', T.int), field('c', T.array(T.int))]);

  it('reads array elements through pseudo-fields, null when the index is missing', () => {
    const pruned = pruneSchema(schema, ['a', { name: 'c', index: 0 }]);
    const rows = [V.record({ a: V.int(1), c: V.array([]) }), V.record({ a: V.int(2), c: V.array([V.int(10)]) })].map(
      (d) => toRow(d, pruned)
    );
    expect(rows.map(plain)).toEqual([
      [1, null],
      [2, 10]
    ]);
  });

  it('gives null for an index past the end of the array', () => {
    const tags = schemaOf([field('tags', T.array(T.string))]);
    const pruned = pruneSchema(tags, [{ name: 'tags', index: 99 }]);
    expect(plain(toRow(V.record({ tags: V.array([V.str('x')]) }), pruned))).toEqual([null]);
  });

  it('fills absent fields with null', () => {
    expect(plain(toRow(V.record({}), schema))).toEqual([null, null]);
  });

  it('reports a mismatch and nulls the field', () => {
    const { warnings, onWarning } = collector();
    const row = toRow(V.record({ a: V.str('x'), c: V.array([V.int(1)]) }), schema, onWarning);
    expect(plain(row)).toEqual([null, [1]]);
    expect(warnings).toEqual([{ code: 'DB_CONVERSION', path: 'a', expected: 'int', actual: 'string' }]);
  });

  it('does not narrow a long that overflows int', () => {
    const { warnings, onWarning } = collector();
    expect(plain(toRow(V.record({ a: V.long(5_000_000_000n) }), schema, onWarning))).toEqual([null, null]);
    expect(warnings).toEqual([{ code: 'DB_CONVERSION', path: 'a', expected: 'int', actual: 'long' }]);
  });

  it('nulls failing array elements individually', () => {
    const { warnings, onWarning } = collector();
    const row = toRow(V.record({ c: V.array([V.str('a'), V.int(2)]) }), schema, onWarning);
    expect(plain(row)).toEqual([null, [null, 2]]);
    expect(warnings).toEqual([{ code: 'DB_CONVERSION', path: 'c[0]', expected: 'int', actual: 'string' }]);
  });

  it('renders anything into an any column', () => {
    const s = schemaOf([field('v', T.any)]);
    const cells = [V.record({ x: V.int(1) }), V.str('s'), V.int(5), V.long(7n)].map(
      (v) => toRow(V.record({ v }), s).get(0)
    );
    expect(cells).toEqual(['{"x":1}', 's', '5', '7']);
  });

  it('widens numbers and renders scalars as strings', () => {
    const s = schemaOf([field('d', T.double), field('s', T.string), field('l', T.long)]);
    const row = toRow(V.record({ d: V.int(3), s: V.int(5), l: V.double(4) }), s);
    expect(plain(row)).toEqual([3, '5', 4n]);
  });

  it('rejects values in a column only ever seen as null', () => {
    const { warnings, onWarning } = collector();
    const s = schemaOf([field('x', T.null)]);
    expect(plain(toRow(V.record({ x: V.int(1) }), s, onWarning))).toEqual([null]);
    expect(warnings).toEqual([{ code: 'DB_CONVERSION', path: 'x', expected: 'null', actual: 'int' }]);
  });
});

describe('toDocument', () => {
  it('omits null cells', () => {
    const s = schemaOf([field('a', T.int), field('b', T.string)]);
    expect(toDocument(new Row([1, null]), s)).toEqual(V.record({ a: V.int(1) }));
  });

  it('skips pseudo-fields', () => {
    const s = pruneSchema(schemaOf([field('a', T.int), field('tags', T.array(T.string))]), ['a', { name: 'tags', index: 0 }]);
    expect(toDocument(new Row([1, 'x']), s)).toEqual(V.record({ a: V.int(1) }));
  });

  it('reports an invalid ObjectId and leaves the field out', () => {
    const { warnings, onWarning } = collector();
    const s = schemaOf([field('_id', T.objectId)]);
    expect(toDocument(new Row(['not-hex']), s, onWarning)).toEqual(V.record({}));
    expect(warnings).toEqual([{ code: 'DB_CONVERSION', path: '_id', expected: 'objectId', actual: 'string' }]);
  });

  it('accepts safe integers for long columns', () => {
    const s = schemaOf([field('l', T.long)]);
    expect(toDocument(new Row([42]), s)).toEqual(V.record({ l: V.long(42n) }));
  });
});

describe('round trip', () => {
  it('reproduces a document through its inferred schema', () => {
    // keys in name order: inferred schemas sort fields
    const doc = V.record({
      b: V.bin(new Uint8Array([1, 2])),
      d: V.double(1.5),
      dec: V.decimal('1.10'),
      i: V.int(1),
      l: V.long(5_000_000_000n),
      n: V.array([V.int(1), V.null()]),
      o: V.oid('65a1b2c3d4e5f60718293a4b'),
      r: V.record({ x: V.bool(true) }),
      s: V.str('x'),
      t: V.ts(new Date('2024-01-02T03:04:05.000Z'))
    });
    const schema = inferDocumentSchema(doc);
    const row = toRow(doc, schema);

    expect(plain(row)).toEqual([
      new Uint8Array([1, 2]),
      1.5,
      '1.10',
      1,
      5_000_000_000n,
      [1, null],
      '65a1b2c3d4e5f60718293a4b',
      [true],
      'x',
      new Date('2024-01-02T03:04:05.000Z')
    ]);
    expect(toDocument(row, schema)).toEqual(doc);
  });
});

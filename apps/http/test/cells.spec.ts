/* apps/http/test/cells.spec.ts */
import { describe, it, expect } from 'vitest';
import { Row, T, ValidationError, field, schemaOf } from '@docbridge/core';
import { decodeCell, decodeRow, encodeCell, encodeRow } from '../src/cells.js';

describe('encodeCell', () => {
  it('turns values JSON cannot carry into strings', () => {
    expect(encodeCell(12345678901234567890n)).toBe('12345678901234567890');
    expect(encodeCell(Number.NaN)).toBe('NaN');
    expect(encodeCell(Number.NEGATIVE_INFINITY)).toBe('-Infinity');
    expect(encodeCell(new Date('2024-03-01T10:00:00Z'))).toBe('2024-03-01T10:00:00.000Z');
    expect(encodeCell(new Uint8Array([1, 2, 3]))).toBe('AQID');
  });

  it('nests records and lists', () => {
    expect(encodeRow(new Row([1, new Row(['x', 2n]), [true, null]]))).toEqual([1, ['x', '2'], [true, null]]);
  });
});

describe('decodeCell', () => {
  it('reads the string forms back', () => {
    expect(decodeCell('-42', T.long, 'v')).toBe(-42n);
    expect(decodeCell('2024-03-01T10:00:00Z', T.timestamp, 'v')).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(decodeCell('AQID', T.binary, 'v')).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('accepts records as arrays or objects', () => {
    const addr = T.record([field('city', T.string), field('zip', T.string)]);
    expect(decodeCell(['Oslo', '0150'], addr, 'v')).toEqual(new Row(['Oslo', '0150']));
    expect(decodeCell({ zip: '0150' }, addr, 'v')).toEqual(new Row([null, '0150']));
  });

  it('leaves scalar mismatches to the converter', () => {
    expect(decodeCell('abc', T.long, 'v')).toBe('abc');
    expect(decodeCell(7, T.string, 'v')).toBe(7);
  });

  it('rejects structural mismatches with the path', () => {
    expect(() => decodeCell({ a: 1 }, T.string, 'rows.0.name')).toThrow(ValidationError);
    let caught: unknown;
    try {
      decodeCell([1, { a: 1 }], T.array(T.int), 'rows.0.tags');
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ issues: [{ path: 'rows.0.tags[1]', msg: 'unexpected object' }] });
  });
});

describe('decodeRow', () => {
  const schema = schemaOf([field('_id', T.int), field('name', T.string)]);

  it('pads missing trailing values with nulls', () => {
    expect(decodeRow([1], schema, 0)).toEqual(new Row([1, null]));
  });

  it('rejects extra values', () => {
    expect(() => decodeRow([1, 'a', true], schema, 4)).toThrow('Invalid row data');
  });
});

// packages/core/src/schema.ts
import type { DataType, Field, FieldMetadata, PrimitiveName, TypedSchema } from './types.js';

const prim = (name: PrimitiveName): DataType => ({ kind: 'primitive', name });

export const T = {
  null: prim('null'),
  boolean: prim('boolean'),
  int: prim('int'),
  long: prim('long'),
  double: prim('double'),
  decimal: prim('decimal'),
  string: prim('string'),
  timestamp: prim('timestamp'),
  objectId: prim('objectId'),
  binary: prim('binary'),
  any: prim('any'),
  array: (element: DataType, containsNull = true): DataType => ({ kind: 'array', element, containsNull }),
  record: (fields: Field[]): DataType => ({ kind: 'record', fields })
};

export function field(name: string, type: DataType, nullable = true, metadata?: FieldMetadata): Field {
  return metadata ? { name, type, nullable, metadata } : { name, type, nullable };
}

export function schemaOf(fields: readonly Field[]): TypedSchema {
  const seen = new Set<string>();
  for (const f of fields) {
    if (seen.has(f.name)) throw new Error(`Duplicate field name in schema: ${f.name}`);
    seen.add(f.name);
  }
  return Object.freeze({ fields: Object.freeze([...fields]) });
}

export function formatType(type: DataType): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'array':
      return `array<${formatType(type.element)}>`;
    case 'record':
      return `struct<${type.fields.map((f) => `${f.name}: ${formatType(f.type)}`).join(', ')}>`;
  }
}

export function formatSchema(schema: TypedSchema): string {
  return schema.fields.map((f) => `${f.name}: ${formatType(f.type)}${f.nullable ? '?' : ''}`).join(', ');
}

export function typesEqual(a: DataType, b: DataType): boolean {
  if (a.kind === 'primitive' && b.kind === 'primitive') return a.name === b.name;
  if (a.kind === 'array' && b.kind === 'array') {
    return a.containsNull === b.containsNull && typesEqual(a.element, b.element);
  }
  if (a.kind === 'record' && b.kind === 'record') return fieldListsEqual(a.fields, b.fields);
  return false;
}

function fieldListsEqual(a: readonly Field[], b: readonly Field[]): boolean {
  return (
    a.length === b.length &&
    a.every((f, i) => {
      const g = b[i];
      return (
        f.name === g.name &&
        f.nullable === g.nullable &&
        f.metadata?.idx === g.metadata?.idx &&
        f.metadata?.colname === g.metadata?.colname &&
        typesEqual(f.type, g.type)
      );
    })
  );
}

export function schemasEqual(a: TypedSchema, b: TypedSchema): boolean {
  return fieldListsEqual(a.fields, b.fields);
}

/** Plain-JSON form; stable enough to hash and to send over the wire. */
export function schemaToJson(schema: TypedSchema): unknown {
  const typeJson = (t: DataType): unknown =>
    t.kind === 'primitive'
      ? t.name
      : t.kind === 'array'
        ? { array: typeJson(t.element), containsNull: t.containsNull }
        : { struct: t.fields.map(fieldJson) };
  const fieldJson = (f: Field) => ({
    name: f.name,
    type: typeJson(f.type),
    nullable: f.nullable,
    ...(f.metadata ? { metadata: f.metadata } : {})
  });
  return { fields: schema.fields.map(fieldJson) };
}

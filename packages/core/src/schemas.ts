// packages/core/src/schemas.ts
import { z, ZodError } from 'zod';
import { ValidationError, type ValidationIssue } from './errors.js';
import { T, field, schemaOf } from './schema.js';
import type { DataType, Field, FilterLiteral, FilterNode, TypedSchema } from './types.js';

export const DEFAULT_SAMPLING_RATIO = 1.0;

// --------------------
// Relation configuration
// --------------------
export const CredentialSchema = z.object({
  user: z.string().min(1),
  password: z.string(),
  source: z.string().optional(),       // authSource; defaults to the target database
  mechanism: z.enum(['DEFAULT', 'SCRAM-SHA-1', 'SCRAM-SHA-256', 'PLAIN', 'MONGODB-X509']).optional()
}).strict();
export type Credential = z.infer<typeof CredentialSchema>;

export const TlsSchema = z.object({
  enabled: z.boolean().default(false),
  caFile: z.string().optional(),
  certificateKeyFile: z.string().optional(),
  certificateKeyFilePassword: z.string().optional(),
  allowInvalidCertificates: z.boolean().optional(),
  allowInvalidHostnames: z.boolean().optional()
}).strict();
export type TlsOptions = z.infer<typeof TlsSchema>;

export const ReadPreferenceEnum = z.enum(['primary', 'primaryPreferred', 'secondary', 'secondaryPreferred', 'nearest']);

export const RetrySchema = z.object({
  attempts: z.number().int().min(1).default(3),
  backoffMs: z.number().int().nonnegative().default(100)
}).strict();

export const RelationConfigSchema = z.object({
  hosts: z.array(z.string().regex(/^[^\s/:,]+(:\d{1,5})?$/, 'expected host or host:port')).min(1),
  database: z.string().min(1),
  collection: z.string().min(1),
  credentials: z.array(CredentialSchema).default([]),
  tls: TlsSchema.optional(),
  samplingRatio: z.number().gt(0).lte(1).default(DEFAULT_SAMPLING_RATIO),
  splitKey: z.string().min(1).default('_id'),
  splitSizeMb: z.number().int().positive().default(10),
  readPreference: ReadPreferenceEnum.default('nearest'),
  connectTimeoutMs: z.number().int().positive().default(10_000),
  socketTimeoutMs: z.number().int().nonnegative().default(0),
  maxPoolSize: z.number().int().positive().default(10),
  writeBatchSize: z.number().int().positive().default(1000),
  upsertFields: z.array(z.string().min(1)).default(['_id']),
  retry: RetrySchema.default({})
}).strict();
export type RelationConfig = z.infer<typeof RelationConfigSchema>;
export type RelationConfigInput = z.input<typeof RelationConfigSchema>;

export function zodIssues(e: ZodError): ValidationIssue[] {
  return e.issues.map((i) => ({ path: i.path.join('.'), msg: i.message, code: i.code }));
}

/** Validate `schema` and raise our ValidationError instead of a ZodError. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> {
  const res = schema.safeParse(input);
  if (!res.success) throw new ValidationError(`Invalid ${what}`, zodIssues(res.error));
  return res.data;
}

export function parseRelationConfig(input: unknown): RelationConfig {
  return parseWith(RelationConfigSchema, input, 'relation config');
}

// --------------------
// Scan requests (JSON form)
// --------------------
export const RequiredColumnSchema = z.union([
  z.string().min(1),
  z.object({ name: z.string().min(1), index: z.number().int().nonnegative().optional() }).strict()
]);

// JSON has no Date/bigint: {"$date": iso} and {"$long": "123"} carry them
export const FilterLiteralSchema: z.ZodType<FilterLiteral, z.ZodTypeDef, unknown> = z.union([
  z.null(),
  z.boolean(),
  z.number(),
  z.string(),
  z.object({ $date: z.string().datetime({ offset: true }) }).strict().transform((o) => new Date(o.$date)),
  z.object({ $long: z.string().regex(/^-?\d+$/) }).strict().transform((o) => BigInt(o.$long))
]);

export type JsonFilterNode = Exclude<FilterNode, { op: 'predicate' }>;

const FieldPath = z.string().min(1);

export const FilterSchema: z.ZodType<JsonFilterNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ op: z.enum(['eq', 'gt', 'gte', 'lt', 'lte']), field: FieldPath, value: FilterLiteralSchema }).strict(),
    z.object({ op: z.literal('in'), field: FieldPath, values: z.array(FilterLiteralSchema) }).strict(),
    z.object({ op: z.enum(['startsWith', 'endsWith', 'contains']), field: FieldPath, value: z.string() }).strict(),
    z.object({ op: z.enum(['isNull', 'isNotNull']), field: FieldPath }).strict(),
    z.object({ op: z.enum(['and', 'or']), filters: z.array(FilterSchema) }).strict(),
    z.object({ op: z.literal('not'), filter: FilterSchema }).strict()
  ])
);

export const ScanRequestSchema = z.object({
  columns: z.array(RequiredColumnSchema).min(1),
  filters: z.array(FilterSchema).default([]),
  limit: z.number().int().positive().max(100_000).optional()
}).strict();
export type ScanRequest = z.infer<typeof ScanRequestSchema>;

// --------------------
// Schemas (JSON form, as produced by schemaToJson)
// --------------------
const PrimitiveNameEnum = z.enum([
  'null', 'boolean', 'int', 'long', 'double', 'decimal', 'string', 'timestamp', 'objectId', 'binary', 'any'
]);

export const DataTypeSchema: z.ZodType<DataType, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    PrimitiveNameEnum.transform((name): DataType => ({ kind: 'primitive', name })),
    z.object({ array: DataTypeSchema, containsNull: z.boolean().default(true) }).strict()
      .transform((o) => T.array(o.array, o.containsNull)),
    z.object({ struct: z.array(FieldSchema) }).strict().transform((o) => T.record(o.struct))
  ])
);

const FieldSchema: z.ZodType<Field, z.ZodTypeDef, unknown> = z.object({
  name: z.string().min(1),
  type: DataTypeSchema,
  nullable: z.boolean().default(true)
}).strict().transform((f) => field(f.name, f.type, f.nullable));

export const TypedSchemaSchema: z.ZodType<TypedSchema, z.ZodTypeDef, unknown> = z.object({
  fields: z.array(FieldSchema).min(1)
}).strict().superRefine((s, ctx) => {
  const seen = new Set<string>();
  s.fields.forEach((f, i) => {
    if (seen.has(f.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate field name: ${f.name}`, path: ['fields', i, 'name'] });
    }
    seen.add(f.name);
  });
}).transform((s) => schemaOf(s.fields));

export const InsertRequestSchema = z.object({
  rows: z.array(z.array(z.unknown())),
  overwrite: z.boolean().default(false),
  // required when the collection is empty
  schema: TypedSchemaSchema.optional()
}).strict();
export type InsertRequest = z.infer<typeof InsertRequestSchema>;

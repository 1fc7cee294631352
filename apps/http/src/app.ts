// apps/http/src/app.ts
import { randomBytes } from 'node:crypto';
import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import {
  ConnectionError,
  DocbridgeError,
  ErrorCodes,
  InsertRequestSchema,
  PartitioningError,
  ScanRequestSchema,
  SchemaInferenceError,
  TransientIOError,
  ValidationError,
  describeBound,
  formatSchema,
  parseWith,
  schemaToJson,
  zodIssues,
  type RelationConfigInput,
  type Row,
  type TypedSchema,
  type ValidationIssue
} from '@docbridge/core';
import { ConnectionManager, MongoRelation, targetFor } from '@docbridge/mongo';
import { decodeRow, encodeRow } from './cells.js';

export interface AppOptions {
  config: RelationConfigInput;
  /** Supplied schema; inferred from the collection otherwise. */
  schema?: TypedSchema;
  /** Shared manager; the caller closes it. One is created (and closed with the app) when absent. */
  connections?: ConnectionManager;
  logger?: boolean;
  corsOrigins?: string[];
  rateLimitMax?: number;
}

export interface ClassifiedError {
  code: string;
  status: number;
  message: string;
  details?: ValidationIssue[];
}

export function classifyError(e: unknown): ClassifiedError {
  const message = e instanceof Error ? e.message : String(e);
  if (e instanceof ZodError) return { code: 'VALIDATION', status: 400, message, details: zodIssues(e) };
  if (e instanceof ValidationError) return { code: 'VALIDATION', status: 400, message, details: e.issues };
  if (e instanceof SchemaInferenceError) return { code: 'SCHEMA', status: 422, message };
  if (e instanceof ConnectionError) return { code: 'CONNECTION', status: 502, message };
  if (e instanceof PartitioningError) return { code: 'TOPOLOGY', status: 503, message };
  if (e instanceof TransientIOError) return { code: 'TRANSIENT', status: 503, message };
  if (e instanceof DocbridgeError && e.code === ErrorCodes.CONVERSION) return { code: 'CONVERSION', status: 422, message };
  // fastify's own errors (bad JSON, body too large, rate limit) carry a 4xx status
  if (e instanceof Error && 'statusCode' in e && typeof e.statusCode === 'number' && e.statusCode < 500) {
    return { code: 'BAD_REQUEST', status: e.statusCode, message };
  }
  return { code: 'INTERNAL', status: 500, message };
}

function shouldDebug(req: FastifyRequest): boolean {
  return req.headers['x-debug'] === '1' || process.env.DEBUG_ERRORS === '1';
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger ?? false,
    bodyLimit: 1_000_000,
    genReqId: () => `req-${randomBytes(6).toString('hex')}`
  });

  await app.register(cors, {
    origin: (origin, cb) => {
      const allow = opts.corsOrigins ?? [];
      if (!origin || allow.length === 0 || allow.includes(origin)) return cb(null, true);
      cb(new Error('CORS not allowed'), false);
    },
    credentials: true
  });

  await app.register(rateLimit, {
    max: opts.rateLimitMax ?? 600,
    timeWindow: '1 minute'
  });

  const connections = opts.connections ?? new ConnectionManager({ logger: app.log });
  const relation = new MongoRelation({ config: opts.config, schema: opts.schema, connections, logger: app.log });
  const target = targetFor(relation.config);

  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('x-request-id', req.id);
    return payload;
  });

  if (!opts.connections) {
    app.addHook('onClose', async () => {
      await connections.closeAll();
    });
  }

  app.setErrorHandler((err, req, rep) => {
    const { code, status, message, details } = classifyError(err);
    if (status >= 500) req.log.error({ err, requestId: req.id }, 'request-error');
    else req.log.info({ code, requestId: req.id }, 'request-rejected');
    rep.status(status).send({
      code,
      message: 'Request failed',
      error: message,
      requestId: req.id,
      ...(details ? { details } : {}),
      ...(shouldDebug(req) && err instanceof Error ? { trace: { name: err.name, stack: err.stack } } : {})
    });
  });

  app.get('/healthz', async () => ({ ok: true }));

  app.get('/readyz', async (req, reply) => {
    try {
      await connections.using(target, (h) => h.client.ping());
      return { ok: true, mongo: { ok: true }, pool: connections.stats() };
    } catch (e) {
      req.log.warn({ err: String(e) }, 'readiness-check-failed');
      return reply.code(503).send({ ok: false, mongo: { ok: false, error: classifyError(e).code }, pool: connections.stats() });
    }
  });

  app.get('/schema', async () => {
    const schema = await relation.schema();
    return { namespace: relation.namespace, schema: schemaToJson(schema), text: formatSchema(schema) };
  });

  app.get('/partitions', async () => {
    const partitions = await relation.partitions();
    return {
      partitions: partitions.map((p) => ({
        index: p.index,
        key: p.key,
        min: describeBound(p.min),
        max: describeBound(p.max),
        hosts: p.hosts
      }))
    };
  });

  app.post('/scan', async (req) => {
    const body = parseWith(ScanRequestSchema, req.body, 'scan request');
    const t0 = Date.now();
    const scan = await relation.buildScan(body.columns, body.filters, body.limit);
    const rows: unknown[][] = [];
    for await (const row of scan.all()) rows.push(encodeRow(row));
    return {
      columns: scan.schema.fields.map((f) => f.name),
      rows,
      meta: {
        rowCount: rows.length,
        partitions: scan.partitions.length,
        residualFilters: scan.residual.length,
        ms: Date.now() - t0
      }
    };
  });

  app.post('/insert', async (req) => {
    const body = parseWith(InsertRequestSchema, req.body, 'insert request');
    const schema = await relation.writeLayout(body.schema);
    const rows: Row[] = body.rows.map((values, i) => decodeRow(values, schema, i));
    return relation.insert(rows, body.overwrite, schema);
  });

  return app;
}

// apps/http/src/config.ts
// The only place that reads the environment.
import { parseRelationConfig, type RelationConfig } from '@docbridge/core';

export interface ServerConfig {
  port: number;
  corsOrigins: string[];
  relation: RelationConfig;
}

function list(raw: string | undefined): string[] {
  return (raw ?? '').split(',').map((s) => s.trim()).filter(Boolean);
}

function numberOr(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw !== undefined && raw.trim() !== '' && Number.isFinite(n) ? n : fallback;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const user = env.MONGO_USER?.trim();
  const relation = parseRelationConfig({
    hosts: list(env.MONGO_HOSTS ?? '127.0.0.1:27017'),
    database: env.MONGO_DB ?? 'test',
    collection: env.MONGO_COLLECTION ?? '',
    credentials: user
      ? [{ user, password: env.MONGO_PASSWORD ?? '', ...(env.MONGO_AUTH_SOURCE ? { source: env.MONGO_AUTH_SOURCE } : {}) }]
      : [],
    ...(env.MONGO_TLS === '1' || env.MONGO_TLS === 'true'
      ? { tls: { enabled: true, ...(env.MONGO_TLS_CA_FILE ? { caFile: env.MONGO_TLS_CA_FILE } : {}) } }
      : {}),
    ...(env.SAMPLING_RATIO ? { samplingRatio: Number(env.SAMPLING_RATIO) } : {})
  });
  return {
    port: numberOr(env.PORT, 4000),
    corsOrigins: list(env.CORS_ORIGIN),
    relation
  };
}

// apps/http/src/index.ts
import { buildApp } from './app.js';
import { configFromEnv } from './config.js';

async function main() {
  const cfg = configFromEnv();
  const app = await buildApp({ config: cfg.relation, corsOrigins: cfg.corsOrigins, logger: true });

  app.log.info(
    {
      hosts: cfg.relation.hosts,
      ns: `${cfg.relation.database}.${cfg.relation.collection}`,
      auth: cfg.relation.credentials.length ? 'credentials' : 'none',
      tls: cfg.relation.tls?.enabled ?? false,
      samplingRatio: cfg.relation.samplingRatio
    },
    'relation-config'
  );

  const onShutdown = async (signal: string) => {
    app.log.info({ signal }, 'shutting-down');
    try {
      await app.close();
    } finally {
      process.exit(0);
    }
  };
  process.on('SIGINT', () => void onShutdown('SIGINT'));
  process.on('SIGTERM', () => void onShutdown('SIGTERM'));

  await app.listen({ port: cfg.port, host: '0.0.0.0' });
  app.log.info(`HTTP on :${cfg.port}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Fatal boot error', err);
  process.exit(1);
});

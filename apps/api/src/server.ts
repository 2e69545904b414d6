import 'dotenv/config';
import { buildApp } from './app';
import { DEV_JWT_SECRET, loadConfig } from './config';
import { createDatabase } from './db';

async function start() {
  const config = loadConfig();

  // Fail fast if production would sign tokens with the development secret
  if (config.isProd && config.jwtSecret === DEV_JWT_SECRET) {
    console.error('FATAL: JWT_SECRET must be set in production');
    process.exit(1);
  }

  console.log(`[Server] Environment: ${config.env} (IS_PROD=${config.isProd}, IS_DEV=${config.isDev})`);

  const { sqlite, db } = createDatabase(config.databaseUrl);
  console.log(`[Server] Database: ${config.databaseUrl}`);

  const server = await buildApp({ config, db });

  const shutdown = async (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    await server.close();
    sqlite.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await server.listen({ port: config.port, host: config.host });
  console.log(`[Server] Running at http://${config.host}:${config.port}`);
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});

import pg from 'pg';
import { buildServer } from './api/server.js';
import { loadConfig } from './config.js';
import type { ServiceConfig } from './config.js';
import { createLogger } from './logger.js';
import { PostgresTableStore } from './store/table-store.js';

function readConfig(): ServiceConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

const config = readConfig();

const logger = createLogger(config.logLevel);
const store = new PostgresTableStore({
  pool: new pg.Pool({ connectionString: config.databaseUrl, max: config.poolMax }),
  strictSelectors: config.strictSelectors,
  logger,
});

const app = buildServer(store, {
  apiKey: config.apiKey,
  strictSelectors: config.strictSelectors,
  logLevel: config.logLevel,
});

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  await store.close();
  process.exit(1);
}

process.on('SIGTERM', async () => {
  await app.close();
  await store.close();
});

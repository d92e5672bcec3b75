import 'dotenv/config';
import { createApp } from './app';
import { createDatabase } from './config/database';
import { isTesting, loadConfig } from './config/env';
import { ensureSchema } from './db/schema';

async function main(): Promise<void> {
  const config = loadConfig();
  const database = createDatabase(config.databaseUrl, { poolMax: config.poolMax });

  console.log(`[STARTUP] ${config.appName} v${config.appVersion} (${config.environment})`);
  console.log(`[STARTUP] Creating database tables (${database.dialect})...`);
  await ensureSchema(database);
  console.log('[STARTUP] Database tables ready');

  const app = createApp({ config, database, logRequests: !isTesting(config) });
  const server = app.listen(config.port, () => {
    console.log(`[STARTUP] Server running on port ${config.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`[SHUTDOWN] ${signal} received, closing server...`);
    server.close(() => {
      database
        .close()
        .then(() => {
          console.log('[SHUTDOWN] Database closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('[SHUTDOWN] Failed to close database:', error);
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  console.error('[STARTUP] Failed to start:', error);
  process.exit(1);
});

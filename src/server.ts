import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

const loggerInstance = createLogger(env);
setLogger(loggerInstance);

// One handle for the life of the process
const db = new DatabaseAdapter({ path: env.SQLITE_DB_PATH });

const app = createApp(db, env);

const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    shops: env.SHOP_NAMES.length,
  });
});

function shutdown(signal: string): void {
  loggerInstance.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

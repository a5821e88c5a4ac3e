import 'dotenv/config';
import { createApp } from './api/app.js';
import { ConfigError, loadConfig } from './config.js';
import { closeDatabase, createDatabase } from './db/connection.js';
import { runMigrations } from './db/migrations.js';
import { WorkflowEngine } from './domain/engine.js';
import { createLogger, describeError } from './logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL });

  const database = createDatabase(
    config.DATABASE_CLIENT === 'pg'
      ? { client: 'pg', connectionString: config.DATABASE_URL ?? '', poolMax: config.DATABASE_POOL_MAX }
      : { client: 'better-sqlite3', filename: config.SQLITE_FILENAME }
  );
  const applied = await runMigrations(database.knex);
  if (applied.length > 0) {
    logger.info('migrations applied', { versions: applied });
  }

  const engine = new WorkflowEngine(database, { logger });
  const server = createApp(engine, { logger }).listen(config.PORT, () => {
    logger.info('gl-approval-workflow listening', { port: config.PORT, databaseClient: database.client });
  });

  const shutdown = (signal: string): void => {
    logger.info('shutting down', { signal });
    server.close(() => {
      closeDatabase(database).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error('database close failed', { error: describeError(error) });
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    process.stderr.write(`${error.message}\n`);
  } else {
    createLogger().error('startup failed', { error: describeError(error) });
  }
  process.exit(1);
});

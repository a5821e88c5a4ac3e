export { createApp } from './api/app.js';
export { loadConfig, ConfigError, type AppConfig } from './config.js';
export { createDatabase, closeDatabase, type Database, type DatabaseOptions } from './db/connection.js';
export { runMigrations } from './db/migrations.js';
export { WorkflowEngine, type WorkflowEngineOptions } from './domain/engine.js';
export { KnexNotificationDispatcher, type NotificationDispatcher } from './domain/notifications.js';
export {
  AuthorizationError,
  DomainError,
  NotFoundError,
  StateConflictError,
  StorageError,
  ValidationError
} from './domain/errors.js';
export { createLogger, type Logger, type LogEntry } from './logger.js';
export type * from './domain/types.js';

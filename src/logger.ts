/**
 * Structured JSON logger. Every line is one JSON object carrying timestamp,
 * level and message plus whatever context fields the caller attaches.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface LogFields {
  operation?: string;
  documentNumber?: string;
  companyCode?: string;
  workflowId?: number;
  userId?: string;
  error?: {
    code?: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export interface LogEntry extends LogFields {
  timestamp: string;
  level: LogLevel;
  message: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LOG_LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

function writeToStdio(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  if (entry.level === 'error') {
    process.stderr.write(line + '\n');
  } else {
    process.stdout.write(line + '\n');
  }
}

export function createLogger(options?: { level?: LogThreshold; sink?: LogSink; now?: () => Date }): Logger {
  const minLevel = options?.level ?? 'info';
  const sink = options?.sink ?? writeToStdio;

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    sink({
      ...fields,
      timestamp: (options?.now?.() ?? new Date()).toISOString(),
      level,
      message
    });
  };

  return {
    debug: (message, fields) => log('debug', message, fields),
    info: (message, fields) => log('info', message, fields),
    warn: (message, fields) => log('warn', message, fields),
    error: (message, fields) => log('error', message, fields)
  };
}

export function describeError(error: unknown): NonNullable<LogFields['error']> {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { code, message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/**
 * Logging Utility for the workcell simulator
 *
 * Provides structured logging with levels and namespaces.
 * In development, everything from debug upwards goes to the console.
 * With NODE_ENV=production, only warnings and errors are shown.
 * WORKCELL_LOG_LEVEL overrides either default.
 *
 * ## Usage Conventions
 *
 * ### For common namespaces, use pre-created loggers:
 * ```typescript
 * import { loggers } from './logger';
 * loggers.runner.info('Step 1/10 started');
 * ```
 *
 * ### For module-specific logging, create a logger:
 * ```typescript
 * import { createLogger } from './logger';
 * const log = createLogger('MyModule');
 * log.info('Module initialized');
 * ```
 *
 * ### Log Levels:
 * - debug: Detailed debugging info (dev only)
 * - info: General operational info
 * - warn: Potential issues that don't break functionality
 * - error: Errors that affect functionality
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  namespace: string;
  message: string;
  data?: unknown;
  timestamp: Date;
}

export type LogHandler = (entry: LogEntry) => void;

export type Logger = Record<LogLevel, (message: string, data?: unknown) => void>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

function defaultMinLevel(): LogLevel {
  const fromEnv = process.env.WORKCELL_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'production' ? 'warn' : 'debug';
}

// Configuration
const config = {
  enabled: true,
  /** When false, entries only reach registered handlers */
  console: true,
  minLevel: defaultMinLevel(),
  handlers: [] as LogHandler[],
};

function shouldLog(level: LogLevel): boolean {
  return config.enabled && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[config.minLevel];
}

function formatMessage(entry: LogEntry): void {
  if (!shouldLog(entry.level)) return;

  if (config.console) {
    const prefix = `[${entry.namespace}]`;
    const consoleMethod = entry.level === 'error' ? console.error :
                         entry.level === 'warn' ? console.warn :
                         entry.level === 'debug' ? console.debug :
                         console.log;

    if (entry.data !== undefined) {
      consoleMethod(`${prefix} ${entry.message}`, entry.data);
    } else {
      consoleMethod(`${prefix} ${entry.message}`);
    }
  }

  for (const handler of config.handlers) {
    try {
      handler(entry);
    } catch (error) {
      // Handler failures are reported, never rethrown
      console.error(`[Logger] handler failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}

/**
 * Create a logger instance for a specific namespace
 */
export function createLogger(namespace: string): Logger {
  return {
    debug(message: string, data?: unknown) {
      formatMessage({ level: 'debug', namespace, message, data, timestamp: new Date() });
    },
    info(message: string, data?: unknown) {
      formatMessage({ level: 'info', namespace, message, data, timestamp: new Date() });
    },
    warn(message: string, data?: unknown) {
      formatMessage({ level: 'warn', namespace, message, data, timestamp: new Date() });
    },
    error(message: string, data?: unknown) {
      formatMessage({ level: 'error', namespace, message, data, timestamp: new Date() });
    },
  };
}

/**
 * Configure the logger
 */
export function configureLogger(options: {
  enabled?: boolean;
  console?: boolean;
  minLevel?: LogLevel;
}): void {
  if (options.enabled !== undefined) config.enabled = options.enabled;
  if (options.console !== undefined) config.console = options.console;
  if (options.minLevel !== undefined) config.minLevel = options.minLevel;
}

/**
 * Add a custom log handler (e.g., for capturing logs in tests)
 */
export function addLogHandler(handler: LogHandler): () => void {
  config.handlers.push(handler);
  return () => {
    const index = config.handlers.indexOf(handler);
    if (index > -1) config.handlers.splice(index, 1);
  };
}

/**
 * Get current log configuration
 */
export function getLogConfig() {
  return { ...config, handlers: config.handlers.length };
}

// Pre-created loggers for common namespaces
export const loggers = {
  runner: createLogger('ProtocolRunner'),
  store: createLogger('WorkcellStore'),
  cli: createLogger('CLI'),
};

export default createLogger;

import pino from 'pino';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  buildRuntimeConfig,
  LOG_LEVEL_PRIORITY,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'ingestion:gaps') */
  name: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  flush: () => Promise<void>;
}

// Every root pino instance, so shutdown can flush buffered file output
const pinoInstances: Set<pino.Logger> = new Set();

// Singleton runtime config
let runtimeConfig: LogConfig | null = null;

function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

function createPino(name: string, level: LogLevel, config: LogConfig): pino.Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const options: pino.LoggerOptions = {
    name,
    level,
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.logFile) {
    // stdout plus a JSON file; pretty printing is skipped so both carry the same lines
    return pino(
      options,
      pino.multistream([
        { stream: process.stdout, level },
        { stream: pino.destination({ dest: config.logFile, mkdir: true, sync: false }), level },
      ])
    );
  }

  return pino({
    ...options,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

function wrap(instance: pino.Logger): Logger {
  const method = (level: LogLevel): LogMethod => (obj, msg) => {
    if (typeof obj === 'string') {
      instance[level](obj);
    } else {
      instance[level](obj, msg);
    }
  };

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    fatal: method('fatal'),
    child: (bindings) => wrap(instance.child(bindings)),
    flush: () =>
      new Promise<void>((resolve, reject) => {
        instance.flush((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Create a structured logger instance
 *
 * JSON to stdout, pino-pretty in development, optional JSON file via LOG_FILE.
 *
 * @param options - Logger options, or just a name
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions =
    typeof options === 'string' ? { name: options } : options;

  const config = opts.config || getRuntimeConfig();
  const level = opts.level || getLogLevel(opts.name, config);

  const instance = createPino(opts.name, level, config);
  pinoInstances.add(instance);
  return wrap(instance);
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('gapless');

/**
 * Flush all loggers (for graceful shutdown)
 */
export async function flushAllLogs(): Promise<void> {
  await Promise.all(
    [...pinoInstances].map((instance) => wrap(instance).flush())
  );
}

export type { LogLevel, LogConfig };
export { LOG_LEVEL_PRIORITY };

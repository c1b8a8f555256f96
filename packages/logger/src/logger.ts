import path from 'node:path';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv } from './env.schema.ts';

// Validate environment variables (reads NODE_ENV directly from process.env)
const env = validateLoggerEnv(process.env);

export type Logger = pino.Logger;

/**
 * Formats a log label string to be a fixed length. When the label string
 * is longer than the specified size, it is truncated and prefixed by a
 * horizontal ellipsis (…).
 */
export function formatLabel(label: string, size: number): string {
  const str = label.padStart(size);
  return str.length <= size ? str : `…${str.slice(-size + 1)}`;
}

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

interface TransportMode {
  console: boolean;
  file: boolean;
}

// Mutable so the CLI can silence console output in JSON mode
let transportMode: TransportMode = {
  console: env.LOGGER_CONSOLE_ENABLED,
  file: env.LOGGER_FILE_LOG_ENABLED,
};

function isTestEnvironment(): boolean {
  // vitest may set these after module load
  return env.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

function buildTransportTargets(): TransportTarget[] {
  const targets: TransportTarget[] = [];

  if (transportMode.console) {
    if (env.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          destination: 2,
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
          messageFormat: '{categoryLabel} | {msg}',
        },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stdout for log processors
      targets.push({
        level: 'trace',
        options: { destination: 1 },
        target: 'pino/file',
      });
    }
  }

  if (transportMode.file) {
    targets.push({
      level: 'trace',
      options: {
        destination: path.join(env.LOGGER_LOG_DIRNAME, env.LOGGER_FILE_LOG_FILENAME),
        mkdir: true,
      },
      target: 'pino/file',
    });
  }

  return targets;
}

/**
 * Creates and configures the root logger instance.
 */
function createRootLogger(): Logger {
  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      pid: process.pid,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnvironment()) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets();
  if (targets.length === 0) {
    return pino({ ...pinoConfig, enabled: false });
  }

  return pino({ ...pinoConfig, transport: { targets } });
}

function getOrCreateCategoryLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  if (!rootLogger) {
    rootLogger = createRootLogger();
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 20),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Returns a category logger that stays in sync with transport reconfiguration.
 *
 * Modules create their loggers at import time, before the CLI has parsed its
 * flags, so the returned Proxy resolves the current pino child on every access.
 */
export function getLogger(category: string): Logger {
  return new Proxy(getOrCreateCategoryLogger(category), {
    get: (_target, prop) => {
      const logger = getOrCreateCategoryLogger(category);
      const value: unknown = Reflect.get(logger, prop, logger);
      return typeof value === 'function' ? value.bind(logger) : value;
    },
  });
}

/**
 * Update transport mode at runtime. Cached loggers are dropped so the new
 * configuration applies to the next log call.
 */
export function setLoggerTransports(next: Partial<TransportMode>): void {
  transportMode = { ...transportMode, ...next };
  rootLogger?.flush();
  rootLogger = undefined;
  loggerCache.clear();
}

export function getLoggerTransports(): Readonly<TransportMode> {
  return transportMode;
}

/**
 * Flush buffered output. Call before process exit.
 */
export function flushLoggers(): void {
  rootLogger?.flush();
}

import os from 'node:os';
import { Writable } from 'node:stream';

import pino from 'pino';

import { validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';

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
let env: LoggerEnvConfig | undefined;

interface TransportTarget {
  level: string;
  options: Record<string, unknown>;
  target: string;
}

function loggerEnv(): LoggerEnvConfig {
  if (!env) {
    env = validateLoggerEnv(process.env);
  }
  return env;
}

function isTestEnv(config: LoggerEnvConfig): boolean {
  // vitest may set NODE_ENV after the config was first read
  return config.NODE_ENV === 'test' || process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true';
}

/**
 * Builds the transport targets for the current environment. Empty under test
 * so no transport worker threads are spawned.
 */
export function buildTransportTargets(config: LoggerEnvConfig): TransportTarget[] {
  const targets: TransportTarget[] = [];
  if (isTestEnv(config)) return targets;

  if (config.LOGGER_CONSOLE_ENABLED) {
    if (config.NODE_ENV === 'development') {
      targets.push({
        level: 'trace',
        options: {
          ignore: 'pid,hostname,category,categoryLabel,service,environment',
        },
        target: 'pino-pretty',
      });
    } else {
      // Plain JSON on stdout for log processors
      targets.push({
        level: 'trace',
        options: {
          destination: 1,
        },
        target: 'pino/file',
      });
    }
  }

  if (config.LOGGER_FILE_LOG_ENABLED) {
    targets.push({
      level: 'trace',
      options: {
        destination: `./${config.LOGGER_FILE_LOG_DIRNAME}/${config.LOGGER_FILE_LOG_FILENAME}`,
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
function createRootLogger(config: LoggerEnvConfig): Logger {
  const pinoConfig: pino.LoggerOptions = {
    base: {
      environment: config.NODE_ENV,
      hostname: os.hostname(),
      pid: process.pid,
      service: config.LOGGER_SERVICE_NAME,
    },
    level: config.LOGGER_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isTestEnv(config)) {
    const noopStream = new Writable({
      write(_chunk, _encoding, callback) {
        callback();
      },
    });
    return pino(pinoConfig, noopStream);
  }

  const targets = buildTransportTargets(config);
  if (targets.length === 0) {
    // Nothing enabled: keep the library quiet rather than writing to stdout
    return pino({ ...pinoConfig, enabled: false });
  }

  return pino({ ...pinoConfig, transport: { targets } });
}

/**
 * Returns the logger for a category, creating the root logger on first use.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  const config = loggerEnv();
  if (!rootLogger) {
    rootLogger = createRootLogger(config);
  }

  const categoryLogger = rootLogger.child({
    category,
    categoryLabel: formatLabel(category, 25),
  });

  loggerCache.set(category, categoryLogger);
  return categoryLogger;
}

/**
 * Discards the root logger and every category logger so the next
 * `getLogger` call re-reads the environment.
 */
export function resetLoggers(): void {
  rootLogger = undefined;
  env = undefined;
  loggerCache.clear();
}

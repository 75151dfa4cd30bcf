import { afterEach, describe, expect, it } from 'vitest';

import { validateLoggerEnv } from '../env.schema.js';
import { buildTransportTargets, formatLabel, getLogger, resetLoggers } from '../pino-logger.js';

describe('formatLabel', () => {
  it('pads short labels to the requested size', () => {
    expect(formatLabel('core', 8)).toBe('    core');
  });

  it('truncates long labels with a leading ellipsis', () => {
    expect(formatLabel('money-formatter', 8)).toBe('…rmatter');
  });
});

describe('validateLoggerEnv', () => {
  it('applies defaults', () => {
    const config = validateLoggerEnv({});

    expect(config.LOGGER_LOG_LEVEL).toBe('info');
    expect(config.LOGGER_CONSOLE_ENABLED).toBe(false);
    expect(config.LOGGER_FILE_LOG_ENABLED).toBe(false);
    expect(config.LOGGER_FILE_LOG_FILENAME).toBe('moneta.log');
    expect(config.LOGGER_SERVICE_NAME).toBe('moneta');
  });

  it('normalises the level and parses boolean flags', () => {
    const config = validateLoggerEnv({ LOGGER_LOG_LEVEL: ' DEBUG ', LOGGER_CONSOLE_ENABLED: 'true' });

    expect(config.LOGGER_LOG_LEVEL).toBe('debug');
    expect(config.LOGGER_CONSOLE_ENABLED).toBe(true);
  });

  it('rejects unknown levels', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'verbose' })).toThrow('Invalid log level');
  });
});

describe('buildTransportTargets', () => {
  const base = validateLoggerEnv({ NODE_ENV: 'production' });

  it('never builds transports while running under vitest', () => {
    expect(buildTransportTargets({ ...base, LOGGER_CONSOLE_ENABLED: true, LOGGER_FILE_LOG_ENABLED: true })).toEqual(
      []
    );
  });
});

describe('getLogger', () => {
  afterEach(() => {
    resetLoggers();
  });

  it('returns the same logger for a category', () => {
    expect(getLogger('registry')).toBe(getLogger('registry'));
  });

  it('binds the category to the child logger', () => {
    const logger = getLogger('formatter');

    expect(logger.bindings()).toMatchObject({ category: 'formatter' });
  });

  it('creates fresh loggers after a reset', () => {
    const first = getLogger('registry');
    resetLoggers();

    expect(getLogger('registry')).not.toBe(first);
  });
});

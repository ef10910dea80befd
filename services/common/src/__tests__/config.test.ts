import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getConfig, loadConfig, parseBoolean, parseNumber, resetConfigForTesting } from '../config';

const ENV_KEYS = ['SERVICE_NAME', 'LOG_LEVEL', 'ENABLE_REQUEST_LOGGING', 'REQUEST_ID_HEADER'] as const;

describe('config', () => {
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetConfigForTesting();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfigForTesting();
  });

  it('applies defaults when nothing is set', () => {
    const config = loadConfig();

    expect(config.runtime.serviceName).toBe('skillgap-service');
    expect(config.runtime.logLevel).toBe('info');
    expect(config.runtime.enableRequestLogging).toBe(true);
    expect(config.monitoring.requestIdHeader).toBe('X-Request-ID');
  });

  it('reads overrides from the environment', () => {
    process.env.SERVICE_NAME = 'skills-test';
    process.env.LOG_LEVEL = 'DEBUG';
    process.env.ENABLE_REQUEST_LOGGING = 'off';

    const config = loadConfig();

    expect(config.runtime.serviceName).toBe('skills-test');
    expect(config.runtime.logLevel).toBe('debug');
    expect(config.runtime.enableRequestLogging).toBe(false);
  });

  it('falls back to info for unknown log levels', () => {
    process.env.LOG_LEVEL = 'verbose';

    expect(loadConfig().runtime.logLevel).toBe('info');
  });

  it('rejects a blank service name', () => {
    process.env.SERVICE_NAME = '   ';

    expect(() => loadConfig()).toThrow('SERVICE_NAME must not be blank.');
  });

  it('caches the loaded config until reset', () => {
    const first = getConfig();
    process.env.SERVICE_NAME = 'changed';

    expect(getConfig()).toBe(first);

    resetConfigForTesting();
    expect(getConfig().runtime.serviceName).toBe('changed');
  });

  describe('parsers', () => {
    it('parses booleans leniently', () => {
      expect(parseBoolean('YES', false)).toBe(true);
      expect(parseBoolean('0', true)).toBe(false);
      expect(parseBoolean('maybe', true)).toBe(true);
      expect(parseBoolean(undefined, false)).toBe(false);
    });

    it('parses numbers with a default for malformed input', () => {
      expect(parseNumber('12', 5)).toBe(12);
      expect(parseNumber('abc', 5)).toBe(5);
      expect(parseNumber('  ', 5)).toBe(5);
      expect(parseNumber(undefined, 7)).toBe(7);
    });
  });
});

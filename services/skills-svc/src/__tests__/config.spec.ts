import { resetConfigForTesting } from '@skillgap/common';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getSkillsServiceConfig, resetSkillsServiceConfig } from '../config';

const ENV_KEYS = [
  'EMBEDDING_PROVIDER',
  'EMBEDDING_DIMENSIONS',
  'EMBED_SERVICE_URL',
  'EMBED_SERVICE_BEARER_TOKEN',
  'EMBED_SERVICE_RETRIES',
  'OPENAI_API_KEY',
  'RETRIEVAL_DEFAULT_TOP_K',
  'RETRIEVAL_MAX_TOP_K',
  'GAP_RELATED_BONUS',
  'PORT'
] as const;

describe('getSkillsServiceConfig', () => {
  const saved: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetConfigForTesting();
    resetSkillsServiceConfig();
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
    resetSkillsServiceConfig();
  });

  it('applies defaults', () => {
    const config = getSkillsServiceConfig();

    expect(config.port).toBe(8080);
    expect(config.embedding.provider).toBe('local');
    expect(config.embedding.dimensions).toBe(256);
    expect(config.embedding.http).toMatchObject({ baseUrl: 'http://localhost:8081', retries: 2 });
    expect(config.embedding.http.authToken).toBeUndefined();
    expect(config.embedding.openai).toEqual({
      apiKey: undefined,
      model: 'text-embedding-3-small',
      timeoutMs: 20000
    });
    expect(config.retrieval).toEqual({
      defaultTopK: 5,
      maxTopK: 50,
      ingestConcurrency: 8,
      maxInputCharacters: 8000
    });
    expect(config.gap.relatedBonusPerEntry).toBe(0.3);
  });

  it('reads overrides from the environment', () => {
    process.env.EMBEDDING_PROVIDER = ' HTTP ';
    process.env.EMBED_SERVICE_URL = 'http://embed.internal:9000/';
    process.env.EMBED_SERVICE_BEARER_TOKEN = 'test-secret';
    process.env.EMBEDDING_DIMENSIONS = '4';
    process.env.GAP_RELATED_BONUS = '0';
    process.env.PORT = '9090';

    const config = getSkillsServiceConfig();

    expect(config.embedding.provider).toBe('http');
    expect(config.embedding.http.baseUrl).toBe('http://embed.internal:9000');
    expect(config.embedding.http.authToken).toBe('test-secret');
    expect(config.embedding.dimensions).toBe(8);
    expect(config.gap.relatedBonusPerEntry).toBe(0);
    expect(config.port).toBe(9090);
  });

  it('caches until reset', () => {
    const first = getSkillsServiceConfig();
    process.env.PORT = '9191';

    expect(getSkillsServiceConfig()).toBe(first);

    resetSkillsServiceConfig();
    expect(getSkillsServiceConfig().port).toBe(9191);
  });

  it('rejects an unknown embedding provider', () => {
    process.env.EMBEDDING_PROVIDER = 'magic';

    expect(() => getSkillsServiceConfig()).toThrow(
      'EMBEDDING_PROVIDER must be one of local, http, openai, none; received "magic".'
    );
  });

  it('rejects a default topK above the maximum', () => {
    process.env.RETRIEVAL_DEFAULT_TOP_K = '20';
    process.env.RETRIEVAL_MAX_TOP_K = '10';

    expect(() => getSkillsServiceConfig()).toThrow('RETRIEVAL_DEFAULT_TOP_K must not exceed RETRIEVAL_MAX_TOP_K.');
  });

  it('rejects a negative related-coverage bonus', () => {
    process.env.GAP_RELATED_BONUS = '-1';

    expect(() => getSkillsServiceConfig()).toThrow('GAP_RELATED_BONUS must not be negative.');
  });
});

import { getConfig as getBaseConfig, parseBoolean, parseNumber, type ServiceConfig } from '@skillgap/common';

export const EMBEDDING_PROVIDERS = ['local', 'http', 'openai', 'none'] as const;

export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export interface HttpEmbeddingConfig {
  baseUrl: string;
  timeoutMs: number;
  authToken?: string;
  retries: number;
  retryDelayMs: number;
  circuitBreakerFailures: number;
  circuitBreakerCooldownMs: number;
}

export interface OpenAiEmbeddingConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  dimensions: number;
  http: HttpEmbeddingConfig;
  openai: OpenAiEmbeddingConfig;
}

export interface RetrievalConfig {
  defaultTopK: number;
  maxTopK: number;
  ingestConcurrency: number;
  maxInputCharacters: number;
}

export interface GapConfig {
  relatedBonusPerEntry: number;
}

export interface SkillsServiceConfig {
  base: ServiceConfig;
  port: number;
  embedding: EmbeddingConfig;
  retrieval: RetrievalConfig;
  gap: GapConfig;
}

let cachedConfig: SkillsServiceConfig | null = null;

function normalizeUrl(value: string | undefined, fallback: string): string {
  if (!value) {
    return fallback;
  }

  return value.endsWith('/') ? value.slice(0, -1) : value;
}

function resolveProvider(value: string | undefined): EmbeddingProviderName {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) {
    return 'local';
  }

  const provider = EMBEDDING_PROVIDERS.find((candidate) => candidate === normalized);
  if (!provider) {
    throw new Error(`EMBEDDING_PROVIDER must be one of ${EMBEDDING_PROVIDERS.join(', ')}; received "${value}".`);
  }

  return provider;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

function validate(config: SkillsServiceConfig): void {
  if (config.retrieval.defaultTopK > config.retrieval.maxTopK) {
    throw new Error('RETRIEVAL_DEFAULT_TOP_K must not exceed RETRIEVAL_MAX_TOP_K.');
  }

  if (config.gap.relatedBonusPerEntry < 0) {
    throw new Error('GAP_RELATED_BONUS must not be negative.');
  }
}

export function getSkillsServiceConfig(): SkillsServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const embedding: EmbeddingConfig = {
    provider: resolveProvider(process.env.EMBEDDING_PROVIDER),
    dimensions: Math.max(8, parseNumber(process.env.EMBEDDING_DIMENSIONS, 256)),
    http: {
      baseUrl: normalizeUrl(process.env.EMBED_SERVICE_URL, 'http://localhost:8081'),
      timeoutMs: parseNumber(process.env.EMBED_SERVICE_TIMEOUT_MS, 15000),
      authToken: optionalString(process.env.EMBED_SERVICE_BEARER_TOKEN),
      retries: Math.max(0, parseNumber(process.env.EMBED_SERVICE_RETRIES, 2)),
      retryDelayMs: Math.max(0, parseNumber(process.env.EMBED_SERVICE_RETRY_DELAY_MS, 200)),
      circuitBreakerFailures: Math.max(1, parseNumber(process.env.EMBED_CB_FAILURES, 3)),
      circuitBreakerCooldownMs: Math.max(0, parseNumber(process.env.EMBED_CB_COOLDOWN_MS, 30_000))
    },
    openai: {
      apiKey: optionalString(process.env.OPENAI_API_KEY),
      model: process.env.OPENAI_EMBEDDING_MODEL ?? 'text-embedding-3-small',
      timeoutMs: parseNumber(process.env.OPENAI_TIMEOUT_MS, 20000)
    }
  };

  const retrieval: RetrievalConfig = {
    defaultTopK: Math.max(1, parseNumber(process.env.RETRIEVAL_DEFAULT_TOP_K, 5)),
    maxTopK: Math.max(1, parseNumber(process.env.RETRIEVAL_MAX_TOP_K, 50)),
    ingestConcurrency: Math.max(1, parseNumber(process.env.RETRIEVAL_INGEST_CONCURRENCY, 8)),
    maxInputCharacters: Math.max(1, parseNumber(process.env.EMBEDDING_MAX_INPUT_CHARS, 8000))
  };

  const gap: GapConfig = {
    relatedBonusPerEntry: parseNumber(process.env.GAP_RELATED_BONUS, 0.3)
  };

  const config: SkillsServiceConfig = {
    base,
    port: parseNumber(process.env.PORT, 8080),
    embedding,
    retrieval,
    gap
  };

  validate(config);
  cachedConfig = config;

  return cachedConfig;
}

export function resetSkillsServiceConfig(): void {
  cachedConfig = null;
}

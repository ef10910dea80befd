import { getLogger } from '@skillgap/common';
import type { Logger } from 'pino';

import type { EmbeddingConfig } from '../config';
import type { Embedder } from '../types';
import { HttpEmbeddingClient } from './http-embedding-client';
import { LocalDeterministicEmbedder, UnavailableEmbedder } from './local-embedder';
import { OpenAiEmbedder } from './openai-embedder';

export { HttpEmbeddingClient } from './http-embedding-client';
export { LocalDeterministicEmbedder, UnavailableEmbedder } from './local-embedder';
export { OpenAiEmbedder, type EmbeddingsApi } from './openai-embedder';

/**
 * Builds the configured provider. A misconfigured provider degrades to one
 * that never yields vectors, so retrieval falls back to non-semantic context.
 */
export function createEmbedder(config: EmbeddingConfig, logger: Logger = getLogger({ module: 'embedder' })): Embedder {
  switch (config.provider) {
    case 'local':
      return new LocalDeterministicEmbedder(config.dimensions);
    case 'http':
      return new HttpEmbeddingClient(config.http, { logger });
    case 'openai': {
      const { apiKey } = config.openai;
      if (!apiKey) {
        logger.warn('OPENAI_API_KEY is not set; semantic retrieval is disabled.');
        return new UnavailableEmbedder();
      }
      return new OpenAiEmbedder({ ...config.openai, apiKey }, { logger });
    }
    case 'none':
      return new UnavailableEmbedder();
  }
}

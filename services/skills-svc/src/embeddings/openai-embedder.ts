import { getLogger } from '@skillgap/common';
import OpenAI from 'openai';
import type { Logger } from 'pino';

import type { OpenAiEmbeddingConfig } from '../config';
import type { Embedder } from '../types';
import { isFiniteVector } from '../retrieval/vector-utils';

/** The slice of the OpenAI client this embedder calls. */
export interface EmbeddingsApi {
  create(params: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>;
}

export class OpenAiEmbedder implements Embedder {
  readonly name = 'openai';
  private readonly embeddings: EmbeddingsApi;
  private readonly logger: Logger;

  constructor(
    private readonly config: OpenAiEmbeddingConfig & { apiKey: string },
    options: { logger?: Logger; embeddings?: EmbeddingsApi } = {}
  ) {
    this.logger = options.logger ?? getLogger({ module: 'openai-embedder' });
    this.embeddings =
      options.embeddings ?? new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs }).embeddings;
  }

  async embed(text: string): Promise<number[] | null> {
    try {
      const response = await this.embeddings.create({ model: this.config.model, input: text });
      const vector = response.data[0]?.embedding;
      if (!vector || !isFiniteVector(vector)) {
        this.logger.warn({ model: this.config.model }, 'OpenAI returned no usable embedding.');
        return null;
      }
      return vector;
    } catch (error) {
      this.logger.warn({ error, model: this.config.model }, 'OpenAI embedding request failed.');
      return null;
    }
  }
}

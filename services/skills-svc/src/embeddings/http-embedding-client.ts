import { CircuitBreaker, getLogger, withRetry } from '@skillgap/common';
import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';

import type { HttpEmbeddingConfig } from '../config';
import type { Embedder } from '../types';
import { isFiniteVector } from '../retrieval/vector-utils';

function parseEmbedding(data: unknown): number[] {
  if (!data || typeof data !== 'object') {
    throw new Error('Embedding service returned a non-object payload.');
  }

  const embedding = 'embedding' in data ? data.embedding : undefined;
  if (!Array.isArray(embedding)) {
    throw new Error('Embedding service response did not include an embedding vector.');
  }

  const vector = embedding.filter((value): value is number => typeof value === 'number');
  if (vector.length !== embedding.length || !isFiniteVector(vector)) {
    throw new Error('Embedding service returned an empty or non-numeric embedding.');
  }

  return vector;
}

/**
 * Calls a remote embedding service (`POST /v1/embeddings/generate`).
 * Failures, timeouts and an open circuit all resolve to null.
 */
export class HttpEmbeddingClient implements Embedder {
  readonly name = 'http';
  private readonly http: AxiosInstance;
  private readonly breaker: CircuitBreaker;
  private readonly logger: Logger;

  constructor(
    private readonly config: HttpEmbeddingConfig,
    options: { logger?: Logger; http?: AxiosInstance } = {}
  ) {
    this.logger = options.logger ?? getLogger({ module: 'http-embedding-client' });
    this.http =
      options.http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: {
          'Content-Type': 'application/json'
        }
      });
    this.breaker = new CircuitBreaker({
      failureThreshold: config.circuitBreakerFailures,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });
  }

  async embed(text: string): Promise<number[] | null> {
    const headers: Record<string, string> = {};
    if (this.config.authToken) {
      headers.Authorization = `Bearer ${this.config.authToken}`;
    }

    try {
      return await this.breaker.exec(() =>
        withRetry(
          async () => {
            const response = await this.http.post('/v1/embeddings/generate', { text }, { headers });
            return parseEmbedding(response.data);
          },
          { retries: this.config.retries, minTimeoutMs: this.config.retryDelayMs }
        )
      );
    } catch (error) {
      this.logger.warn(
        { error, circuit: this.breaker.getState(), characters: text.length },
        'Embedding request failed; continuing without a vector.'
      );
      return null;
    }
  }
}

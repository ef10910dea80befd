/**
 * Knowledge Retriever
 *
 * Flat in-memory similarity index over rendered skill, career path and resume tip
 * documents. Documents and embeddings are parallel sequences: index i of one always
 * belongs to index i of the other. The index is filled once by initialize() and is
 * read-only afterwards.
 *
 * search() initializes on demand, so callers never see an empty result just because
 * nobody called initialize() first.
 */

import { getLogger } from '@skillgap/common';
import type { Logger } from 'pino';

import type { OntologyStore } from '../ontology/ontology-store';
import type {
  CareerPath,
  Embedder,
  KnowledgeDocument,
  KnowledgeDocumentType,
  ResumeTip,
  RetrievalResult
} from '../types';
import { buildKnowledgeDocuments } from './knowledge-base';
import { cosineSimilarity, isFiniteVector } from './vector-utils';

export interface KnowledgeRetrieverDeps {
  store: OntologyStore;
  careerPaths: readonly CareerPath[];
  resumeTips: readonly ResumeTip[];
  embedder: Embedder;
  logger?: Logger;
}

export interface KnowledgeRetrieverOptions {
  defaultTopK?: number;
  maxTopK?: number;
  /** Embedding requests issued at once during ingestion. */
  ingestConcurrency?: number;
  /** Text longer than this is truncated before it reaches the provider. */
  maxInputCharacters?: number;
}

interface IngestionSummary {
  documents: number;
  indexed: number;
  failed: number;
  dimensionMismatches: number;
}

export class KnowledgeRetriever {
  private documentList: readonly KnowledgeDocument[] = [];
  private embeddings: readonly (readonly number[])[] = [];
  private dimensions: number | null = null;
  private initialized = false;
  private initPromise: Promise<void> | null = null;

  private readonly logger: Logger;
  private readonly defaultTopK: number;
  private readonly maxTopK: number;
  private readonly ingestConcurrency: number;
  private readonly maxInputCharacters: number;

  constructor(
    private readonly deps: KnowledgeRetrieverDeps,
    options: KnowledgeRetrieverOptions = {}
  ) {
    this.logger = (deps.logger ?? getLogger()).child({ module: 'knowledge-retriever' });
    this.defaultTopK = options.defaultTopK ?? 5;
    this.maxTopK = options.maxTopK ?? 50;
    this.ingestConcurrency = Math.max(1, options.ingestConcurrency ?? 8);
    this.maxInputCharacters = options.maxInputCharacters ?? 8000;
  }

  /**
   * Embed and index every document. The first caller does the work; concurrent
   * callers share its promise and later calls return immediately.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (!this.initPromise) {
      this.initPromise = this.doInitialize().catch((error: unknown) => {
        this.initPromise = null;
        throw error;
      });
    }

    return this.initPromise;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  size(): number {
    return this.documentList.length;
  }

  documents(): readonly KnowledgeDocument[] {
    return this.documentList;
  }

  /**
   * Most similar documents first; equal scores keep ingestion order.
   * Resolves to an empty list when the query cannot be embedded.
   */
  async search(query: string, topK: number = this.defaultTopK, typeFilter?: KnowledgeDocumentType): Promise<RetrievalResult[]> {
    await this.initialize();

    const limit = Math.min(Math.floor(topK), this.maxTopK);
    if (!(limit > 0) || this.documentList.length === 0) {
      return [];
    }

    const queryEmbedding = await this.embedSafely(query);
    if (!queryEmbedding) {
      this.logger.debug({ typeFilter }, 'Query embedding unavailable; returning no semantic results');
      return [];
    }

    if (queryEmbedding.length !== this.dimensions) {
      this.logger.warn(
        { expected: this.dimensions, received: queryEmbedding.length },
        'Query embedding dimensionality does not match the index'
      );
      return [];
    }

    const scored: Array<RetrievalResult & { position: number }> = [];
    this.documentList.forEach((document, position) => {
      if (typeFilter && document.type !== typeFilter) {
        return;
      }
      scored.push({ document, score: cosineSimilarity(queryEmbedding, this.embeddings[position]), position });
    });

    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    return scored.slice(0, limit).map(({ document, score }) => ({ document, score }));
  }

  private async doInitialize(): Promise<void> {
    this.logger.info('Initializing knowledge index...');
    const start = Date.now();

    const candidates = buildKnowledgeDocuments(this.deps.store, this.deps.careerPaths, this.deps.resumeTips);
    const documents: KnowledgeDocument[] = [];
    const embeddings: number[][] = [];
    let dimensions: number | null = null;
    const summary: IngestionSummary = { documents: candidates.length, indexed: 0, failed: 0, dimensionMismatches: 0 };

    for (let offset = 0; offset < candidates.length; offset += this.ingestConcurrency) {
      const batch = candidates.slice(offset, offset + this.ingestConcurrency);
      const vectors = await Promise.all(batch.map((document) => this.embedSafely(document.content)));

      batch.forEach((document, index) => {
        const vector = vectors[index];
        if (!vector) {
          summary.failed += 1;
          this.logger.debug({ documentId: document.id }, 'Skipping document without embedding');
          return;
        }

        dimensions ??= vector.length;
        if (vector.length !== dimensions) {
          summary.dimensionMismatches += 1;
          this.logger.debug(
            { documentId: document.id, expected: dimensions, received: vector.length },
            'Skipping document with mismatched embedding dimensions'
          );
          return;
        }

        documents.push(Object.freeze(document));
        embeddings.push(vector);
        summary.indexed += 1;
      });
    }

    this.documentList = Object.freeze(documents);
    this.embeddings = Object.freeze(embeddings);
    this.dimensions = dimensions;
    this.initialized = true;

    this.logger.info(
      { ...summary, embedder: this.deps.embedder.name, durationMs: Date.now() - start },
      'Knowledge index initialization complete'
    );
  }

  private async embedSafely(text: string): Promise<number[] | null> {
    try {
      const vector = await this.deps.embedder.embed(text.slice(0, this.maxInputCharacters));
      return vector && isFiniteVector(vector) ? vector : null;
    } catch (error) {
      this.logger.warn({ error, embedder: this.deps.embedder.name }, 'Embedding provider failed');
      return null;
    }
  }
}

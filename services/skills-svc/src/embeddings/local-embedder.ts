import type { Embedder } from '../types';
import { l2Normalize } from '../retrieval/vector-utils';

const TOKEN_PATTERN = /[\p{L}\p{N}][\p{L}\p{N}+#.]*/gu;

function hashToken(token: string): number {
  let hash = 0;
  for (let i = 0; i < token.length; i += 1) {
    hash = (hash << 5) - hash + token.charCodeAt(i);
    hash |= 0;
  }
  return hash;
}

/**
 * Offline embedder: hashed bag of words projected onto a fixed number of buckets.
 * Texts sharing words land close together; identical texts give identical vectors.
 */
export class LocalDeterministicEmbedder implements Embedder {
  readonly name = 'local';
  readonly dimensions: number;

  constructor(dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new Error(`Embedding dimensions must be a positive integer; received ${dimensions}.`);
    }
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[] | null> {
    const tokens = text.toLowerCase().match(TOKEN_PATTERN);
    if (!tokens) {
      return null;
    }

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokens) {
      const hash = hashToken(token.replace(/\.+$/, ''));
      const bucket = Math.abs(hash) % this.dimensions;
      vector[bucket] += (hash & 1) === 0 ? 1 : -1;
    }

    return l2Normalize(vector);
  }
}

/** Stand-in used when no provider is configured. */
export class UnavailableEmbedder implements Embedder {
  readonly name = 'none';

  async embed(): Promise<number[] | null> {
    return null;
  }
}

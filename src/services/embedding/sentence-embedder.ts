/**
 * SentenceEmbeddingClient - sentence embeddings from the Python worker
 *
 * Used by the semantic chunker to score sentence similarity. Vectors are
 * returned in input order; a response with mixed dimensions is rejected.
 *
 * @module services/embedding/sentence-embedder
 */

import { z } from 'zod';
import type { PythonWorkerSession } from '../capabilities/worker-session.js';
import type { EmbeddingModel } from '../../models/capability.js';

export type EmbeddingErrorCode = 'EMBEDDING_FAILED' | 'DIMENSION_MISMATCH' | 'COUNT_MISMATCH';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EmbeddingError';
    Error.captureStackTrace?.(this, EmbeddingError);
  }
}

const EmbedResultSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  dimensions: z.number().int().nonnegative(),
});

/**
 * Validate that every vector has the same dimension and the count matches
 *
 * @throws EmbeddingError on mismatch
 */
export function assertConsistentEmbeddings(vectors: ArrayLike<number>[], expectedCount: number): void {
  if (vectors.length !== expectedCount) {
    throw new EmbeddingError(
      `Embedding count mismatch: got ${vectors.length}, expected ${expectedCount}`,
      'COUNT_MISMATCH',
      { actual: vectors.length, expected: expectedCount }
    );
  }
  if (vectors.length === 0) return;

  const dim = vectors[0].length;
  for (let i = 1; i < vectors.length; i++) {
    if (vectors[i].length !== dim) {
      throw new EmbeddingError(
        `Embedding ${i} has wrong dimensions: ${vectors[i].length}, expected ${dim}`,
        'DIMENSION_MISMATCH',
        { index: i, actualDim: vectors[i].length }
      );
    }
  }
}

export class SentenceEmbeddingClient implements EmbeddingModel {
  /**
   * Maximum sentences per worker call. Long contracts split into thousands
   * of sentences; one giant request exhausts GPU memory during tokenization.
   */
  private static readonly MAX_SENTENCES_PER_CALL = 100;

  constructor(
    private readonly session: PythonWorkerSession,
    readonly modelName: string
  ) {}

  async embed(sentences: string[]): Promise<Float32Array[]> {
    if (sentences.length === 0) {
      return [];
    }

    const maxPerCall = SentenceEmbeddingClient.MAX_SENTENCES_PER_CALL;
    const totalBatches = Math.ceil(sentences.length / maxPerCall);
    const all: Float32Array[] = [];

    for (let i = 0; i < sentences.length; i += maxPerCall) {
      const batch = sentences.slice(i, i + maxPerCall);
      if (totalBatches > 1) {
        const batchNum = Math.floor(i / maxPerCall) + 1;
        console.error(`[EMBED] Processing batch ${batchNum}/${totalBatches} (${batch.length} sentences)`);
      }

      const result = await this.session.request('embed', { sentences: batch }, EmbedResultSchema);
      assertConsistentEmbeddings(result.embeddings, batch.length);
      all.push(...result.embeddings.map((e) => new Float32Array(e)));
    }

    assertConsistentEmbeddings(all, sentences.length);
    return all;
  }

  close(): Promise<void> {
    return this.session.close();
  }
}

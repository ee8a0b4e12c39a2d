/**
 * Embedding Service Module
 *
 * @module services/embedding
 */

export { SentenceEmbeddingClient, EmbeddingError, assertConsistentEmbeddings } from './sentence-embedder.js';
export type { EmbeddingErrorCode } from './sentence-embedder.js';

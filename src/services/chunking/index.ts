/**
 * Chunking Service Module Exports
 *
 * @module services/chunking
 */

export { chunkText } from './chunker.js';
export { SemanticChunker, splitSentences, groupSentences } from './semantic-chunker.js';
export { cosineSimilarity, centroid } from './similarity.js';

export type { ChunkRecord, ChunkingConfig, TextWindow } from '../../models/chunk.js';
export { DEFAULT_CHUNKING_CONFIG, getStepSize } from '../../models/chunk.js';

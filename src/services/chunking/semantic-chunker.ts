/**
 * Semantic Chunker
 *
 * Groups consecutive sentences whose embeddings stay close to the running
 * chunk's centroid. Falls back to fixed windows for the whole document when
 * the embedding capability is unavailable, or when embedding or grouping fails.
 *
 * @module services/chunking/semantic-chunker
 */

import type { CapabilitySource } from '../../models/capability.js';
import {
  ChunkingConfigSchema,
  DEFAULT_CHUNKING_CONFIG,
  mergeChunkingConfig,
  type ChunkingConfig,
  type ChunkRecord,
} from '../../models/chunk.js';
import type { DocumentRecord, MetadataValue } from '../../models/document.js';
import { validateInput } from '../../utils/validation.js';
import { assertConsistentEmbeddings } from '../embedding/sentence-embedder.js';
import { chunkText } from './chunker.js';
import { centroid, cosineSimilarity } from './similarity.js';

/** Runs of non-delimiters followed by their terminal punctuation (or text end) */
const SENTENCE_PATTERN = /[^.!?]+(?:[.!?]+|$)/g;

/**
 * Split text into trimmed sentences, terminal punctuation kept
 */
export function splitSentences(text: string): string[] {
  const matches = text.match(SENTENCE_PATTERN) ?? [];
  return matches.map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Greedy grouping against the running centroid
 *
 * A sentence starts a new chunk when its cosine similarity to the current
 * chunk's centroid is below `threshold`, or when appending it (with one
 * space) would push the chunk past `maxChunkSize`.
 */
export function groupSentences(
  sentences: string[],
  vectors: ArrayLike<number>[],
  threshold: number,
  maxChunkSize: number
): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentVectors: ArrayLike<number>[] = [];
  let currentLength = 0;

  for (let i = 0; i < sentences.length; i++) {
    const sentence = sentences[i];
    const vector = vectors[i];

    if (current.length === 0) {
      current = [sentence];
      currentVectors = [vector];
      currentLength = sentence.length;
      continue;
    }

    const similarity = cosineSimilarity(vector, centroid(currentVectors));
    const wouldExceed = currentLength + 1 + sentence.length > maxChunkSize;

    if (similarity < threshold || wouldExceed) {
      chunks.push(current.join(' '));
      current = [sentence];
      currentVectors = [vector];
      currentLength = sentence.length;
    } else {
      current.push(sentence);
      currentVectors.push(vector);
      currentLength += 1 + sentence.length;
    }
  }

  if (current.length > 0) {
    chunks.push(current.join(' '));
  }
  return chunks;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SemanticChunker {
  constructor(private readonly capabilities: CapabilitySource) {}

  /**
   * Chunk one document
   *
   * @throws ValidationError when the configuration is out of range
   */
  async chunk(document: DocumentRecord, config: Partial<ChunkingConfig> = {}): Promise<ChunkRecord[]> {
    const settings = validateInput(ChunkingConfigSchema, mergeChunkingConfig(DEFAULT_CHUNKING_CONFIG, config));
    const text = document.raw_content;

    if (text.trim().length === 0) {
      return [];
    }

    const sentences = splitSentences(text);
    if (sentences.length < 2) {
      return [this.record(document, text, 0, 1, { chunking_method: 'semantic', similarity_threshold: settings.similarity_threshold })];
    }

    const embedding = this.capabilities.get('embedding');
    if (!embedding) {
      const status = this.capabilities.snapshot().capabilities.embedding;
      const reason = status.state === 'unavailable' ? status.reason : 'embedding handle missing';
      return this.fixedWindow(document, settings, `embedding unavailable: ${reason}`);
    }

    let vectors: Float32Array[];
    try {
      vectors = await embedding.embed(sentences);
      assertConsistentEmbeddings(vectors, sentences.length);
    } catch (error) {
      console.error(`[WARN] Embedding failed for ${document.source_locator}, using fixed-window chunking: ${describe(error)}`);
      return this.fixedWindow(document, settings, `embedding failed: ${describe(error)}`);
    }

    let grouped: string[];
    try {
      grouped = groupSentences(sentences, vectors, settings.similarity_threshold, settings.max_chunk_size);
    } catch (error) {
      console.error(`[WARN] Sentence grouping failed for ${document.source_locator}, using fixed-window chunking: ${describe(error)}`);
      return this.fixedWindow(document, settings, `sentence grouping failed: ${describe(error)}`);
    }
    const surviving = grouped.filter((c) => c.trim().length >= settings.min_chunk_size);

    if (surviving.length < grouped.length) {
      console.error(
        `[INFO] Dropped ${grouped.length - surviving.length} chunk(s) shorter than ${settings.min_chunk_size} chars from ${document.source_locator}`
      );
    }

    return surviving.map((content, i) =>
      this.record(document, content, i, surviving.length, {
        chunking_method: 'semantic',
        similarity_threshold: settings.similarity_threshold,
      })
    );
  }

  private fixedWindow(document: DocumentRecord, config: ChunkingConfig, reason: string): ChunkRecord[] {
    const windows = chunkText(document.raw_content, config);
    return windows.map((window) =>
      this.record(document, window.text, window.index, windows.length, {
        chunking_method: 'fixed-window',
        character_start: window.startOffset,
        character_end: window.endOffset,
        fallback_reason: reason,
      })
    );
  }

  private record(
    document: DocumentRecord,
    content: string,
    index: number,
    total: number,
    extra: Record<string, MetadataValue>
  ): ChunkRecord {
    return {
      content,
      metadata: {
        ...document.metadata,
        source: document.source_locator,
        chunk_index: index,
        total_chunks: total,
        ...extra,
      },
    };
  }
}

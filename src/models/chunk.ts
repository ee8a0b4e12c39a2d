/**
 * Chunk model and chunking configuration
 *
 * @module models/chunk
 */

import { z } from 'zod';
import type { MetadataValue } from './document.js';

export type ChunkingMethod = 'semantic' | 'fixed-window';

export interface ChunkRecord {
  content: string;
  /**
   * chunk_index, chunking_method and total_chunks, plus the parent
   * document's metadata
   */
  metadata: Record<string, MetadataValue>;
}

/**
 * Chunking configuration schema (snake_case keys match the tool inputs)
 */
export const ChunkingConfigSchema = z
  .object({
    similarity_threshold: z.number().min(-1).max(1).default(0.75),
    min_chunk_size: z.number().int().min(0).default(200),
    max_chunk_size: z.number().int().min(1).default(1000),
    chunk_overlap: z.number().int().min(0).default(100),
  })
  .refine((c) => c.chunk_overlap < c.max_chunk_size, {
    message: 'chunk_overlap must be smaller than max_chunk_size',
    path: ['chunk_overlap'],
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  similarity_threshold: 0.75,
  min_chunk_size: 200,
  max_chunk_size: 1000,
  chunk_overlap: 100,
};

/**
 * Fixed window produced by the character splitter
 */
export interface TextWindow {
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  overlapWithPrevious: number;
  overlapWithNext: number;
}

/**
 * Step between window starts
 */
export function getStepSize(config: Pick<ChunkingConfig, 'max_chunk_size' | 'chunk_overlap'>): number {
  return config.max_chunk_size - config.chunk_overlap;
}

const CHUNKING_KEYS = ['similarity_threshold', 'min_chunk_size', 'max_chunk_size', 'chunk_overlap'] as const;

/**
 * Overlay the keys of `overrides` that are set; undefined keeps the base value
 */
export function mergeChunkingConfig(base: ChunkingConfig, overrides: Partial<ChunkingConfig>): ChunkingConfig {
  const merged: ChunkingConfig = { ...base };
  for (const key of CHUNKING_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

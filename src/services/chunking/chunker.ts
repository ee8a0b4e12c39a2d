/**
 * Fixed-window text chunking
 *
 * Splits text into windows of max_chunk_size characters, each starting
 * max_chunk_size - chunk_overlap characters after the previous one. The last
 * window ends at the end of the text. Used when semantic chunking cannot run.
 *
 * @module services/chunking/chunker
 */

import {
  DEFAULT_CHUNKING_CONFIG,
  getStepSize,
  type ChunkingConfig,
  type TextWindow,
} from '../../models/chunk.js';

/**
 * Chunk text into fixed-size windows with overlap
 *
 * Algorithm:
 * 1. Step size is max_chunk_size - chunk_overlap
 * 2. Take max_chunk_size characters from the current offset
 * 3. Stop once a window reaches the end of the text
 *
 * @example
 * const windows = chunkText('...2500 char text...', { ...DEFAULT_CHUNKING_CONFIG, max_chunk_size: 1000, chunk_overlap: 100 });
 * // Windows start at 0, 900, 1800; the last ends at 2500
 */
export function chunkText(
  text: string,
  config: Pick<ChunkingConfig, 'max_chunk_size' | 'chunk_overlap'> = DEFAULT_CHUNKING_CONFIG
): TextWindow[] {
  if (text.length === 0) {
    return [];
  }

  const overlapSize = config.chunk_overlap;
  const stepSize = getStepSize(config);
  const windows: TextWindow[] = [];
  let startOffset = 0;
  let index = 0;

  while (startOffset < text.length) {
    const endOffset = Math.min(startOffset + config.max_chunk_size, text.length);

    windows.push({
      index,
      text: text.slice(startOffset, endOffset),
      startOffset,
      endOffset,
      overlapWithPrevious: index === 0 ? 0 : overlapSize,
      overlapWithNext: 0, // Set after loop
    });

    // A window that reaches the end closes the sequence; no overlap-only tail
    if (endOffset >= text.length) {
      break;
    }

    startOffset += stepSize;
    index++;
  }

  for (let i = 0; i < windows.length - 1; i++) {
    windows[i].overlapWithNext = overlapSize;
  }

  return windows;
}

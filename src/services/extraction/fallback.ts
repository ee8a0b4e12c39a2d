/**
 * Generic fallback
 *
 * Last rung of every extraction ladder: read the file as UTF-8 with
 * replacement characters. If even that fails, produce a record describing the
 * failure. Never throws.
 *
 * @module services/extraction/fallback
 */

import * as path from 'path';
import type { DocumentMetadata, DocumentRecord, ExtractionInput } from '../../models/document.js';
import { readFileTextLenient, tryFileSize } from '../../utils/files.js';

/**
 * Metadata every record carries regardless of the strategy that produced it
 */
export async function baseMetadata(input: ExtractionInput): Promise<DocumentMetadata> {
  const metadata: DocumentMetadata = {
    file_type: input.format,
    processed_at: new Date().toISOString(),
  };
  const size = await tryFileSize(input.filePath);
  if (size !== null) {
    metadata.file_size = size;
  }
  return metadata;
}

export async function genericFallback(input: ExtractionInput, reason: string): Promise<DocumentRecord> {
  const base = await baseMetadata(input);
  try {
    const content = await readFileTextLenient(input.filePath);
    console.error(`[WARN] Generic fallback used for ${input.filePath}: ${reason}`);
    return {
      raw_content: content,
      source_locator: input.filePath,
      enhanced: false,
      metadata: { ...base, processing_method: 'fallback', reason },
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[ERROR] Fallback processing failed for ${input.filePath}: ${message}`);
    return {
      raw_content: `Could not process ${path.basename(input.filePath)}: ${reason}`,
      source_locator: input.filePath,
      enhanced: false,
      metadata: { ...base, processing_method: 'error', reason, error: message },
    };
  }
}

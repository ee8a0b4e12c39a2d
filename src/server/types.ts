/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results and the shapes tools report.
 *
 * @module server/types
 */

import type { BatchResult, ErrorRecord } from '../models/batch.js';
import type { ChunkRecord } from '../models/chunk.js';
import type { DocumentMetadata, DocumentRecord } from '../models/document.js';
import type { ErrorCategory } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error structure for failed tool operations
 */
export interface ToolError {
  category: ErrorCategory;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Successful tool result
 */
export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/**
 * Failed tool result
 */
export interface ToolResultFailure {
  success: false;
  error: ToolError;
}

/**
 * Union type for all tool results
 */
export type ToolResult<T = unknown> = ToolResultSuccess<T> | ToolResultFailure;

/**
 * Helper to create success result
 */
export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A DocumentRecord as reported by tools; raw_content is replaced by its
 * length when the caller asked for metadata only
 */
export interface DocumentSummary {
  source_locator: string;
  enhanced: boolean;
  content_length: number;
  raw_content?: string;
  metadata: DocumentMetadata;
}

export type BatchItemSummary =
  | { index: number; success: true; document: DocumentSummary }
  | { index: number; success: false; error: ErrorRecord };

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  enhanced: number;
  items: BatchItemSummary[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKING RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

export interface ChunkResult {
  source_locator: string;
  chunk_count: number;
  chunks: ChunkRecord[];
}

export interface ProcessResult {
  document: DocumentSummary;
  chunk_count: number | null;
  chunks: ChunkRecord[] | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SUMMARY HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function summarizeDocument(record: DocumentRecord, includeContent: boolean): DocumentSummary {
  const summary: DocumentSummary = {
    source_locator: record.source_locator,
    enhanced: record.enhanced,
    content_length: record.raw_content.length,
    metadata: record.metadata,
  };
  if (includeContent) {
    summary.raw_content = record.raw_content;
  }
  return summary;
}

export function summarizeBatch(result: BatchResult<DocumentRecord>, includeContent: boolean): BatchSummary {
  const items = result.map((slot, index): BatchItemSummary =>
    slot.success
      ? { index, success: true, document: summarizeDocument(slot.value, includeContent) }
      : { index, success: false, error: slot.error }
  );
  const succeeded = items.filter((item) => item.success).length;
  return {
    total: result.length,
    succeeded,
    failed: result.length - succeeded,
    enhanced: result.filter((slot) => slot.success && slot.value.enhanced).length,
    items,
  };
}

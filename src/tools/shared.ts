/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import type { ChunkingConfig } from '../models/chunk.js';
import { MCPError, formatErrorResponse } from '../server/errors.js';
import type { ChunkingOverrides } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }> };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format tool result as MCP content response
 */
export function formatResponse(result: unknown): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
  };
}

/**
 * Handle errors uniformly - FAIL FAST
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return formatResponse(formatErrorResponse(mcpError));
}

/**
 * Chunking keys of a validated tool input
 */
export function pickChunkingOverrides(input: ChunkingOverrides): Partial<ChunkingConfig> {
  return {
    similarity_threshold: input.similarity_threshold,
    min_chunk_size: input.min_chunk_size,
    max_chunk_size: input.max_chunk_size,
    chunk_overlap: input.chunk_overlap,
  };
}

/**
 * Raw zod shapes of the chunking overrides, shared by the chunking tools'
 * MCP input schemas
 */
export const chunkingInputSchema = {
  similarity_threshold: z
    .number()
    .min(-1)
    .max(1)
    .optional()
    .describe('Cosine similarity below which a sentence starts a new chunk'),
  min_chunk_size: z.number().int().min(0).optional().describe('Semantic chunks shorter than this are dropped'),
  max_chunk_size: z.number().int().min(1).optional().describe('Upper bound on chunk length in characters'),
  chunk_overlap: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe('Overlap between fixed windows when falling back from semantic chunking'),
};

/**
 * Chunking MCP Tools
 *
 * Tools: legal_chunk, legal_process
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/chunking
 */

import { z } from 'zod';
import type { DocumentRecord } from '../models/document.js';
import { requirePipeline } from '../server/state.js';
import { successResult, summarizeDocument, type ChunkResult, type ProcessResult } from '../server/types.js';
import { validateInput, ChunkInput, MetadataSchema, ProcessInput } from '../utils/validation.js';
import {
  chunkingInputSchema,
  formatResponse,
  handleError,
  pickChunkingOverrides,
  type ToolDefinition,
  type ToolResponse,
} from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKING TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleChunk(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ChunkInput, params);
    const pipeline = requirePipeline();

    const document: DocumentRecord = {
      raw_content: input.content,
      source_locator: input.source_locator,
      enhanced: false,
      metadata: input.metadata,
    };
    const chunks = await pipeline.chunk(document, pickChunkingOverrides(input));

    const result: ChunkResult = {
      source_locator: input.source_locator,
      chunk_count: chunks.length,
      chunks,
    };
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleProcess(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProcessInput, params);
    const pipeline = requirePipeline();

    const record = await pipeline.extract(input.file_path);
    const chunks = input.chunk ? await pipeline.chunk(record, pickChunkingOverrides(input)) : null;

    const result: ProcessResult = {
      document: summarizeDocument(record, input.include_content),
      chunk_count: chunks ? chunks.length : null,
      chunks,
    };
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Chunking tools collection for MCP server registration
 */
export const chunkingTools: Record<string, ToolDefinition> = {
  legal_chunk: {
    description:
      'Split text into semantically coherent chunks. Falls back to fixed-size windows when sentence embeddings are unavailable.',
    inputSchema: {
      content: z.string().describe('Text to chunk'),
      metadata: MetadataSchema.default({}).describe('Metadata copied onto every chunk'),
      source_locator: z.string().min(1).default('inline').describe('Source reported on every chunk'),
      ...chunkingInputSchema,
    },
    handler: handleChunk,
  },
  legal_process: {
    description: 'Extract one file and chunk the result in a single call',
    inputSchema: {
      file_path: z.string().min(1).describe('Path to the file'),
      chunk: z.boolean().default(true).describe('Chunk the extracted text'),
      include_content: z.boolean().default(true).describe('Include raw_content of the document'),
      ...chunkingInputSchema,
    },
    handler: handleProcess,
  },
};

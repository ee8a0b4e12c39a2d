/**
 * Extraction MCP Tools
 *
 * Tools: legal_extract, legal_extract_batch, legal_extract_directory
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/extraction
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { SUPPORTED_EXTENSIONS } from '../models/document.js';
import { pathNotDirectoryError, pathNotFoundError } from '../server/errors.js';
import { requirePipeline } from '../server/state.js';
import { successResult, summarizeBatch, summarizeDocument } from '../server/types.js';
import { scanDirectory, validateInput, ExtractBatchInput, ExtractDirectoryInput, ExtractInput } from '../utils/index.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleExtract(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractInput, params);
    const pipeline = requirePipeline();

    const record = await pipeline.extract(input.file_path, { strict: input.strict });
    return formatResponse(successResult(summarizeDocument(record, input.include_content)));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleExtractBatch(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractBatchInput, params);
    const pipeline = requirePipeline();

    const result = await pipeline.extractBatch(input.file_paths, {
      maxConcurrent: input.max_concurrent,
      itemTimeoutMs: input.item_timeout_ms,
    });
    return formatResponse(successResult(summarizeBatch(result, input.include_content)));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleExtractDirectory(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractDirectoryInput, params);
    const pipeline = requirePipeline();

    const directory = path.resolve(input.directory_path);
    const stats = await fs.stat(directory).catch(() => null);
    if (!stats) {
      throw pathNotFoundError(directory);
    }
    if (!stats.isDirectory()) {
      throw pathNotDirectoryError(directory);
    }

    const extensions = input.extensions ?? [...SUPPORTED_EXTENSIONS];
    const files = await scanDirectory(directory, extensions, input.recursive);
    console.error(`[INFO] Found ${files.length} file(s) in ${directory}`);

    const result = await pipeline.extractBatch(files, { maxConcurrent: input.max_concurrent });
    return formatResponse(
      successResult({
        directory_path: directory,
        files_found: files.length,
        ...summarizeBatch(result, input.include_content),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Extraction tools collection for MCP server registration
 */
export const extractionTools: Record<string, ToolDefinition> = {
  legal_extract: {
    description:
      'Extract text and metadata from one file (PDF, image, office document, email, PST, archive or plain text). ' +
      'Unsupported formats are read as plain text unless strict is set.',
    inputSchema: {
      file_path: z.string().min(1).describe('Path to the file'),
      strict: z.boolean().default(false).describe('Fail with UNSUPPORTED_FORMAT instead of using the generic fallback'),
      include_content: z.boolean().default(true).describe('Include raw_content in the response'),
    },
    handler: handleExtract,
  },
  legal_extract_batch: {
    description:
      'Extract several files concurrently. Returns one slot per input, in input order; failures are reported per item.',
    inputSchema: {
      file_paths: z.array(z.string().min(1)).min(1).max(500).describe('Paths to extract'),
      max_concurrent: z.number().int().min(1).max(64).optional().describe('Files processed at once'),
      item_timeout_ms: z.number().int().min(0).optional().describe('Per-file timeout, 0 for none'),
      include_content: z.boolean().default(false).describe('Include raw_content for each document'),
    },
    handler: handleExtractBatch,
  },
  legal_extract_directory: {
    description: 'Extract every supported file in a directory, optionally recursing into subdirectories',
    inputSchema: {
      directory_path: z.string().min(1).describe('Directory to scan'),
      recursive: z.boolean().default(false).describe('Scan subdirectories'),
      extensions: z
        .array(z.string().min(1))
        .optional()
        .describe('Extensions to include, e.g. ["pdf", "eml"]; defaults to every supported format'),
      max_concurrent: z.number().int().min(1).max(64).optional().describe('Files processed at once'),
      include_content: z.boolean().default(false).describe('Include raw_content for each document'),
    },
    handler: handleExtractDirectory,
  },
};

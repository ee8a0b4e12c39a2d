/**
 * Zod Validation Schemas
 *
 * Input validation for every MCP tool plus the helpers that turn zod issues
 * into a single descriptive ValidationError.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import type { MetadataValue } from '../models/document.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recursive metadata value (scalar, list or mapping)
 */
export const MetadataValueSchema: z.ZodType<MetadataValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(MetadataValueSchema),
    z.record(MetadataValueSchema),
  ])
);

export const MetadataSchema = z.record(MetadataValueSchema);

/**
 * Chunking overrides accepted by the chunking tools; unset keys fall back to
 * the configured defaults
 */
export const ChunkingOverrides = z.object({
  similarity_threshold: z.number().min(-1).max(1).optional(),
  min_chunk_size: z.number().int().min(0).optional(),
  max_chunk_size: z.number().int().min(1).optional(),
  chunk_overlap: z.number().int().min(0).optional(),
});

export type ChunkingOverrides = z.infer<typeof ChunkingOverrides>;

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ExtractInput = z.object({
  file_path: z.string().min(1, 'file_path is required'),
  strict: z.boolean().default(false),
  include_content: z.boolean().default(true),
});

export const ExtractBatchInput = z.object({
  file_paths: z.array(z.string().min(1)).min(1, 'At least one file path is required').max(500),
  max_concurrent: z.number().int().min(1).max(64).optional(),
  item_timeout_ms: z.number().int().min(0).optional(),
  include_content: z.boolean().default(false),
});

export const ExtractDirectoryInput = z.object({
  directory_path: z.string().min(1, 'directory_path is required'),
  recursive: z.boolean().default(false),
  extensions: z.array(z.string().min(1)).optional(),
  max_concurrent: z.number().int().min(1).max(64).optional(),
  include_content: z.boolean().default(false),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKING SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ChunkInput = ChunkingOverrides.extend({
  content: z.string(),
  metadata: MetadataSchema.default({}),
  source_locator: z.string().min(1).default('inline'),
});

export const ProcessInput = ChunkingOverrides.extend({
  file_path: z.string().min(1, 'file_path is required'),
  chunk: z.boolean().default(true),
  include_content: z.boolean().default(true),
});

/**
 * Utility Functions Barrel Export
 *
 * @module utils
 */

// File system utilities
export {
  getFileExtension,
  tryFileSize,
  scanDirectory,
  readFileBuffer,
  readFileTextLenient,
  readFileHead,
} from './files.js';

// Validation utilities for MCP tool inputs
export {
  validateInput,
  ValidationError,
  MetadataValueSchema,
  MetadataSchema,
  ChunkingOverrides,
  ExtractInput,
  ExtractBatchInput,
  ExtractDirectoryInput,
  ChunkInput,
  ProcessInput,
} from './validation.js';

/**
 * MCP Server Module Exports
 *
 * Re-exports all server components for external use.
 *
 * @module server
 */

// Error handling
export {
  MCPError,
  formatErrorResponse,
  pipelineNotReadyError,
  pathNotFoundError,
  pathNotFileError,
  pathNotDirectoryError,
  type ErrorCategory,
} from './errors.js';

// Type definitions
export {
  type ToolResult,
  type ToolResultSuccess,
  type ToolResultFailure,
  type ToolError,
  type DocumentSummary,
  type BatchItemSummary,
  type BatchSummary,
  type ChunkResult,
  type ProcessResult,
  successResult,
  summarizeDocument,
  summarizeBatch,
} from './types.js';

// Configuration
export { loadPipelineConfig, PipelineConfigSchema, DEFAULT_WORKER_PATH, type PipelineConfig } from './config.js';

// State management
export {
  state,
  initializePipeline,
  requirePipeline,
  requireConfig,
  resetPipeline,
  type ServerState,
  type InitializeOptions,
} from './state.js';

/**
 * Capability MCP Tools
 *
 * Tools: legal_capabilities
 *
 * @module tools/capabilities
 */

import { SUPPORTED_EXTENSIONS } from '../models/document.js';
import { requireConfig, requirePipeline } from '../server/state.js';
import { successResult } from '../server/types.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleCapabilities(_params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const pipeline = requirePipeline();
    const config = requireConfig();

    return formatResponse(
      successResult({
        ...pipeline.capabilities(),
        processing_info: pipeline.processingInfo(),
        supported_extensions: SUPPORTED_EXTENSIONS,
        defaults: {
          chunking: config.chunking,
          max_concurrent: config.maxConcurrent,
          item_timeout_ms: config.itemTimeoutMs,
          ocr_dpi: config.ocrDpi,
        },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const capabilityTools: Record<string, ToolDefinition> = {
  legal_capabilities: {
    description: 'Report which optional capabilities (OCR, layout, tables, PST, RAR, embeddings...) were available at startup',
    inputSchema: {},
    handler: handleCapabilities,
  },
};

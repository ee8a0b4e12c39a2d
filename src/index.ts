#!/usr/bin/env node
/**
 * Legal Ingest MCP Server
 *
 * Entry point for the MCP server using stdio transport. Probes the optional
 * capabilities once, builds the extraction pipeline and exposes it as tools.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module index
 */

import dotenv from 'dotenv';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { initializePipeline, loadPipelineConfig, resetPipeline } from './server/index.js';
import { capabilityTools, chunkingTools, extractionTools, type ToolDefinition } from './tools/index.js';

dotenv.config();

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER INITIALIZATION
// ═══════════════════════════════════════════════════════════════════════════════

const server = new McpServer({
  name: 'legal-ingest-mcp',
  version: '1.0.0',
});

const allTools: Record<string, ToolDefinition> = {
  ...extractionTools,
  ...chunkingTools,
  ...capabilityTools,
};

for (const [name, tool] of Object.entries(allTools)) {
  server.tool(name, tool.description, tool.inputSchema, (params: Record<string, unknown>) => tool.handler(params));
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP
// ═══════════════════════════════════════════════════════════════════════════════

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.error(`[INFO] Received ${signal}, stopping capability workers`);
  try {
    await resetPipeline();
  } catch (error) {
    console.error(`[ERROR] Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(0);
}

async function main() {
  const config = loadPipelineConfig();
  const pipeline = await initializePipeline({ config });

  const { capabilities } = pipeline.capabilities();
  const available = Object.entries(capabilities)
    .filter(([, status]) => status.state === 'available')
    .map(([name]) => name);
  console.error(`[INFO] Capabilities available: ${available.length > 0 ? available.join(', ') : 'none'}`);

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Legal Ingest MCP Server running on stdio');
  console.error(`Tools registered: ${Object.keys(allTools).length}`);
}

main().catch((error) => {
  console.error('Fatal error starting MCP server:', error);
  process.exit(1);
});

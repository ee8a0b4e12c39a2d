/**
 * MCP Tool Module Exports
 *
 * Barrel export for all tool modules.
 *
 * @module tools
 */

export * from './shared.js';
export * from './extraction.js';
export * from './chunking.js';
export * from './capabilities.js';

/**
 * Batch Module
 *
 * @module services/batch
 */

export { runBatch } from './orchestrator.js';
export type { BatchOptions, BatchOperation } from './orchestrator.js';

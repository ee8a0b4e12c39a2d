/**
 * MCP Server State Management
 *
 * Holds the single DocumentPipeline built at startup and the configuration
 * it was built from.
 * FAIL FAST: Tools throw immediately if the pipeline is not initialized.
 *
 * @module server/state
 */

import type { CapabilityProviders, CapabilitySource } from '../models/capability.js';
import { CapabilityRegistry, createDefaultProviders } from '../services/capabilities/index.js';
import { DocumentPipeline } from '../services/pipeline/index.js';
import { loadPipelineConfig, type PipelineConfig } from './config.js';
import { pipelineNotReadyError } from './errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  pipeline: DocumentPipeline | null;
  config: PipelineConfig | null;
}

export const state: ServerState = {
  pipeline: null,
  config: null,
};

export interface InitializeOptions {
  config?: PipelineConfig;
  /** Replaces the default Python/codec providers (tests) */
  providers?: CapabilityProviders;
  /** Bypasses probing entirely (tests) */
  capabilities?: CapabilitySource & { shutdown?(): Promise<void> };
}

// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Probe capabilities and build the pipeline
 *
 * Replaces (and shuts down) any pipeline already installed.
 */
export async function initializePipeline(options: InitializeOptions = {}): Promise<DocumentPipeline> {
  const config = options.config ?? loadPipelineConfig();

  const capabilities =
    options.capabilities ??
    (await CapabilityRegistry.probe(options.providers ?? createDefaultProviders(config), {
      disabled: config.disabledCapabilities,
    }));

  const pipeline = new DocumentPipeline(capabilities, {
    ocrDpi: config.ocrDpi,
    chunking: config.chunking,
    maxConcurrent: config.maxConcurrent,
    itemTimeoutMs: config.itemTimeoutMs,
  });

  await resetPipeline();
  state.pipeline = pipeline;
  state.config = config;
  return pipeline;
}

/**
 * @throws MCPError PIPELINE_NOT_READY before initializePipeline has completed
 */
export function requirePipeline(): DocumentPipeline {
  if (!state.pipeline) {
    throw pipelineNotReadyError();
  }
  return state.pipeline;
}

/**
 * @throws MCPError PIPELINE_NOT_READY before initializePipeline has completed
 */
export function requireConfig(): PipelineConfig {
  if (!state.config) {
    throw pipelineNotReadyError();
  }
  return state.config;
}

/**
 * Shut the current pipeline down and clear state
 */
export async function resetPipeline(): Promise<void> {
  const current = state.pipeline;
  state.pipeline = null;
  state.config = null;
  if (current) {
    await current.shutdown();
  }
}

/**
 * Server state lifecycle tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  initializePipeline,
  requireConfig,
  requirePipeline,
  resetPipeline,
} from '../../../src/server/state.js';
import { loadPipelineConfig } from '../../../src/server/config.js';
import { MCPError } from '../../../src/server/errors.js';
import { FakeCapabilities, KeywordEmbedder } from '../fixtures/capabilities.js';

describe('server state', () => {
  afterEach(async () => {
    await resetPipeline();
  });

  it('fails fast before initialization', () => {
    expect(() => requirePipeline()).toThrow(MCPError);
    expect(() => requireConfig()).toThrow('Extraction pipeline is not initialized');
  });

  it('installs the pipeline and its configuration', async () => {
    const config = loadPipelineConfig({}, { maxConcurrent: 2 });
    const pipeline = await initializePipeline({ config, capabilities: new FakeCapabilities() });

    expect(requirePipeline()).toBe(pipeline);
    expect(requireConfig().maxConcurrent).toBe(2);
  });

  it('probes the given providers and honours disabled capabilities', async () => {
    const config = loadPipelineConfig({ LEGAL_DISABLED_CAPABILITIES: 'ocr' });
    const pipeline = await initializePipeline({
      config,
      providers: {
        ocr: async () => {
          throw new Error('must not start');
        },
        embedding: async () => new KeywordEmbedder({}),
      },
    });

    const { capabilities } = pipeline.capabilities();
    expect(capabilities.ocr).toEqual({ state: 'unavailable', reason: 'disabled by configuration' });
    expect(capabilities.embedding).toEqual({ state: 'available' });
    expect(capabilities.layout).toEqual({ state: 'unavailable', reason: 'no provider registered' });
  });

  it('shuts the previous pipeline down when replaced', async () => {
    const config = loadPipelineConfig({});
    const first = new FakeCapabilities();
    await initializePipeline({ config, capabilities: first });

    await initializePipeline({ config, capabilities: new FakeCapabilities() });

    expect(first.closed).toBe(true);
  });
});

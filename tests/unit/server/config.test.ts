/**
 * Pipeline configuration tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_WORKER_PATH, loadPipelineConfig } from '../../../src/server/config.js';
import { DEFAULT_CHUNKING_CONFIG } from '../../../src/models/chunk.js';
import { ValidationError } from '../../../src/utils/validation.js';

describe('loadPipelineConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadPipelineConfig({});

    expect(config).toEqual({
      pythonPath: 'python3',
      workerPath: DEFAULT_WORKER_PATH,
      workerTimeoutMs: 300_000,
      probeTimeoutMs: 120_000,
      useGpu: true,
      ocrLang: 'en',
      ocrDpi: 300,
      layoutModel: 'microsoft/layoutlmv3-base',
      embeddingModel: 'BAAI/bge-large-en-v1.5',
      disabledCapabilities: [],
      maxConcurrent: 4,
      itemTimeoutMs: 0,
      chunking: DEFAULT_CHUNKING_CONFIG,
    });
  });

  it('parses environment variables', () => {
    const config = loadPipelineConfig({
      LEGAL_USE_GPU: 'off',
      LEGAL_DISABLED_CAPABILITIES: 'ocr, rar,',
      LEGAL_MAX_CONCURRENT: '8',
      LEGAL_ITEM_TIMEOUT_MS: '60000',
      LEGAL_MAX_CHUNK_SIZE: '500',
      LEGAL_SIMILARITY_THRESHOLD: '0.6',
    });

    expect(config.useGpu).toBe(false);
    expect(config.disabledCapabilities).toEqual(['ocr', 'rar']);
    expect(config.maxConcurrent).toBe(8);
    expect(config.itemTimeoutMs).toBe(60_000);
    expect(config.chunking).toEqual({
      similarity_threshold: 0.6,
      min_chunk_size: 200,
      max_chunk_size: 500,
      chunk_overlap: 100,
    });
  });

  it('treats any other GPU value as enabled', () => {
    expect(loadPipelineConfig({ LEGAL_USE_GPU: 'yes' }).useGpu).toBe(true);
  });

  it('lets overrides win over the environment', () => {
    expect(loadPipelineConfig({ LEGAL_OCR_LANG: 'de' }, { ocrLang: 'fr' }).ocrLang).toBe('fr');
  });

  it('rejects an unknown capability name', () => {
    expect(() => loadPipelineConfig({ LEGAL_DISABLED_CAPABILITIES: 'ocr,telepathy' })).toThrow(
      'disabledCapabilities: Unknown capability "telepathy"'
    );
  });

  it('rejects an out-of-range DPI', () => {
    expect(() => loadPipelineConfig({ LEGAL_OCR_DPI: '10' })).toThrow(ValidationError);
  });

  it('rejects an overlap as large as the chunk size', () => {
    expect(() => loadPipelineConfig({ LEGAL_MAX_CHUNK_SIZE: '100' })).toThrow(
      'Invalid pipeline configuration: chunking.chunk_overlap: chunk_overlap must be smaller than max_chunk_size'
    );
  });
});

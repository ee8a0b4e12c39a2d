/**
 * Chunking and capability tool handler tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { handleChunk, handleProcess } from '../../../src/tools/chunking.js';
import { handleCapabilities } from '../../../src/tools/capabilities.js';
import { resetPipeline } from '../../../src/server/state.js';
import { FakeCapabilities, KeywordEmbedder } from '../fixtures/capabilities.js';
import { createTempDir, initializeTestPipeline, parseResponse } from './helpers.js';

const TWO_SENTENCES = 'First sentence. Second sentence.';

describe('chunking tools', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir('legal-chunk-tools-');
    await initializeTestPipeline(new FakeCapabilities({}, { embedding: 'model not downloaded' }));
  });

  afterEach(async () => {
    await resetPipeline();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('legal_chunk', () => {
    it('chunks inline content with fixed windows when embeddings are unavailable', async () => {
      const body = parseResponse(
        await handleChunk({
          content: TWO_SENTENCES,
          metadata: { matter: 'A-17' },
          max_chunk_size: 20,
          chunk_overlap: 5,
        })
      );

      expect(body).toMatchObject({
        success: true,
        data: {
          source_locator: 'inline',
          chunk_count: 2,
          chunks: [
            {
              content: 'First sentence. Seco',
              metadata: {
                matter: 'A-17',
                source: 'inline',
                chunk_index: 0,
                total_chunks: 2,
                chunking_method: 'fixed-window',
                fallback_reason: 'embedding unavailable: model not downloaded',
              },
            },
            { content: ' Second sentence.', metadata: { chunk_index: 1 } },
          ],
        },
      });
    });

    it('rejects an overlap as large as the chunk size', async () => {
      const body = parseResponse(
        await handleChunk({ content: TWO_SENTENCES, max_chunk_size: 20, chunk_overlap: 20 })
      );

      expect(body).toMatchObject({
        success: false,
        error: {
          category: 'VALIDATION_ERROR',
          message: 'chunk_overlap: chunk_overlap must be smaller than max_chunk_size',
        },
      });
    });
  });

  describe('legal_process', () => {
    it('extracts and chunks in one call', async () => {
      const filePath = path.join(testDir, 'brief.txt');
      await fs.writeFile(filePath, TWO_SENTENCES);

      const body = parseResponse(await handleProcess({ file_path: filePath, max_chunk_size: 100, chunk_overlap: 10 }));

      expect(body).toMatchObject({
        success: true,
        data: {
          document: { source_locator: filePath, raw_content: TWO_SENTENCES },
          chunk_count: 1,
          chunks: [{ content: TWO_SENTENCES, metadata: { source: filePath, file_type: 'txt' } }],
        },
      });
    });

    it('skips chunking when chunk is false', async () => {
      const filePath = path.join(testDir, 'brief.txt');
      await fs.writeFile(filePath, TWO_SENTENCES);

      const body = parseResponse(await handleProcess({ file_path: filePath, chunk: false }));

      expect(body).toMatchObject({ success: true, data: { chunk_count: null, chunks: null } });
    });
  });
});

describe('legal_capabilities', () => {
  afterEach(async () => {
    await resetPipeline();
  });

  it('reports the probe snapshot, derived flags and defaults', async () => {
    await initializeTestPipeline(new FakeCapabilities({ embedding: new KeywordEmbedder({}) }));

    const body = parseResponse(await handleCapabilities({}));

    expect(body).toMatchObject({
      success: true,
      data: {
        probed_at: '2026-01-01T00:00:00.000Z',
        capabilities: {
          embedding: { state: 'available' },
          ocr: { state: 'unavailable', reason: 'not installed' },
        },
        processing_info: { semantic_chunking: true, pdf_ocr: false, email: true },
        defaults: {
          chunking: { similarity_threshold: 0.75, min_chunk_size: 200, max_chunk_size: 1000, chunk_overlap: 100 },
          max_concurrent: 4,
          item_timeout_ms: 0,
          ocr_dpi: 300,
        },
      },
    });
    expect(body).toHaveProperty('data.supported_extensions', expect.arrayContaining(['pdf', 'pst', 'tar.bz2']));
  });
});

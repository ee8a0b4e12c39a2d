/**
 * Extraction tool handler tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { handleExtract, handleExtractBatch, handleExtractDirectory } from '../../../src/tools/extraction.js';
import { resetPipeline } from '../../../src/server/state.js';
import { createTempDir, initializeTestPipeline, parseResponse } from './helpers.js';

describe('extraction tools', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir('legal-tools-');
    await initializeTestPipeline();
  });

  afterEach(async () => {
    await resetPipeline();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('legal_extract', () => {
    it('returns the document summary with content', async () => {
      const filePath = path.join(testDir, 'letter.txt');
      await fs.writeFile(filePath, 'Dear counsel');

      const body = parseResponse(await handleExtract({ file_path: filePath }));

      expect(body).toMatchObject({
        success: true,
        data: {
          source_locator: filePath,
          enhanced: false,
          content_length: 12,
          raw_content: 'Dear counsel',
          metadata: { file_type: 'txt', processing_method: 'generic_loader' },
        },
      });
    });

    it('omits content when include_content is false', async () => {
      const filePath = path.join(testDir, 'letter.txt');
      await fs.writeFile(filePath, 'Dear counsel');

      const body = parseResponse(await handleExtract({ file_path: filePath, include_content: false }));

      expect(body).toMatchObject({ success: true, data: { content_length: 12 } });
      expect(body).not.toHaveProperty('data.raw_content');
    });

    it('reports a missing file_path as a validation error', async () => {
      expect(parseResponse(await handleExtract({}))).toMatchObject({
        success: false,
        error: { category: 'VALIDATION_ERROR', message: 'file_path: Required' },
      });
    });

    it('reports a missing file', async () => {
      const filePath = path.join(testDir, 'nope.pdf');

      expect(parseResponse(await handleExtract({ file_path: filePath }))).toEqual({
        success: false,
        error: {
          category: 'PATH_NOT_FOUND',
          message: `Path does not exist: ${filePath}`,
          details: { path: filePath },
        },
      });
    });

    it('reports an unsupported format in strict mode', async () => {
      const filePath = path.join(testDir, 'data.xyz');
      await fs.writeFile(filePath, 'bytes');

      const body = parseResponse(await handleExtract({ file_path: filePath, strict: true }));

      expect(body).toMatchObject({
        success: false,
        error: { category: 'UNSUPPORTED_FORMAT', message: `Unsupported format: .xyz (${filePath})` },
      });
    });

    it('fails fast when the pipeline is not initialized', async () => {
      await resetPipeline();

      const body = parseResponse(await handleExtract({ file_path: path.join(testDir, 'a.txt') }));

      expect(body).toMatchObject({ success: false, error: { category: 'PIPELINE_NOT_READY' } });
    });
  });

  describe('legal_extract_batch', () => {
    it('reports every slot in input order', async () => {
      const present = path.join(testDir, 'a.txt');
      const missing = path.join(testDir, 'b.eml');
      await fs.writeFile(present, 'Exhibit A');

      const body = parseResponse(await handleExtractBatch({ file_paths: [present, missing] }));

      expect(body).toMatchObject({
        success: true,
        data: {
          total: 2,
          succeeded: 1,
          failed: 1,
          enhanced: 0,
          items: [
            { index: 0, success: true, document: { source_locator: present, content_length: 9 } },
            {
              index: 1,
              success: false,
              error: { source_locator: missing, error_kind: 'path_not_found', file_type: 'eml' },
            },
          ],
        },
      });
    });

    it('rejects an empty list', async () => {
      expect(parseResponse(await handleExtractBatch({ file_paths: [] }))).toMatchObject({
        success: false,
        error: { category: 'VALIDATION_ERROR', message: 'file_paths: At least one file path is required' },
      });
    });
  });

  describe('legal_extract_directory', () => {
    beforeEach(async () => {
      await fs.writeFile(path.join(testDir, 'a.txt'), 'top level');
      await fs.writeFile(path.join(testDir, 'b.xyz'), 'ignored');
      await fs.mkdir(path.join(testDir, 'sub'));
      await fs.writeFile(path.join(testDir, 'sub', 'c.md'), 'nested');
    });

    it('extracts supported files at the top level', async () => {
      const body = parseResponse(await handleExtractDirectory({ directory_path: testDir }));

      expect(body).toMatchObject({
        success: true,
        data: { directory_path: testDir, files_found: 1, total: 1, succeeded: 1 },
      });
    });

    it('recurses into subdirectories when asked', async () => {
      const body = parseResponse(await handleExtractDirectory({ directory_path: testDir, recursive: true }));

      expect(body).toMatchObject({
        success: true,
        data: {
          files_found: 2,
          items: [
            { index: 0, document: { source_locator: path.join(testDir, 'a.txt') } },
            { index: 1, document: { source_locator: path.join(testDir, 'sub', 'c.md') } },
          ],
        },
      });
    });

    it('filters by the given extensions', async () => {
      const body = parseResponse(
        await handleExtractDirectory({ directory_path: testDir, extensions: ['.xyz'] })
      );

      expect(body).toMatchObject({ success: true, data: { files_found: 1, failed: 0 } });
    });

    it('rejects a file path', async () => {
      const filePath = path.join(testDir, 'a.txt');

      const body = parseResponse(await handleExtractDirectory({ directory_path: filePath }));

      expect(body).toMatchObject({
        success: false,
        error: { category: 'PATH_NOT_DIRECTORY', message: `Path is not a directory: ${filePath}` },
      });
    });
  });
});

/**
 * Unit tests for file system utilities
 *
 * Tests extension handling, directory scanning and lenient reads.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  getFileExtension,
  readFileHead,
  readFileTextLenient,
  scanDirectory,
  tryFileSize,
} from '../../src/utils/files.js';

describe('File Utilities', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'legal-files-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('getFileExtension', () => {
    it('lowercases and strips the dot', () => {
      expect(getFileExtension('/in/Scan.PDF')).toBe('pdf');
    });

    it('keeps compound archive extensions whole', () => {
      expect(getFileExtension('/in/bundle.tar.gz')).toBe('tar.gz');
      expect(getFileExtension('/in/BUNDLE.TAR.BZ2')).toBe('tar.bz2');
    });

    it('does not treat a bare compound name as an extension', () => {
      expect(getFileExtension('/in/.tar.gz')).toBe('gz');
    });

    it('returns an empty string without an extension', () => {
      expect(getFileExtension('/in/README')).toBe('');
    });
  });

  describe('scanDirectory', () => {
    beforeEach(async () => {
      await fs.writeFile(path.join(testDir, 'b.pdf'), '');
      await fs.writeFile(path.join(testDir, 'a.tar.gz'), '');
      await fs.writeFile(path.join(testDir, 'c.xyz'), '');
      await fs.mkdir(path.join(testDir, 'nested'));
      await fs.writeFile(path.join(testDir, 'nested', 'd.PDF'), '');
    });

    it('matches extensions in name order', async () => {
      expect(await scanDirectory(testDir, ['.pdf', 'tar.gz'], false)).toEqual([
        path.join(testDir, 'a.tar.gz'),
        path.join(testDir, 'b.pdf'),
      ]);
    });

    it('recurses when asked', async () => {
      expect(await scanDirectory(testDir, ['pdf'], true)).toEqual([
        path.join(testDir, 'b.pdf'),
        path.join(testDir, 'nested', 'd.PDF'),
      ]);
    });

    it('matches everything with no extensions', async () => {
      expect(await scanDirectory(testDir, [], false)).toHaveLength(3);
    });
  });

  describe('reads', () => {
    it('substitutes the replacement character for invalid UTF-8', async () => {
      const filePath = path.join(testDir, 'mixed.txt');
      await fs.writeFile(filePath, Buffer.from([0x41, 0xff, 0x42]));

      expect(await readFileTextLenient(filePath)).toBe('A\uFFFDB');
    });

    it('reads at most the requested head length', async () => {
      const filePath = path.join(testDir, 'head.bin');
      await fs.writeFile(filePath, 'abcdef');

      expect((await readFileHead(filePath, 4)).toString()).toBe('abcd');
      expect((await readFileHead(filePath, 100)).toString()).toBe('abcdef');
    });

    it('reports size or null', async () => {
      const filePath = path.join(testDir, 'sized.txt');
      await fs.writeFile(filePath, 'abc');

      expect(await tryFileSize(filePath)).toBe(3);
      expect(await tryFileSize(path.join(testDir, 'missing'))).toBeNull();
    });
  });
});

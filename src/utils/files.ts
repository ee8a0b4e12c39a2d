/**
 * File System Utilities
 *
 * Extension handling (including compound archive extensions), directory
 * scanning and the lenient text read used by the generic fallback.
 */

import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Compound extensions recognised before the plain extension
 */
const COMPOUND_EXTENSIONS = ['tar.gz', 'tar.bz2'] as const;

/**
 * Get file extension (normalized, lowercase, without dot).
 * Compound archive extensions such as "tar.gz" are returned whole.
 *
 * @param filePath - Path to file
 * @returns Extension like 'pdf', 'tar.gz' (without dot, lowercase)
 */
export function getFileExtension(filePath: string): string {
  const base = path.basename(filePath).toLowerCase();
  for (const compound of COMPOUND_EXTENSIONS) {
    if (base.endsWith(`.${compound}`) && base.length > compound.length + 1) {
      return compound;
    }
  }
  const ext = path.extname(base);
  return ext.startsWith('.') ? ext.slice(1) : ext;
}

/**
 * Size of a file in bytes, or null when it cannot be stat'ed
 */
export async function tryFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch {
    return null;
  }
}

/**
 * Scan a directory for files matching extensions
 *
 * @param dirPath - Directory to scan
 * @param extensions - Extensions to match (e.g., ['.pdf', 'tar.gz']); empty matches all
 * @param recursive - Whether to scan subdirectories
 * @returns Absolute file paths in directory-listing order
 */
export async function scanDirectory(
  dirPath: string,
  extensions: string[],
  recursive: boolean
): Promise<string[]> {
  const normalizedExtensions = extensions.map((ext) =>
    ext.startsWith('.') ? ext.slice(1).toLowerCase() : ext.toLowerCase()
  );

  const results: string[] = [];
  const resolvedDir = path.resolve(dirPath);
  const entries = await fs.readdir(resolvedDir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const fullPath = path.join(resolvedDir, entry.name);

    if (entry.isFile()) {
      const ext = getFileExtension(entry.name);
      if (normalizedExtensions.length === 0 || normalizedExtensions.includes(ext)) {
        results.push(fullPath);
      }
    } else if (entry.isDirectory() && recursive) {
      const subResults = await scanDirectory(fullPath, extensions, recursive);
      results.push(...subResults);
    }
  }

  return results;
}

/**
 * Read file contents as a buffer
 */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  return fs.readFile(filePath);
}

/**
 * Read a file as UTF-8, substituting U+FFFD for invalid byte sequences
 */
export async function readFileTextLenient(filePath: string): Promise<string> {
  const buffer = await fs.readFile(filePath);
  return buffer.toString('utf-8');
}

/**
 * Read the first `length` bytes of a file (fewer if the file is shorter)
 */
export async function readFileHead(filePath: string, length: number): Promise<Buffer> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

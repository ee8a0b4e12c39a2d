/**
 * Archive processor
 *
 * Lists and decodes every member of a ZIP, TAR (plain, gzip, bzip2) or RAR
 * archive into one text record. ZIP and TAR/gzip are always readable; bzip2
 * and RAR need their codec capability, without which the archive degrades to
 * the generic fallback.
 *
 * @module services/extraction/archive
 */

import { Readable } from 'stream';
import { promisify } from 'util';
import * as zlib from 'zlib';
import * as path from 'path';
import JSZip from 'jszip';
import * as tar from 'tar-stream';
import type { ArchiveEntry, CapabilityName, CapabilitySource } from '../../models/capability.js';
import type { DocumentRecord, ExtractionInput } from '../../models/document.js';
import { readFileBuffer } from '../../utils/files.js';
import { runLadder, type ExtractionStrategy, type StrategyResult } from './ladder.js';

const gunzip = promisify(zlib.gunzip);

export type ArchiveFormat = 'zip' | 'rar' | 'tar' | 'tar.gz' | 'tar.bz2';

const SEPARATOR = '-'.repeat(50);

/**
 * Canonical container for a format label ('tgz' → 'tar.gz')
 */
export function archiveFormatOf(format: string): ArchiveFormat | null {
  switch (format) {
    case 'zip':
    case 'rar':
    case 'tar':
    case 'tar.gz':
    case 'tar.bz2':
      return format;
    case 'tgz':
      return 'tar.gz';
    case 'tbz2':
      return 'tar.bz2';
    default:
      return null;
  }
}

const REQUIRED_CODEC: Record<ArchiveFormat, CapabilityName[]> = {
  zip: [],
  tar: [],
  'tar.gz': [],
  'tar.bz2': ['bzip2'],
  rar: ['rar'],
};

// ═══════════════════════════════════════════════════════════════════════════════
// READERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function readZipEntries(buffer: Buffer): Promise<ArchiveEntry[]> {
  const zip = new JSZip();
  await zip.loadAsync(buffer);

  const files: JSZip.JSZipObject[] = [];
  zip.forEach((_relativePath, file) => {
    files.push(file);
  });

  const entries: ArchiveEntry[] = [];
  for (const file of files) {
    if (file.dir) {
      entries.push({ name: file.name, size: 0, isDirectory: true, data: null });
      continue;
    }
    try {
      const data = await file.async('uint8array');
      entries.push({ name: file.name, size: data.length, isDirectory: false, data });
    } catch (error) {
      console.error(`[WARN] [Archive] Failed to read ${file.name} from ZIP: ${error instanceof Error ? error.message : String(error)}`);
      entries.push({ name: file.name, size: 0, isDirectory: false, data: null });
    }
  }
  return entries;
}

/**
 * Read an uncompressed TAR stream
 */
export function readTarEntries(buffer: Buffer): Promise<ArchiveEntry[]> {
  return new Promise((resolve, reject) => {
    const entries: ArchiveEntry[] = [];
    const extract = tar.extract();

    extract.on('entry', (header, stream, next) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        if (header.type === 'directory') {
          entries.push({ name: header.name, size: 0, isDirectory: true, data: null });
        } else if (header.type === 'file' || header.type === 'contiguous-file') {
          const data = Buffer.concat(chunks);
          entries.push({ name: header.name, size: header.size ?? data.length, isDirectory: false, data });
        }
        next();
      });
      stream.on('error', reject);
    });
    extract.on('finish', () => resolve(entries));
    extract.on('error', reject);

    Readable.from([buffer]).pipe(extract);
  });
}

async function readEntries(
  format: ArchiveFormat,
  buffer: Buffer,
  capabilities: CapabilitySource
): Promise<ArchiveEntry[]> {
  switch (format) {
    case 'zip':
      return readZipEntries(buffer);
    case 'tar':
      return readTarEntries(buffer);
    case 'tar.gz':
      return readTarEntries(await gunzip(buffer));
    case 'tar.bz2': {
      const bzip2 = capabilities.get('bzip2');
      if (!bzip2) throw new Error('bzip2 codec is not available');
      return readTarEntries(await bzip2.decompress(buffer));
    }
    case 'rar': {
      const rar = capabilities.get('rar');
      if (!rar) throw new Error('RAR codec is not available');
      return rar.readEntries(buffer);
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════════

export interface DecodedMember {
  name: string;
  size: number;
  type: 'text' | 'binary';
  content: string;
}

/**
 * Strict UTF-8 decode; anything that is not valid UTF-8 is reported as binary
 */
export function decodeMember(name: string, data: Uint8Array): DecodedMember {
  try {
    const content = new TextDecoder('utf-8', { fatal: true }).decode(data);
    return { name, size: data.length, type: 'text', content };
  } catch {
    return { name, size: data.length, type: 'binary', content: `[Binary file: ${name}]` };
  }
}

function headerLabel(format: ArchiveFormat): string {
  return format === 'zip' ? 'ZIP' : format === 'rar' ? 'RAR' : 'TAR';
}

async function extractArchive(
  input: ExtractionInput,
  format: ArchiveFormat,
  capabilities: CapabilitySource
): Promise<StrategyResult> {
  const buffer = await readFileBuffer(input.filePath);
  const entries = await readEntries(format, buffer, capabilities);

  const files = entries.filter((e) => !e.isDirectory);
  const members: DecodedMember[] = [];
  for (const entry of files) {
    input.signal?.throwIfAborted();
    if (!entry.data) {
      console.error(`[WARN] [Archive] Skipping unreadable member ${entry.name} in ${input.filePath}`);
      continue;
    }
    members.push(decodeMember(entry.name, entry.data));
  }

  const totalSize = files.reduce((sum, e) => sum + e.size, 0);

  let content =
    `${headerLabel(format)} ARCHIVE CONTENTS\n` +
    `===================\n` +
    `Archive: ${path.basename(input.filePath)}\n` +
    `Files: ${files.length}\n` +
    `Total Size: ${totalSize} bytes\n\n`;

  for (const member of members) {
    content += `\nFILE: ${member.name}\n`;
    content += `Size: ${member.size} bytes\n`;
    content += `Type: ${member.type}\n`;
    content += `Content:\n${member.content}\n`;
    content += `${SEPARATOR}\n`;
  }

  return {
    raw_content: content,
    processing_method: 'archive_extraction',
    metadata: {
      archive_format: format,
      file_count: files.length,
      total_size: totalSize,
      extracted_files: members.map((m) => m.name),
      binary_files: members.filter((m) => m.type === 'binary').map((m) => m.name),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESSOR
// ═══════════════════════════════════════════════════════════════════════════════

export class ArchiveProcessor {
  constructor(private readonly capabilities: CapabilitySource) {}

  extract(input: ExtractionInput): Promise<DocumentRecord> {
    const format = archiveFormatOf(input.format);
    const strategies: ExtractionStrategy[] = format
      ? [
          {
            name: 'archive_extraction',
            requires: REQUIRED_CODEC[format],
            attempt: (item, capabilities) => extractArchive(item, format, capabilities),
          },
        ]
      : [];
    return runLadder('Archive', strategies, input, this.capabilities);
  }
}

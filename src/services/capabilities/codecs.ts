/**
 * In-process archive codecs
 *
 * RAR (node-unrar-js, WebAssembly) and bzip2 (unbzip2-stream) are loaded on
 * demand during the capability probe. A missing or broken module leaves the
 * capability unavailable instead of failing startup.
 *
 * @module services/capabilities/codecs
 */

import { Readable } from 'stream';
import type { ArchiveEntry, Bzip2Codec, RarCodec } from '../../models/capability.js';

type UnrarModule = typeof import('node-unrar-js');
type Unbzip2Factory = () => NodeJS.ReadWriteStream;

function toArrayBuffer(data: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(data.byteLength);
  new Uint8Array(copy).set(data);
  return copy;
}

export class UnrarCodec implements RarCodec {
  constructor(private readonly unrar: UnrarModule) {}

  async readEntries(data: Uint8Array): Promise<ArchiveEntry[]> {
    const extractor = await this.unrar.createExtractorFromData({ data: toArrayBuffer(data) });
    const extracted = extractor.extract();
    const entries: ArchiveEntry[] = [];
    for (const file of extracted.files) {
      const header = file.fileHeader;
      entries.push({
        name: header.name,
        size: header.unpSize,
        isDirectory: header.flags.directory,
        data: file.extraction ?? null,
      });
    }
    return entries;
  }

  async close(): Promise<void> {
    // WebAssembly module is released with the process
  }
}

export class StreamBzip2Codec implements Bzip2Codec {
  constructor(private readonly createDecoder: Unbzip2Factory) {}

  decompress(data: Uint8Array): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      const decoder = this.createDecoder();
      decoder.on('data', (chunk: Buffer) => chunks.push(chunk));
      decoder.on('end', () => resolve(Buffer.concat(chunks)));
      decoder.on('error', (err: Error) => reject(err));
      const source = Readable.from([Buffer.from(data)]);
      source.on('error', (err: Error) => reject(err));
      source.pipe(decoder);
    });
  }

  async close(): Promise<void> {
    // Stateless
  }
}

export async function loadRarCodec(): Promise<RarCodec> {
  const unrar = await import('node-unrar-js');
  return new UnrarCodec(unrar);
}

export async function loadBzip2Codec(): Promise<Bzip2Codec> {
  const mod = await import('unbzip2-stream');
  return new StreamBzip2Codec(mod.default);
}

/**
 * Document Pipeline
 *
 * Facade over classification, extraction, batching and chunking. Owns one
 * processor per source family, all borrowing handles from the same
 * capability registry.
 *
 * @module services/pipeline
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { BatchResult } from '../../models/batch.js';
import type { CapabilitySnapshot, CapabilitySource } from '../../models/capability.js';
import { mergeChunkingConfig, type ChunkingConfig, type ChunkRecord } from '../../models/chunk.js';
import type { DocumentRecord, ExtractionInput, ProcessorKind } from '../../models/document.js';
import { pathNotFileError, pathNotFoundError } from '../../server/errors.js';
import { getFileExtension } from '../../utils/files.js';
import { runBatch } from '../batch/index.js';
import { classifyFile, type FormatClassification } from '../classifier/index.js';
import {
  ArchiveProcessor,
  EmailProcessor,
  GenericDocumentProcessor,
  PdfImageProcessor,
  UnsupportedFormatError,
  genericFallback,
} from '../extraction/index.js';
import { SemanticChunker } from '../chunking/index.js';

export interface PipelineOptions {
  /** Rasterization DPI for PDF pages */
  ocrDpi: number;
  /** Chunking defaults; per-call overrides are merged on top */
  chunking: ChunkingConfig;
  /** Default batch concurrency bound */
  maxConcurrent: number;
  /** Default per-item batch timeout, 0 for none */
  itemTimeoutMs: number;
}

export interface ExtractOptions {
  /** Throw UnsupportedFormatError instead of using the generic fallback */
  strict?: boolean;
  signal?: AbortSignal;
}

export interface BatchRunOptions {
  maxConcurrent?: number;
  itemTimeoutMs?: number;
  signal?: AbortSignal;
  strict?: boolean;
}

/**
 * Feature flags derived from the capability snapshot
 */
export interface ProcessingInfo {
  pdf_ocr: boolean;
  layout_analysis: boolean;
  table_extraction: boolean;
  generic_ocr: boolean;
  email: boolean;
  pst: boolean;
  zip: boolean;
  tar: boolean;
  rar: boolean;
  tar_bz2: boolean;
  semantic_chunking: boolean;
}

interface Processor {
  extract(input: ExtractionInput): Promise<DocumentRecord>;
}

/** Anything the pipeline can close at shutdown */
interface Closeable {
  shutdown(): Promise<void>;
}

export class DocumentPipeline {
  private readonly processors: Record<ProcessorKind, Processor>;
  private readonly chunker: SemanticChunker;

  constructor(
    private readonly capabilitySource: CapabilitySource & Partial<Closeable>,
    private readonly options: PipelineOptions
  ) {
    this.processors = {
      pdf_image: new PdfImageProcessor(capabilitySource, { dpi: options.ocrDpi }),
      email: new EmailProcessor(capabilitySource),
      archive: new ArchiveProcessor(capabilitySource),
      generic: new GenericDocumentProcessor(capabilitySource),
    };
    this.chunker = new SemanticChunker(capabilitySource);
  }

  /**
   * Extract one file into a DocumentRecord
   *
   * @throws MCPError PATH_NOT_FOUND when the path is missing or not a file
   * @throws UnsupportedFormatError in strict mode for formats with no processor
   * @throws Error in strict mode when the file head cannot be read for sniffing
   */
  async extract(filePath: string, options: ExtractOptions = {}): Promise<DocumentRecord> {
    const resolved = path.resolve(filePath);
    const stats = await fs.stat(resolved).catch(() => null);
    if (!stats) {
      throw pathNotFoundError(resolved);
    }
    if (!stats.isFile()) {
      throw pathNotFileError(resolved);
    }

    let classification: FormatClassification;
    try {
      classification = await classifyFile(resolved);
    } catch (error) {
      if (options.strict) {
        throw error;
      }
      const reason = error instanceof UnsupportedFormatError
        ? error.message
        : `Format classification failed: ${error instanceof Error ? error.message : String(error)}`;
      console.error(`[WARN] ${reason}, using generic fallback`);
      return genericFallback(
        { filePath: resolved, format: getFileExtension(resolved) || 'unknown', kind: 'plain_text', signal: options.signal },
        reason
      );
    }

    const input: ExtractionInput = {
      filePath: resolved,
      format: classification.format,
      kind: classification.kind,
      signal: options.signal,
    };
    return this.processors[classification.processor].extract(input);
  }

  extractBatch(filePaths: readonly string[], options: BatchRunOptions = {}): Promise<BatchResult<DocumentRecord>> {
    return runBatch(filePaths, (filePath, signal) => this.extract(filePath, { strict: options.strict, signal }), {
      label: 'Batch',
      maxConcurrent: options.maxConcurrent ?? this.options.maxConcurrent,
      itemTimeoutMs: options.itemTimeoutMs ?? this.options.itemTimeoutMs,
      signal: options.signal,
    });
  }

  /**
   * @throws ValidationError when the merged configuration is out of range
   */
  chunk(document: DocumentRecord, config: Partial<ChunkingConfig> = {}): Promise<ChunkRecord[]> {
    return this.chunker.chunk(document, mergeChunkingConfig(this.options.chunking, config));
  }

  chunkBatch(
    documents: readonly DocumentRecord[],
    config: Partial<ChunkingConfig> = {},
    options: BatchRunOptions = {}
  ): Promise<BatchResult<ChunkRecord[]>> {
    return runBatch(documents, (document) => this.chunk(document, config), {
      label: 'ChunkBatch',
      locate: (document) => document.source_locator,
      fileType: (document) => {
        const fileType = document.metadata.file_type;
        return typeof fileType === 'string' ? fileType : 'unknown';
      },
      maxConcurrent: options.maxConcurrent ?? this.options.maxConcurrent,
      itemTimeoutMs: options.itemTimeoutMs ?? this.options.itemTimeoutMs,
      signal: options.signal,
    });
  }

  capabilities(): CapabilitySnapshot {
    return this.capabilitySource.snapshot();
  }

  processingInfo(): ProcessingInfo {
    const { capabilities } = this.capabilitySource.snapshot();
    const has = (name: keyof typeof capabilities): boolean => capabilities[name].state === 'available';
    return {
      pdf_ocr: has('ocr') && has('rasterizer'),
      layout_analysis: has('layout'),
      table_extraction: has('tables'),
      generic_ocr: has('generic_ocr'),
      email: true,
      pst: has('mail_store'),
      zip: true,
      tar: true,
      rar: has('rar'),
      tar_bz2: has('bzip2'),
      semantic_chunking: has('embedding'),
    };
  }

  async shutdown(): Promise<void> {
    await this.capabilitySource.shutdown?.();
  }
}

/**
 * PDF / Image processor
 *
 * Ladder: engine OCR (with layout and table enrichment) → generic OCR →
 * generic loader (PDF text layer) → fallback.
 *
 * PDFs are rasterized once per extraction into a temporary directory that is
 * removed when the extraction finishes, whichever rung produced the record.
 * An image is its own single page.
 *
 * @module services/extraction/pdf-image
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type {
  CapabilityName,
  CapabilitySource,
  ExtractedTable,
  LayoutSummary,
  RasterizedPage,
} from '../../models/capability.js';
import type { DocumentMetadata, DocumentRecord, ExtractionInput, MetadataValue } from '../../models/document.js';
import { genericLoaderStrategy } from './generic.js';
import { runLadder, type ExtractionStrategy, type StrategyResult } from './ladder.js';

export interface PdfImageOptions {
  /** Rasterization DPI for PDF pages */
  dpi: number;
}

export type PageMethod = 'engine' | 'generic' | 'none';

export interface PageOutcome {
  pageNumber: number;
  text: string;
  method: PageMethod;
  /** Mean line confidence, engine OCR only */
  confidence: number | null;
  layout: LayoutSummary | null;
  tables: ExtractedTable[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE SOURCE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Page images for one extraction. Rasterization runs at most once.
 */
class PageSource {
  private rasterized: Promise<RasterizedPage[]> | null = null;
  private tempDir: string | null = null;

  constructor(
    private readonly input: ExtractionInput,
    private readonly capabilities: CapabilitySource,
    private readonly dpi: number
  ) {}

  pages(): Promise<RasterizedPage[]> {
    if (this.input.kind === 'image') {
      return Promise.resolve([{ pageNumber: 1, imagePath: this.input.filePath }]);
    }
    if (!this.rasterized) {
      this.rasterized = this.rasterize();
    }
    return this.rasterized;
  }

  private async rasterize(): Promise<RasterizedPage[]> {
    const rasterizer = this.capabilities.get('rasterizer');
    if (!rasterizer) {
      throw new Error('PDF rasterizer is not available');
    }
    const dir = path.join(os.tmpdir(), `legal-ingest-pages-${uuidv4()}`);
    await fs.mkdir(dir, { recursive: true });
    this.tempDir = dir;
    const pages = await rasterizer.rasterize(this.input.filePath, dir, this.dpi);
    if (pages.length === 0) {
      throw new Error('PDF rasterized to zero pages');
    }
    return [...pages].sort((a, b) => a.pageNumber - b.pageNumber);
  }

  async cleanup(): Promise<void> {
    if (!this.tempDir) return;
    const dir = this.tempDir;
    this.tempDir = null;
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      console.error(
        `[WARN] Failed to remove page images in ${dir}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PAGE PROCESSING
// ═══════════════════════════════════════════════════════════════════════════════

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

async function genericPageText(
  capabilities: CapabilitySource,
  imagePath: string
): Promise<string> {
  const genericOcr = capabilities.get('generic_ocr');
  if (!genericOcr) {
    throw new Error('generic OCR is not available');
  }
  return (await genericOcr.imageToText(imagePath)).trim();
}

/**
 * Engine OCR for one page; a page the engine cannot read falls back to
 * generic OCR for that page only
 */
async function enginePageText(
  capabilities: CapabilitySource,
  page: RasterizedPage,
  filePath: string
): Promise<Pick<PageOutcome, 'text' | 'method' | 'confidence'>> {
  const ocr = capabilities.get('ocr');
  let failure: string;
  if (ocr) {
    try {
      const lines = (await ocr.recognize(page.imagePath)).filter((l) => l.text.trim().length > 0);
      if (lines.length > 0) {
        return {
          text: lines.map((l) => l.text).join('\n'),
          method: 'engine',
          confidence: mean(lines.map((l) => l.confidence)),
        };
      }
      failure = 'no text recognized';
    } catch (error) {
      failure = describe(error);
    }
  } else {
    failure = 'OCR engine is not available';
  }

  console.error(`[WARN] [PdfImage] OCR engine failed on page ${page.pageNumber} of ${filePath} (${failure}), using generic OCR`);
  try {
    return { text: await genericPageText(capabilities, page.imagePath), method: 'generic', confidence: null };
  } catch (error) {
    console.error(`[WARN] [PdfImage] Generic OCR failed on page ${page.pageNumber} of ${filePath}: ${describe(error)}`);
    return { text: '', method: 'none', confidence: null };
  }
}

async function pageLayout(
  capabilities: CapabilitySource,
  page: RasterizedPage,
  filePath: string
): Promise<LayoutSummary | null> {
  const layout = capabilities.get('layout');
  if (!layout) return null;
  try {
    return await layout.classify(page.imagePath);
  } catch (error) {
    console.error(`[WARN] [PdfImage] Layout analysis failed on page ${page.pageNumber} of ${filePath}: ${describe(error)}`);
    return null;
  }
}

async function pageTables(
  capabilities: CapabilitySource,
  input: ExtractionInput,
  page: RasterizedPage
): Promise<ExtractedTable[]> {
  const tables = capabilities.get('tables');
  if (!tables) return [];
  try {
    return input.kind === 'pdf'
      ? await tables.extractTables(input.filePath, page.pageNumber)
      : await tables.extractTables(page.imagePath, 1);
  } catch (error) {
    console.error(`[WARN] [PdfImage] Table extraction failed on page ${page.pageNumber} of ${input.filePath}: ${describe(error)}`);
    return [];
  }
}

/**
 * Pipe-delimited rendering: header row, then one line per data row
 */
export function renderTable(table: ExtractedTable): string {
  const lines = [table.columns.join(' | ')];
  for (const row of table.rows) {
    lines.push(table.columns.map((c) => row[c] ?? '').join(' | '));
  }
  return lines.join('\n');
}

export function combinePages(pages: PageOutcome[]): string {
  const parts: string[] = [];
  for (const page of pages) {
    if (!page.text && page.tables.length === 0) continue;
    parts.push(`--- Page ${page.pageNumber} ---`);
    if (page.text) parts.push(page.text);
    page.tables.forEach((table, i) => {
      parts.push(`--- Table ${i + 1} ---\n${renderTable(table)}`);
    });
  }
  return parts.join('\n\n');
}

function pageSummary(page: PageOutcome): MetadataValue {
  return {
    page_number: page.pageNumber,
    method: page.method,
    characters: page.text.length,
    ocr_confidence: page.confidence,
    layout: page.layout ? { label: page.layout.label, confidence: page.layout.confidence } : null,
    tables: page.tables.length,
  };
}

async function walkPages(
  mode: 'engine' | 'generic',
  input: ExtractionInput,
  capabilities: CapabilitySource,
  source: PageSource
): Promise<StrategyResult> {
  const pages = await source.pages();
  const outcomes: PageOutcome[] = [];

  for (const page of pages) {
    input.signal?.throwIfAborted();
    const recognized =
      mode === 'engine'
        ? await enginePageText(capabilities, page, input.filePath)
        : { text: await genericPageText(capabilities, page.imagePath), method: 'generic' as const, confidence: null };
    outcomes.push({
      pageNumber: page.pageNumber,
      ...recognized,
      layout: await pageLayout(capabilities, page, input.filePath),
      tables: await pageTables(capabilities, input, page),
    });
  }

  if (!outcomes.some((p) => p.method === mode)) {
    throw new Error(
      mode === 'engine'
        ? `OCR engine recognized no text on any of ${outcomes.length} page(s)`
        : `Generic OCR recognized no text on any of ${outcomes.length} page(s)`
    );
  }

  const engineConfidences = outcomes
    .map((p) => p.confidence)
    .filter((c): c is number => c !== null);

  const metadata: DocumentMetadata = {
    file_type: input.kind === 'pdf' ? 'pdf' : 'image',
    total_pages: outcomes.length,
    ocr_confidence: mean(engineConfidences),
    pages: outcomes.map(pageSummary),
    degraded_pages: outcomes.filter((p) => p.method !== mode).map((p) => p.pageNumber),
    table_count: outcomes.reduce((n, p) => n + p.tables.length, 0),
  };
  if (input.kind === 'image') {
    metadata.image_format = input.format;
  }

  return {
    raw_content: combinePages(outcomes),
    processing_method: mode === 'engine' ? 'enhanced_ocr' : 'generic_ocr',
    metadata,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESSOR
// ═══════════════════════════════════════════════════════════════════════════════

export class PdfImageProcessor {
  constructor(
    private readonly capabilities: CapabilitySource,
    private readonly options: PdfImageOptions
  ) {}

  async extract(input: ExtractionInput): Promise<DocumentRecord> {
    const source = new PageSource(input, this.capabilities, this.options.dpi);
    const needsPages = (capability: CapabilityName): CapabilityName[] =>
      input.kind === 'pdf' ? [capability, 'rasterizer'] : [capability];

    const strategies: ExtractionStrategy[] = [
      {
        name: 'enhanced_ocr',
        requires: needsPages('ocr'),
        attempt: (item, capabilities) => walkPages('engine', item, capabilities, source),
      },
      {
        name: 'generic_ocr',
        requires: needsPages('generic_ocr'),
        attempt: (item, capabilities) => walkPages('generic', item, capabilities, source),
      },
      genericLoaderStrategy,
    ];

    try {
      return await runLadder('PdfImage', strategies, input, this.capabilities);
    } finally {
      await source.cleanup();
    }
  }
}

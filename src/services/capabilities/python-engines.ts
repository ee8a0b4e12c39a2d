/**
 * Python-backed capability engines
 *
 * Thin typed wrappers over a PythonWorkerSession. Every worker response is
 * validated with zod before it reaches a processor.
 *
 * @module services/capabilities/python-engines
 */

import { z } from 'zod';
import { PythonWorkerSession, type WorkerSessionConfig } from './worker-session.js';
import type {
  CapabilityProviders,
  ExtractedTable,
  GenericOcr,
  LayoutModel,
  LayoutSummary,
  MailMessageFields,
  MailStoreFolder,
  MailStoreItem,
  MailStoreReader,
  OcrEngine,
  OcrLine,
  PageRasterizer,
  PythonCapabilityName,
  RasterizedPage,
  TableExtractor,
} from '../../models/capability.js';
import { SentenceEmbeddingClient } from '../embedding/index.js';
import type { PipelineConfig } from '../../server/config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const OcrLinesSchema = z.object({
  lines: z.array(z.object({ text: z.string(), confidence: z.number() })),
});

const LayoutSchema = z.object({
  label: z.string(),
  confidence: z.number(),
});

const TablesSchema = z.object({
  tables: z.array(
    z.object({
      columns: z.array(z.string()),
      rows: z.array(z.record(z.string())),
      accuracy: z.number().nullable(),
    })
  ),
});

const PagesSchema = z.object({
  pages: z.array(z.object({ page_number: z.number().int().positive(), image_path: z.string() })),
});

const TextSchema = z.object({ text: z.string() });

/**
 * Wire shape of a mail-store folder. Items the worker failed to decode carry
 * an `error` instead of fields.
 */
interface WireFolder {
  name: string;
  items: WireItem[];
  subfolders: WireFolder[];
}

interface WireItem {
  message_class: string | null;
  fields?: MailMessageFields;
  error?: string;
  children: WireFolder[];
}

const WireFieldsSchema = z.object({
  subject: z.string().nullable().optional(),
  sender: z.string().nullable().optional(),
  recipient: z.string().nullable().optional(),
  date: z.string().nullable().optional(),
  body: z.string().nullable().optional(),
});

const WireFolderSchema: z.ZodType<WireFolder, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: z.string(),
    items: z.array(WireItemSchema),
    subfolders: z.array(WireFolderSchema),
  })
);

const WireItemSchema: z.ZodType<WireItem, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    message_class: z.string().nullable(),
    fields: WireFieldsSchema.optional(),
    error: z.string().optional(),
    children: z.array(WireFolderSchema).default([]),
  })
);

const MailStoreSchema = z.object({ root: WireFolderSchema });

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINES
// ═══════════════════════════════════════════════════════════════════════════════

abstract class PythonEngine {
  constructor(protected readonly session: PythonWorkerSession) {}

  close(): Promise<void> {
    return this.session.close();
  }
}

export class PythonOcrEngine extends PythonEngine implements OcrEngine {
  async recognize(imagePath: string): Promise<OcrLine[]> {
    const result = await this.session.request('ocr', { image_path: imagePath }, OcrLinesSchema);
    return result.lines;
  }
}

export class PythonLayoutModel extends PythonEngine implements LayoutModel {
  classify(imagePath: string): Promise<LayoutSummary> {
    return this.session.request('layout', { image_path: imagePath }, LayoutSchema);
  }
}

export class PythonTableExtractor extends PythonEngine implements TableExtractor {
  async extractTables(sourcePath: string, pageNumber: number): Promise<ExtractedTable[]> {
    const result = await this.session.request(
      'tables',
      { source_path: sourcePath, page_number: pageNumber },
      TablesSchema
    );
    return result.tables;
  }
}

export class PythonPageRasterizer extends PythonEngine implements PageRasterizer {
  async rasterize(pdfPath: string, outputDir: string, dpi: number): Promise<RasterizedPage[]> {
    const result = await this.session.request(
      'rasterize',
      { pdf_path: pdfPath, output_dir: outputDir, dpi },
      PagesSchema
    );
    return result.pages.map((p) => ({ pageNumber: p.page_number, imagePath: p.image_path }));
  }
}

export class PythonGenericOcr extends PythonEngine implements GenericOcr {
  async imageToText(imagePath: string): Promise<string> {
    const result = await this.session.request('generic_ocr', { image_path: imagePath }, TextSchema);
    return result.text;
  }
}

function toMailStoreFolder(folder: WireFolder): MailStoreFolder {
  return {
    name: folder.name,
    items: folder.items.map(toMailStoreItem),
    subfolders: folder.subfolders.map(toMailStoreFolder),
  };
}

function toMailStoreItem(item: WireItem): MailStoreItem {
  return {
    messageClass: item.message_class,
    children: item.children.map(toMailStoreFolder),
    read: async () => {
      if (item.error !== undefined || !item.fields) {
        throw new Error(item.error ?? 'item has no readable fields');
      }
      return item.fields;
    },
  };
}

export class PythonMailStoreReader extends PythonEngine implements MailStoreReader {
  async open(filePath: string): Promise<MailStoreFolder> {
    const result = await this.session.request('pst_read', { file_path: filePath }, MailStoreSchema);
    return toMailStoreFolder(result.root);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS
// ═══════════════════════════════════════════════════════════════════════════════

function sessionConfig(
  config: PipelineConfig,
  capability: PythonCapabilityName,
  options: Record<string, unknown>
): WorkerSessionConfig {
  return {
    capability,
    pythonPath: config.pythonPath,
    workerPath: config.workerPath,
    requestTimeoutMs: config.workerTimeoutMs,
    probeTimeoutMs: config.probeTimeoutMs,
    options: { use_gpu: config.useGpu, ...options },
  };
}

/**
 * Providers for every Python-backed capability. Each provider starts its own
 * worker and resolves once the model has loaded.
 */
export function createPythonProviders(config: PipelineConfig): CapabilityProviders {
  const start = (capability: PythonCapabilityName, options: Record<string, unknown> = {}) =>
    PythonWorkerSession.start(sessionConfig(config, capability, options));

  return {
    ocr: async () => new PythonOcrEngine(await start('ocr', { lang: config.ocrLang })),
    layout: async () => new PythonLayoutModel(await start('layout', { model: config.layoutModel })),
    tables: async () => new PythonTableExtractor(await start('tables')),
    rasterizer: async () => new PythonPageRasterizer(await start('rasterizer')),
    generic_ocr: async () => new PythonGenericOcr(await start('generic_ocr', { lang: config.ocrLang })),
    mail_store: async () => new PythonMailStoreReader(await start('mail_store')),
    embedding: async () =>
      new SentenceEmbeddingClient(
        await start('embedding', { model: config.embeddingModel }),
        config.embeddingModel
      ),
  };
}

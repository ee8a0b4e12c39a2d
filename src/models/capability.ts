/**
 * Capability model
 *
 * Optional subsystems are probed once per process. Each one is either
 * available (with a live handle owned by the registry) or unavailable with
 * the reason its initialization failed.
 *
 * @module models/capability
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Every handle the registry owns can be closed at shutdown
 */
export interface CapabilityHandle {
  close(): Promise<void>;
}

export interface OcrLine {
  text: string;
  confidence: number;
}

export interface OcrEngine extends CapabilityHandle {
  recognize(imagePath: string): Promise<OcrLine[]>;
}

export interface LayoutSummary {
  label: string;
  confidence: number;
}

export interface LayoutModel extends CapabilityHandle {
  classify(imagePath: string): Promise<LayoutSummary>;
}

export interface ExtractedTable {
  /** Column headers in display order */
  columns: string[];
  rows: Array<Record<string, string>>;
  accuracy: number | null;
}

export interface TableExtractor extends CapabilityHandle {
  /**
   * @param sourcePath - PDF path, or the page image for image inputs
   * @param pageNumber - 1-based page number within sourcePath
   */
  extractTables(sourcePath: string, pageNumber: number): Promise<ExtractedTable[]>;
}

export interface RasterizedPage {
  /** 1-based */
  pageNumber: number;
  imagePath: string;
}

export interface PageRasterizer extends CapabilityHandle {
  rasterize(pdfPath: string, outputDir: string, dpi: number): Promise<RasterizedPage[]>;
}

export interface GenericOcr extends CapabilityHandle {
  imageToText(imagePath: string): Promise<string>;
}

export interface MailMessageFields {
  subject?: string | null;
  sender?: string | null;
  recipient?: string | null;
  date?: string | null;
  body?: string | null;
}

export interface MailStoreItem {
  messageClass: string | null;
  /** Throws when the item cannot be decoded */
  read(): Promise<MailMessageFields>;
  /** Items that are themselves containers (folders) */
  children: MailStoreFolder[];
}

export interface MailStoreFolder {
  name: string;
  items: MailStoreItem[];
  subfolders: MailStoreFolder[];
}

export interface MailStoreReader extends CapabilityHandle {
  open(filePath: string): Promise<MailStoreFolder>;
}

export interface EmbeddingModel extends CapabilityHandle {
  readonly modelName: string;
  embed(sentences: string[]): Promise<Float32Array[]>;
}

export interface ArchiveEntry {
  name: string;
  size: number;
  isDirectory: boolean;
  /** Null when the codec could not extract the entry */
  data: Uint8Array | null;
}

export interface RarCodec extends CapabilityHandle {
  readEntries(data: Uint8Array): Promise<ArchiveEntry[]>;
}

export interface Bzip2Codec extends CapabilityHandle {
  decompress(data: Uint8Array): Promise<Buffer>;
}

/**
 * Typed map of capability name to handle type
 */
export interface CapabilityHandles {
  ocr: OcrEngine;
  layout: LayoutModel;
  tables: TableExtractor;
  rasterizer: PageRasterizer;
  generic_ocr: GenericOcr;
  mail_store: MailStoreReader;
  embedding: EmbeddingModel;
  rar: RarCodec;
  bzip2: Bzip2Codec;
}

export type CapabilityName = keyof CapabilityHandles;

export const CAPABILITY_NAMES: readonly CapabilityName[] = [
  'ocr',
  'layout',
  'tables',
  'rasterizer',
  'generic_ocr',
  'mail_store',
  'embedding',
  'rar',
  'bzip2',
];

/**
 * Capabilities backed by the Python worker
 */
export const PYTHON_CAPABILITIES = [
  'ocr',
  'layout',
  'tables',
  'rasterizer',
  'generic_ocr',
  'mail_store',
  'embedding',
] as const satisfies readonly CapabilityName[];

export type PythonCapabilityName = (typeof PYTHON_CAPABILITIES)[number];

// ═══════════════════════════════════════════════════════════════════════════════
// SNAPSHOT
// ═══════════════════════════════════════════════════════════════════════════════

export type CapabilityStatus =
  | { state: 'available' }
  | { state: 'unavailable'; reason: string };

export interface CapabilitySnapshot {
  readonly probed_at: string;
  readonly capabilities: Readonly<Record<CapabilityName, CapabilityStatus>>;
}

/**
 * Lazily constructs a capability handle; throws when the capability
 * cannot be initialized
 */
export type CapabilityProviders = {
  [K in CapabilityName]?: () => Promise<CapabilityHandles[K]>;
};

/**
 * Read side of the registry, as seen by processors and the chunker
 */
export interface CapabilitySource {
  snapshot(): CapabilitySnapshot;
  get<K extends CapabilityName>(name: K): CapabilityHandles[K] | null;
}

export function isCapabilityName(value: string): value is CapabilityName {
  return CAPABILITY_NAMES.some((name) => name === value);
}

/**
 * Document record model
 *
 * Normalized output of every extraction processor: text plus metadata,
 * independent of the source format.
 *
 * @module models/document
 */

/**
 * Metadata value allowed on a record (scalar, list or nested mapping)
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type DocumentMetadata = Record<string, MetadataValue>;

/**
 * How a record's text was produced
 */
export type ProcessingMethod =
  | 'enhanced_ocr'
  | 'generic_ocr'
  | 'generic_loader'
  | 'email_parsing'
  | 'email_extraction'
  | 'pst_extraction'
  | 'archive_extraction'
  | 'fallback'
  | 'error';

export interface DocumentRecord {
  /** Extracted text, or a human-readable placeholder describing the failure */
  raw_content: string;
  /** Path of the source file */
  source_locator: string;
  /** True only when the richest strategy of the ladder produced the record */
  enhanced: boolean;
  /** Always carries file_type, processing_method and processed_at */
  metadata: DocumentMetadata;
}

/**
 * Broad source kind assigned by the format classifier
 */
export type SourceKind =
  | 'pdf'
  | 'image'
  | 'office_document'
  | 'plain_text'
  | 'email_message'
  | 'mail_store'
  | 'archive';

/**
 * Processor responsible for a source kind
 */
export type ProcessorKind = 'pdf_image' | 'email' | 'archive' | 'generic';

export const IMAGE_EXTENSIONS = [
  'jpg', 'jpeg', 'png', 'bmp', 'tiff', 'tif', 'webp', 'gif',
] as const;

export const EMAIL_EXTENSIONS = ['eml', 'msg'] as const;

export const MAIL_STORE_EXTENSIONS = ['pst'] as const;

export const ARCHIVE_EXTENSIONS = [
  'zip', 'rar', 'tar', 'tar.gz', 'tgz', 'tar.bz2', 'tbz2',
] as const;

export const OFFICE_EXTENSIONS = [
  'doc', 'docx', 'odt', 'rtf', 'ppt', 'pptx', 'odp', 'xls', 'xlsx', 'ods', 'epub',
] as const;

export const PLAIN_TEXT_EXTENSIONS = [
  'txt', 'md', 'csv', 'tsv', 'json', 'xml', 'html', 'htm', 'log',
] as const;

/**
 * Every extension the classifier routes to a processor
 */
export const SUPPORTED_EXTENSIONS: readonly string[] = [
  'pdf',
  ...IMAGE_EXTENSIONS,
  ...EMAIL_EXTENSIONS,
  ...MAIL_STORE_EXTENSIONS,
  ...ARCHIVE_EXTENSIONS,
  ...OFFICE_EXTENSIONS,
  ...PLAIN_TEXT_EXTENSIONS,
];

/**
 * Input handed to a processor once the file has been classified
 */
export interface ExtractionInput {
  filePath: string;
  /** Normalized format label, e.g. 'pdf', 'png', 'eml', 'tar.gz' */
  format: string;
  kind: SourceKind;
  /** Fires when the caller abandons the extraction (batch cancel or item timeout) */
  signal?: AbortSignal;
}

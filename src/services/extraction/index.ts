/**
 * Extraction Module
 *
 * @module services/extraction
 */

export { PdfImageProcessor } from './pdf-image.js';
export type { PdfImageOptions } from './pdf-image.js';
export { EmailProcessor } from './email.js';
export { ArchiveProcessor, archiveFormatOf } from './archive.js';
export type { ArchiveFormat } from './archive.js';
export { GenericDocumentProcessor } from './generic.js';
export { runLadder } from './ladder.js';
export type { ExtractionStrategy, StrategyResult } from './ladder.js';
export { genericFallback } from './fallback.js';
export { loadDocumentText } from './generic-loader.js';
export { UnsupportedFormatError, CapabilityUnavailableError, ExtractionFailedError } from './errors.js';

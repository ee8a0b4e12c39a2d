/**
 * Generic document processor
 *
 * Office documents and plain-text formats: the generic loader, then the
 * fallback.
 *
 * @module services/extraction/generic
 */

import type { CapabilitySource } from '../../models/capability.js';
import type { DocumentMetadata, DocumentRecord, ExtractionInput } from '../../models/document.js';
import { loadDocumentText } from './generic-loader.js';
import { runLadder, type ExtractionStrategy } from './ladder.js';

/**
 * Shared by the PDF/image ladder, where it reads the PDF text layer
 */
export const genericLoaderStrategy: ExtractionStrategy = {
  name: 'generic_loader',
  requires: [],
  enhanced: false,
  async attempt(input) {
    const loaded = await loadDocumentText(input.filePath, input.format);
    const metadata: DocumentMetadata = { loader: loaded.loader };
    if (loaded.pages !== undefined) {
      metadata.total_pages = loaded.pages;
    }
    return { raw_content: loaded.text, processing_method: 'generic_loader', metadata };
  },
};

export class GenericDocumentProcessor {
  constructor(private readonly capabilities: CapabilitySource) {}

  extract(input: ExtractionInput): Promise<DocumentRecord> {
    return runLadder('Generic', [genericLoaderStrategy], input, this.capabilities);
  }
}

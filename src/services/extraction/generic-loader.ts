/**
 * Generic document loader
 *
 * Text-layer extraction without any optional capability: PDF text via
 * pdfjs-dist, DOCX via mammoth, HTML via cheerio, plain-text formats as
 * UTF-8. Other formats throw so the ladder moves on to the fallback.
 *
 * @module services/extraction/generic-loader
 */

import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import mammoth from 'mammoth';
import * as cheerio from 'cheerio';
import { PLAIN_TEXT_EXTENSIONS } from '../../models/document.js';
import { readFileBuffer } from '../../utils/files.js';

export interface LoadedText {
  text: string;
  loader: 'pdfjs' | 'mammoth' | 'cheerio' | 'text';
  /** Page count, PDF only */
  pages?: number;
}

const HTML_FORMATS = ['html', 'htm'];

/**
 * Concatenate the text layer of every page
 */
export async function loadPdfText(buffer: Buffer): Promise<{ text: string; pages: number }> {
  const loadingTask = pdfjsLib.getDocument({
    data: new Uint8Array(buffer),
    verbosity: 0,
    isEvalSupported: false,
    useSystemFonts: true,
  });
  const pdfDocument = await loadingTask.promise;
  try {
    const pageTexts: string[] = [];
    for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const content = await page.getTextContent();
      const parts: string[] = [];
      for (const item of content.items) {
        if ('str' in item) {
          parts.push(item.str);
          if (item.hasEOL) parts.push('\n');
        }
      }
      pageTexts.push(parts.join('').trim());
      page.cleanup();
    }
    return { text: pageTexts.filter((t) => t.length > 0).join('\n\n'), pages: pdfDocument.numPages };
  } finally {
    await pdfDocument.destroy();
  }
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  return $('body').length > 0 ? $('body').text().trim() : $.root().text().trim();
}

/**
 * @throws Error for formats without a text loader
 */
export async function loadDocumentText(filePath: string, format: string): Promise<LoadedText> {
  if (format === 'pdf') {
    const { text, pages } = await loadPdfText(await readFileBuffer(filePath));
    if (text.trim().length === 0) {
      throw new Error('PDF has no text layer');
    }
    return { text, loader: 'pdfjs', pages };
  }

  if (format === 'docx') {
    const result = await mammoth.extractRawText({ buffer: await readFileBuffer(filePath) });
    return { text: result.value, loader: 'mammoth' };
  }

  if (HTML_FORMATS.includes(format)) {
    const html = (await readFileBuffer(filePath)).toString('utf-8');
    return { text: htmlToText(html), loader: 'cheerio' };
  }

  const plainText: readonly string[] = PLAIN_TEXT_EXTENSIONS;
  if (plainText.includes(format)) {
    const text = (await readFileBuffer(filePath)).toString('utf-8');
    return { text, loader: 'text' };
  }

  throw new Error(`No text loader for .${format} files`);
}

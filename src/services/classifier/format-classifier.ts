/**
 * Format Classifier
 *
 * Routes a file to its processor by extension. Files whose extension is
 * unknown (or missing) are identified from their leading bytes.
 *
 * @module services/classifier/format-classifier
 */

import {
  ARCHIVE_EXTENSIONS,
  EMAIL_EXTENSIONS,
  IMAGE_EXTENSIONS,
  MAIL_STORE_EXTENSIONS,
  OFFICE_EXTENSIONS,
  PLAIN_TEXT_EXTENSIONS,
  type ProcessorKind,
  type SourceKind,
} from '../../models/document.js';
import { getFileExtension, readFileHead } from '../../utils/files.js';
import { UnsupportedFormatError } from '../extraction/errors.js';

export interface FormatClassification {
  kind: SourceKind;
  /** Normalized format label ('pdf', 'png', 'eml', 'tar.gz', ...) */
  format: string;
  processor: ProcessorKind;
  /** How the format was determined */
  detected_by: 'extension' | 'signature';
}

const PROCESSOR_FOR_KIND: Record<SourceKind, ProcessorKind> = {
  pdf: 'pdf_image',
  image: 'pdf_image',
  email_message: 'email',
  mail_store: 'email',
  archive: 'archive',
  office_document: 'generic',
  plain_text: 'generic',
};

function includes(list: readonly string[], ext: string): boolean {
  return list.includes(ext);
}

function kindForExtension(ext: string): SourceKind | null {
  if (ext === 'pdf') return 'pdf';
  if (includes(IMAGE_EXTENSIONS, ext)) return 'image';
  if (includes(EMAIL_EXTENSIONS, ext)) return 'email_message';
  if (includes(MAIL_STORE_EXTENSIONS, ext)) return 'mail_store';
  if (includes(ARCHIVE_EXTENSIONS, ext)) return 'archive';
  if (includes(OFFICE_EXTENSIONS, ext)) return 'office_document';
  if (includes(PLAIN_TEXT_EXTENSIONS, ext)) return 'plain_text';
  return null;
}

function classification(kind: SourceKind, format: string, detectedBy: FormatClassification['detected_by']): FormatClassification {
  return { kind, format, processor: PROCESSOR_FOR_KIND[kind], detected_by: detectedBy };
}

/**
 * Classify by extension only
 *
 * @returns null when the extension is not routed
 */
export function classifyPath(filePath: string): FormatClassification | null {
  const ext = getFileExtension(filePath);
  const kind = kindForExtension(ext);
  return kind ? classification(kind, ext, 'extension') : null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SIGNATURE SNIFFING
// ═══════════════════════════════════════════════════════════════════════════════

/** Bytes needed to see the TAR magic at offset 257 */
export const SNIFF_LENGTH = 512;

interface Signature {
  offset: number;
  bytes: number[];
  kind: SourceKind;
  format: string;
}

const ascii = (s: string): number[] => Array.from(s, (c) => c.charCodeAt(0));

const SIGNATURES: Signature[] = [
  { offset: 0, bytes: ascii('%PDF-'), kind: 'pdf', format: 'pdf' },
  { offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], kind: 'image', format: 'png' },
  { offset: 0, bytes: [0xff, 0xd8, 0xff], kind: 'image', format: 'jpg' },
  { offset: 0, bytes: ascii('GIF8'), kind: 'image', format: 'gif' },
  { offset: 0, bytes: [0x49, 0x49, 0x2a, 0x00], kind: 'image', format: 'tiff' },
  { offset: 0, bytes: [0x4d, 0x4d, 0x00, 0x2a], kind: 'image', format: 'tiff' },
  { offset: 0, bytes: ascii('BM'), kind: 'image', format: 'bmp' },
  { offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04], kind: 'archive', format: 'zip' },
  { offset: 0, bytes: ascii('Rar!'), kind: 'archive', format: 'rar' },
  { offset: 0, bytes: [0x1f, 0x8b], kind: 'archive', format: 'tar.gz' },
  { offset: 0, bytes: ascii('BZh'), kind: 'archive', format: 'tar.bz2' },
  { offset: 257, bytes: ascii('ustar'), kind: 'archive', format: 'tar' },
  { offset: 0, bytes: ascii('!BDN'), kind: 'mail_store', format: 'pst' },
  // OLE2 compound file; the only OLE2 container routed is Outlook MSG
  { offset: 0, bytes: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1], kind: 'email_message', format: 'msg' },
];

function matches(head: Uint8Array, signature: Signature): boolean {
  if (head.length < signature.offset + signature.bytes.length) return false;
  return signature.bytes.every((b, i) => head[signature.offset + i] === b);
}

/**
 * Identify a format from the leading bytes of a file
 *
 * WEBP needs two separated markers ("RIFF" ... "WEBP") so it is checked apart
 * from the fixed signatures.
 */
export function sniffSignature(head: Uint8Array): FormatClassification | null {
  for (const signature of SIGNATURES) {
    if (matches(head, signature)) {
      return classification(signature.kind, signature.format, 'signature');
    }
  }
  const riff = ascii('RIFF');
  const webp = ascii('WEBP');
  if (
    head.length >= 12 &&
    riff.every((b, i) => head[i] === b) &&
    webp.every((b, i) => head[8 + i] === b)
  ) {
    return classification('image', 'webp', 'signature');
  }
  return null;
}

/**
 * Classify a file: extension first, leading bytes when the extension is
 * unknown
 *
 * @throws UnsupportedFormatError when neither identifies a routed format
 */
export async function classifyFile(filePath: string): Promise<FormatClassification> {
  const byExtension = classifyPath(filePath);
  if (byExtension) return byExtension;

  const head = await readFileHead(filePath, SNIFF_LENGTH);
  const bySignature = sniffSignature(head);
  if (bySignature) {
    console.error(`[INFO] Identified ${filePath} as ${bySignature.format} from file signature`);
    return bySignature;
  }

  throw new UnsupportedFormatError(getFileExtension(filePath), filePath);
}

/**
 * Email processor
 *
 * EML messages are parsed with mailparser. MSG files are scraped for
 * printable text (lossy). PST mail stores are walked through the mail_store
 * capability and need it to be available.
 *
 * @module services/extraction/email
 */

import { simpleParser, type AddressObject, type Attachment, type ParsedMail } from 'mailparser';
import type { CapabilitySource, MailMessageFields, MailStoreFolder } from '../../models/capability.js';
import type { DocumentRecord, ExtractionInput } from '../../models/document.js';
import { readFileBuffer } from '../../utils/files.js';
import { htmlToText } from './generic-loader.js';
import { runLadder, type ExtractionStrategy, type StrategyResult } from './ladder.js';

const SEPARATOR = '-'.repeat(50);

// ═══════════════════════════════════════════════════════════════════════════════
// EML
// ═══════════════════════════════════════════════════════════════════════════════

export interface EmailAttachment {
  filename: string;
  content_type: string;
  size: number;
  content: string;
}

function addressText(address: AddressObject | AddressObject[] | undefined): string {
  if (!address) return '';
  return Array.isArray(address) ? address.map((a) => a.text).join(', ') : address.text;
}

function toAttachment(attachment: Attachment): EmailAttachment | null {
  if (!attachment.filename) return null;
  const filename = attachment.filename;
  const isText = attachment.contentType.startsWith('text/');
  return {
    filename,
    content_type: attachment.contentType,
    size: attachment.size,
    content: isText ? attachment.content.toString('utf-8') : `[Binary attachment: ${filename}]`,
  };
}

/**
 * ISO timestamp of the Date header, or the header text as written when it
 * does not parse (mailparser substitutes the current time in that case)
 */
function messageDate(parsed: ParsedMail): string {
  const line = parsed.headerLines.find((h) => h.key === 'date')?.line;
  if (line !== undefined) {
    const raw = line.slice(line.indexOf(':') + 1).replace(/\s+/g, ' ').trim();
    if (Number.isNaN(Date.parse(raw))) return raw;
  }
  return parsed.date ? parsed.date.toISOString() : '';
}

export async function parseEml(buffer: Buffer): Promise<StrategyResult> {
  const parsed = await simpleParser(buffer);

  const subject = parsed.subject ?? '';
  const sender = addressText(parsed.from);
  const recipient = addressText(parsed.to);
  const date = messageDate(parsed);

  const plain = parsed.text?.trim() ?? '';
  const body = plain.length > 0 ? plain : parsed.html ? htmlToText(parsed.html) : '';

  const attachments = parsed.attachments
    .map(toAttachment)
    .filter((a): a is EmailAttachment => a !== null);

  let content =
    `EMAIL MESSAGE\n` +
    `=============\n` +
    `Subject: ${subject}\n` +
    `From: ${sender}\n` +
    `To: ${recipient}\n` +
    `Date: ${date}\n\n` +
    `${body}\n`;

  if (attachments.length > 0) {
    content += '\n\nATTACHMENTS\n===========\n';
    attachments.forEach((attachment, i) => {
      content += `\nAttachment ${i + 1}: ${attachment.filename}\n`;
      content += `Type: ${attachment.content_type}\n`;
      content += `Size: ${attachment.size} bytes\n`;
      content += `Content:\n${attachment.content}\n`;
      content += `${SEPARATOR}\n`;
    });
  }

  return {
    raw_content: content,
    processing_method: 'email_parsing',
    metadata: {
      file_type: 'eml',
      subject,
      sender,
      recipient,
      date,
      attachments: attachments.length,
      attachment_files: attachments.map((a) => a.filename),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// MSG
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Keep printable ASCII runs of the raw compound file and collapse whitespace
 */
export function scrapePrintableText(buffer: Uint8Array): string {
  return Buffer.from(buffer)
    .toString('latin1')
    .replace(/[^\x20-\x7E\n\r\t]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// PST
// ═══════════════════════════════════════════════════════════════════════════════

interface MailStoreWalk {
  messages: MailMessageFields[];
  folders: number;
  skipped: number;
}

async function walkFolder(folder: MailStoreFolder, walk: MailStoreWalk, filePath: string): Promise<void> {
  walk.folders++;
  for (const item of folder.items) {
    if (item.messageClass?.includes('IPM.Note')) {
      try {
        walk.messages.push(await item.read());
      } catch (error) {
        walk.skipped++;
        console.error(
          `[WARN] [Email] Skipping unreadable message in ${folder.name || 'root'} of ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    for (const child of item.children) {
      await walkFolder(child, walk, filePath);
    }
  }
  for (const sub of folder.subfolders) {
    await walkFolder(sub, walk, filePath);
  }
}

function field(value: string | null | undefined): string {
  return value ?? 'N/A';
}

export function formatMailStore(messages: MailMessageFields[]): string {
  let content = 'OUTLOOK PST FILE - ALL MESSAGES\n';
  content += '='.repeat(50) + '\n\n';
  messages.forEach((message, i) => {
    content += `MESSAGE ${i + 1}\n`;
    content += '-'.repeat(20) + '\n';
    content += `Subject: ${field(message.subject)}\n`;
    content += `From: ${field(message.sender)}\n`;
    content += `To: ${field(message.recipient)}\n`;
    content += `Date: ${field(message.date)}\n`;
    content += `Body: ${field(message.body)}\n\n`;
  });
  return content;
}

async function extractMailStore(input: ExtractionInput, capabilities: CapabilitySource): Promise<StrategyResult> {
  const reader = capabilities.get('mail_store');
  if (!reader) {
    throw new Error('mail store reader is not available');
  }
  const root = await reader.open(input.filePath);
  const walk: MailStoreWalk = { messages: [], folders: 0, skipped: 0 };
  await walkFolder(root, walk, input.filePath);

  return {
    raw_content: formatMailStore(walk.messages),
    processing_method: 'pst_extraction',
    metadata: {
      file_type: 'pst',
      message_count: walk.messages.length,
      folder_count: walk.folders,
      skipped_items: walk.skipped,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESSOR
// ═══════════════════════════════════════════════════════════════════════════════

const EML_STRATEGY: ExtractionStrategy = {
  name: 'email_parsing',
  requires: [],
  attempt: async (input) => parseEml(await readFileBuffer(input.filePath)),
};

const MSG_STRATEGY: ExtractionStrategy = {
  name: 'email_extraction',
  requires: [],
  attempt: async (input) => ({
    raw_content: scrapePrintableText(await readFileBuffer(input.filePath)),
    processing_method: 'email_extraction',
    metadata: { file_type: 'msg' },
  }),
};

const PST_STRATEGY: ExtractionStrategy = {
  name: 'pst_extraction',
  requires: ['mail_store'],
  attempt: extractMailStore,
};

export class EmailProcessor {
  constructor(private readonly capabilities: CapabilitySource) {}

  extract(input: ExtractionInput): Promise<DocumentRecord> {
    const strategies =
      input.format === 'eml'
        ? [EML_STRATEGY]
        : input.format === 'msg'
          ? [MSG_STRATEGY]
          : input.format === 'pst'
            ? [PST_STRATEGY]
            : [];
    return runLadder('Email', strategies, input, this.capabilities);
  }
}

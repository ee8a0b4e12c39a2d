/**
 * Email processor tests
 *
 * EML fixtures are raw MIME strings; PST stores come from an in-process
 * reader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { MailStoreFolder, MailStoreReader } from '../../../../src/models/capability.js';
import {
  EmailProcessor,
  formatMailStore,
  scrapePrintableText,
} from '../../../../src/services/extraction/email.js';
import { FakeCapabilities } from '../../fixtures/capabilities.js';

const EML_WITH_ATTACHMENTS = [
  'From: Alice Example <alice@example.com>',
  'To: Bob Example <bob@example.com>',
  'Subject: Settlement draft',
  'Date: Tue, 02 Jan 2024 10:00:00 +0000',
  'MIME-Version: 1.0',
  'Content-Type: multipart/mixed; boundary="BOUNDARY"',
  '',
  '--BOUNDARY',
  'Content-Type: text/plain; charset=utf-8',
  '',
  'Please review the attached draft.',
  '--BOUNDARY',
  'Content-Type: text/plain; name="terms.txt"',
  'Content-Disposition: attachment; filename="terms.txt"',
  '',
  'Net 30 payment.',
  '--BOUNDARY',
  'Content-Type: application/octet-stream; name="scan.bin"',
  'Content-Disposition: attachment; filename="scan.bin"',
  'Content-Transfer-Encoding: base64',
  '',
  'AAEC',
  '--BOUNDARY--',
  '',
].join('\r\n');

class FakeMailStore implements MailStoreReader {
  constructor(private readonly root: MailStoreFolder) {}

  async open(): Promise<MailStoreFolder> {
    return this.root;
  }

  async close(): Promise<void> {}
}

describe('EmailProcessor', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'legal-email-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('parses an EML message with its attachments', async () => {
    const filePath = path.join(testDir, 'draft.eml');
    await fs.writeFile(filePath, EML_WITH_ATTACHMENTS);

    const processor = new EmailProcessor(new FakeCapabilities());
    const record = await processor.extract({ filePath, format: 'eml', kind: 'email_message' });

    expect(record.enhanced).toBe(true);
    expect(record.raw_content.startsWith('EMAIL MESSAGE\n=============\nSubject: Settlement draft\n')).toBe(true);
    expect(record.raw_content).toContain('Date: 2024-01-02T10:00:00.000Z\n\nPlease review the attached draft.');
    expect(record.raw_content).toContain('\n\nATTACHMENTS\n===========\n');
    expect(record.raw_content).toContain('Attachment 1: terms.txt\nType: text/plain\n');
    expect(record.raw_content).toContain(
      'Attachment 2: scan.bin\nType: application/octet-stream\nSize: 3 bytes\nContent:\n[Binary attachment: scan.bin]\n'
    );
    expect(record.metadata).toMatchObject({
      file_type: 'eml',
      processing_method: 'email_parsing',
      subject: 'Settlement draft',
      date: '2024-01-02T10:00:00.000Z',
      attachments: 2,
      attachment_files: ['terms.txt', 'scan.bin'],
    });
    expect(record.metadata.sender).toContain('alice@example.com');
    expect(record.metadata.recipient).toContain('bob@example.com');
  });

  it('keeps a Date header that does not parse as written', async () => {
    const filePath = path.join(testDir, 'undated.eml');
    await fs.writeFile(
      filePath,
      'From: a@example.com\r\nTo: b@example.com\r\nSubject: Hi\r\nDate: not a date\r\n\r\nJust text.\r\n'
    );

    const processor = new EmailProcessor(new FakeCapabilities());
    const record = await processor.extract({ filePath, format: 'eml', kind: 'email_message' });

    expect(record.metadata.date).toBe('not a date');
    expect(record.raw_content).toContain('Date: not a date\n\nJust text.');
  });

  it('reports zero attachments for a plain message', async () => {
    const filePath = path.join(testDir, 'plain.eml');
    await fs.writeFile(
      filePath,
      'From: a@example.com\r\nTo: b@example.com\r\nSubject: Hi\r\n\r\nJust text.\r\n'
    );

    const processor = new EmailProcessor(new FakeCapabilities());
    const record = await processor.extract({ filePath, format: 'eml', kind: 'email_message' });

    expect(record.metadata.attachments).toBe(0);
    expect(record.metadata.attachment_files).toEqual([]);
    expect(record.raw_content).not.toContain('ATTACHMENTS');
  });

  it('scrapes printable text from an MSG file', async () => {
    const filePath = path.join(testDir, 'memo.msg');
    await fs.writeFile(
      filePath,
      Buffer.concat([
        Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]),
        Buffer.from('Subject:  Quarterly\x00\x02 review\n\nbody text', 'latin1'),
      ])
    );

    const processor = new EmailProcessor(new FakeCapabilities());
    const record = await processor.extract({ filePath, format: 'msg', kind: 'email_message' });

    expect(record.raw_content).toBe('Subject: Quarterly review body text');
    expect(record.metadata.processing_method).toBe('email_extraction');
    expect(record.metadata.file_type).toBe('msg');
  });

  it('walks every folder of a PST and skips unreadable messages', async () => {
    const root: MailStoreFolder = {
      name: '',
      items: [
        {
          messageClass: 'IPM.Note',
          read: async () => ({
            subject: 'Offer',
            sender: 'a@example.com',
            recipient: 'b@example.com',
            date: '2024-01-02',
            body: 'Accept by Friday.',
          }),
          children: [],
        },
        {
          messageClass: 'IPM.Note',
          read: async () => {
            throw new Error('corrupt property stream');
          },
          children: [],
        },
        { messageClass: 'IPM.Appointment', read: async () => ({ subject: 'Meeting' }), children: [] },
      ],
      subfolders: [
        {
          name: 'Archive',
          items: [{ messageClass: 'IPM.Note', read: async () => ({ subject: 'Follow-up' }), children: [] }],
          subfolders: [],
        },
      ],
    };
    const filePath = path.join(testDir, 'mailbox.pst');
    await fs.writeFile(filePath, '!BDN');

    const processor = new EmailProcessor(new FakeCapabilities({ mail_store: new FakeMailStore(root) }));
    const record = await processor.extract({ filePath, format: 'pst', kind: 'mail_store' });

    expect(record.raw_content).toBe(
      'OUTLOOK PST FILE - ALL MESSAGES\n' +
        `${'='.repeat(50)}\n\n` +
        `MESSAGE 1\n${'-'.repeat(20)}\n` +
        'Subject: Offer\nFrom: a@example.com\nTo: b@example.com\nDate: 2024-01-02\nBody: Accept by Friday.\n\n' +
        `MESSAGE 2\n${'-'.repeat(20)}\n` +
        'Subject: Follow-up\nFrom: N/A\nTo: N/A\nDate: N/A\nBody: N/A\n\n'
    );
    expect(record.metadata).toMatchObject({
      file_type: 'pst',
      processing_method: 'pst_extraction',
      message_count: 2,
      folder_count: 2,
      skipped_items: 1,
    });
  });

  it('degrades a PST to the generic fallback without the mail store reader', async () => {
    const filePath = path.join(testDir, 'mailbox.pst');
    await fs.writeFile(filePath, '!BDN');

    const processor = new EmailProcessor(new FakeCapabilities());
    const record = await processor.extract({ filePath, format: 'pst', kind: 'mail_store' });

    expect(record.metadata.processing_method).toBe('fallback');
    expect(record.metadata.fallback_reasons).toEqual([
      'pst_extraction: Capability "mail_store" unavailable: not installed',
    ]);
  });
});

describe('email helpers', () => {
  it('strips control bytes and collapses whitespace', () => {
    expect(scrapePrintableText(Buffer.from('a\x00\x01b \t\n c', 'latin1'))).toBe('ab c');
  });

  it('formats an empty mail store with only the header', () => {
    expect(formatMailStore([])).toBe(`OUTLOOK PST FILE - ALL MESSAGES\n${'='.repeat(50)}\n\n`);
  });
});

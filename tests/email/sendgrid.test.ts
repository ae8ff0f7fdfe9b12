import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SendGridEmailSender } from '../../src/email/sendgrid.js';
import type { EmailMessage } from '../../src/email/sender.js';
import { FakeMailClient } from '../helpers/fakes.js';
import { memoryLogger, parseLines, TempDir } from '../helpers/test-utils.js';

function message(attachment: EmailMessage['attachment']): EmailMessage {
  return {
    to: 'jane@example.com',
    from: 'reports@example.com',
    subject: 'Your Health Score Report - 2026-03-02',
    text: 'Hello',
    html: '<p>Hello</p>',
    attachment,
  };
}

describe('SendGrid Email Sender', () => {
  let client: FakeMailClient;
  let tmp: TempDir;

  beforeEach(() => {
    client = new FakeMailClient();
    tmp = TempDir.create();
  });

  afterEach(() => {
    tmp.destroy();
  });

  it('should configure the client with the API key', () => {
    new SendGridEmailSender({ apiKey: 'test-secret', client });

    expect(client.apiKey).toBe('test-secret');
  });

  it('should send the PDF as a base64 attachment', async () => {
    const sender = new SendGridEmailSender({ apiKey: 'test-secret', client });
    const result = await sender.send(message({ filename: 'report.pdf', bytes: Uint8Array.of(1, 2, 3) }));

    expect(result).toEqual({ ok: true, statusCode: 202, messageId: 'sg-123' });
    expect(client.sent).toEqual([{
      to: 'jane@example.com',
      from: 'reports@example.com',
      subject: 'Your Health Score Report - 2026-03-02',
      text: 'Hello',
      html: '<p>Hello</p>',
      attachments: [{ content: 'AQID', filename: 'report.pdf', type: 'application/pdf', disposition: 'attachment' }],
    }]);
  });

  it('should read the attachment from disk when only a path is given', async () => {
    const pdfPath = tmp.writeFile('report.pdf', '%PDF-');
    const sender = new SendGridEmailSender({ apiKey: 'test-secret', client });

    await sender.send(message({ filename: 'report.pdf', path: pdfPath }));

    expect(client.sent[0]?.attachments[0]?.content).toBe(Buffer.from('%PDF-').toString('base64'));
  });

  it('should fail without sending when the attachment is missing', async () => {
    const sender = new SendGridEmailSender({ apiKey: 'test-secret', client });
    const missing = tmp.path('missing.pdf');

    expect(await sender.send(message({ filename: 'missing.pdf', path: missing }))).toEqual({
      ok: false,
      reason: `PDF file not found at path: ${missing}`,
    });
    expect(client.sent).toEqual([]);
  });

  it('should fail without sending when no API key is configured', async () => {
    const { logger, lines } = memoryLogger();
    const sender = new SendGridEmailSender({ client, logger });

    expect(await sender.send(message({ filename: 'report.pdf', bytes: Uint8Array.of(1) }))).toEqual({
      ok: false,
      reason: 'SendGrid API key not configured',
    });
    expect(client.apiKey).toBeNull();
    expect(parseLines(lines)[0]).toMatchObject({ level: 'warn', msg: 'SendGrid API key not set; email delivery will fail' });
  });

  it('should report the status and error details of a rejected send', async () => {
    client.failure = Object.assign(new Error('Forbidden'), {
      code: 403,
      response: { body: { errors: [{ message: 'The from address does not match a verified Sender Identity.' }] } },
    });
    const sender = new SendGridEmailSender({ apiKey: 'test-secret', client });

    expect(await sender.send(message({ filename: 'report.pdf', bytes: Uint8Array.of(1) }))).toEqual({
      ok: false,
      reason: 'The from address does not match a verified Sender Identity.',
      statusCode: 403,
    });
  });

  it('should fall back to the error message for transport errors', async () => {
    client.failure = new Error('socket hang up');
    const sender = new SendGridEmailSender({ apiKey: 'test-secret', client });

    expect(await sender.send(message({ filename: 'report.pdf', bytes: Uint8Array.of(1) }))).toEqual({
      ok: false,
      reason: 'socket hang up',
    });
  });
});

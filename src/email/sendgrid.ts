import * as fs from 'node:fs';
import sgMail from '@sendgrid/mail';
import { errorMessage } from '../errors.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';
import type { DeliveryResult, EmailMessage, EmailSender } from './sender.js';

export interface OutgoingMail {
  to: string;
  from: string;
  subject: string;
  text: string;
  html?: string;
  attachments: Array<{ content: string; filename: string; type: string; disposition: string }>;
}

export interface MailResponse {
  statusCode: number;
  headers?: Record<string, unknown>;
}

/**
 * The slice of the @sendgrid/mail client this sender uses.
 */
export interface MailClient {
  setApiKey(apiKey: string): void;
  send(data: OutgoingMail): Promise<[MailResponse, unknown]>;
}

export interface SendGridOptions {
  apiKey?: string;
  client?: MailClient;
  logger?: LoggerLike;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// SendGrid's ResponseError carries the HTTP status in `code` and details in
// `response.body.errors[].message`
function describeFailure(error: unknown): { reason: string; statusCode?: number } {
  const statusCode = isRecord(error) && typeof error['code'] === 'number' ? error['code'] : undefined;
  const response = isRecord(error) ? error['response'] : undefined;
  const body = isRecord(response) ? response['body'] : undefined;
  const errors = isRecord(body) ? body['errors'] : undefined;

  const details = Array.isArray(errors)
    ? errors
        .map((e: unknown) => (isRecord(e) && typeof e['message'] === 'string' ? e['message'] : null))
        .filter((m): m is string => m !== null)
    : [];

  const reason = details.length > 0 ? details.join('; ') : errorMessage(error);
  return statusCode === undefined ? { reason } : { reason, statusCode };
}

export class SendGridEmailSender implements EmailSender {
  private readonly client: MailClient;
  private readonly configured: boolean;
  private readonly logger: LoggerLike;

  constructor(options: SendGridOptions = {}) {
    this.client = options.client ?? sgMail;
    this.logger = options.logger ?? silentLogger;
    this.configured = options.apiKey !== undefined && options.apiKey !== '';
    if (options.apiKey) {
      this.client.setApiKey(options.apiKey);
    } else {
      this.logger.warn('SendGrid API key not set; email delivery will fail');
    }
  }

  private async attachmentContent(message: EmailMessage): Promise<string | null> {
    const { attachment } = message;
    if (attachment.bytes) {
      return Buffer.from(attachment.bytes).toString('base64');
    }
    if (attachment.path && fs.existsSync(attachment.path)) {
      const data = await fs.promises.readFile(attachment.path);
      return data.toString('base64');
    }
    return null;
  }

  async send(message: EmailMessage): Promise<DeliveryResult> {
    if (!this.configured) {
      return { ok: false, reason: 'SendGrid API key not configured' };
    }

    const content = await this.attachmentContent(message);
    if (content === null) {
      return { ok: false, reason: `PDF file not found at path: ${message.attachment.path ?? '(none)'}` };
    }

    const mail: OutgoingMail = {
      to: message.to,
      from: message.from,
      subject: message.subject,
      text: message.text,
      ...(message.html !== undefined ? { html: message.html } : {}),
      attachments: [{
        content,
        filename: message.attachment.filename,
        type: 'application/pdf',
        disposition: 'attachment',
      }],
    };

    try {
      const [response] = await this.client.send(mail);
      const messageId = response.headers?.['x-message-id'];
      this.logger.info('Email sent', { to: message.to, statusCode: response.statusCode });
      return typeof messageId === 'string'
        ? { ok: true, statusCode: response.statusCode, messageId }
        : { ok: true, statusCode: response.statusCode };
    } catch (error) {
      const failure = describeFailure(error);
      this.logger.error('Email send failed', { to: message.to, ...failure });
      return { ok: false, ...failure };
    }
  }
}

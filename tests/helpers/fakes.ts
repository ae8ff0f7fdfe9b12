import type { DeliveryResult, EmailMessage, EmailSender } from '../../src/email/sender.js';
import type { MailClient, MailResponse, OutgoingMail } from '../../src/email/sendgrid.js';

/**
 * Records messages and answers with a canned result.
 */
export class RecordingSender implements EmailSender {
  readonly messages: EmailMessage[] = [];

  constructor(private readonly result: DeliveryResult = { ok: true, statusCode: 202, messageId: 'msg-1' }) {}

  async send(message: EmailMessage): Promise<DeliveryResult> {
    this.messages.push(message);
    return this.result;
  }
}

/**
 * In-process stand-in for the SendGrid client.
 */
export class FakeMailClient implements MailClient {
  apiKey: string | null = null;
  readonly sent: OutgoingMail[] = [];
  response: MailResponse = { statusCode: 202, headers: { 'x-message-id': 'sg-123' } };
  failure: unknown = null;

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  async send(data: OutgoingMail): Promise<[MailResponse, unknown]> {
    this.sent.push(data);
    if (this.failure !== null) {
      throw this.failure;
    }
    return [this.response, {}];
  }
}

export interface PdfAttachment {
  filename: string;
  path?: string;
  bytes?: Uint8Array;
}

export interface EmailMessage {
  to: string;
  from: string;
  subject: string;
  text: string;
  html?: string;
  attachment: PdfAttachment;
}

export type DeliveryResult =
  | { ok: true; statusCode: number; messageId?: string }
  | { ok: false; reason: string; statusCode?: number };

/**
 * Transactional email transport. Implementations report failures through the
 * result; the orchestrator also treats a rejected send as a failed delivery.
 */
export interface EmailSender {
  send(message: EmailMessage): Promise<DeliveryResult>;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function isEmailAddress(value: string): boolean {
  return EMAIL_PATTERN.test(value);
}

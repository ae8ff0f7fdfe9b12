export type ErrorCode =
  | 'INVALID_PAYLOAD'
  | 'PAYLOAD_NOT_FOUND'
  | 'RENDER_FAILED'
  | 'INVALID_CONFIG'
  | 'DELIVERY_FAILED';

export class HealthReportError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HealthReportError';
    this.code = code;
  }
}

/**
 * The submitted payload cannot be scored. Caller's fault, never retried.
 */
export class InvalidPayloadError extends HealthReportError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_PAYLOAD', message, options);
    this.name = 'InvalidPayloadError';
  }
}

export class PayloadNotFoundError extends HealthReportError {
  readonly fileName: string;

  constructor(fileName: string) {
    super('PAYLOAD_NOT_FOUND', `Payload file not found: ${fileName}`);
    this.name = 'PayloadNotFoundError';
    this.fileName = fileName;
  }
}

export type RenderStage = 'chart' | 'pdf';

export class RenderError extends HealthReportError {
  readonly stage: RenderStage;

  constructor(stage: RenderStage, message: string, options?: ErrorOptions) {
    super('RENDER_FAILED', message, options);
    this.name = 'RenderError';
    this.stage = stage;
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Raised at startup for an unusable configuration or scoring table.
 */
export class ConfigurationError extends HealthReportError {
  readonly issues: ConfigurationIssue[];

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    const detail = issues.length > 0
      ? `: ${issues.map(i => `${i.path}: ${i.message}`).join(', ')}`
      : '';
    super('INVALID_CONFIG', `${message}${detail}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class DeliveryFailure extends HealthReportError {
  readonly recipient: string;
  readonly statusCode: number | undefined;

  constructor(recipient: string, reason: string, statusCode?: number, options?: ErrorOptions) {
    super('DELIVERY_FAILED', `Failed to deliver report to ${recipient}: ${reason}`, options);
    this.name = 'DeliveryFailure';
    this.recipient = recipient;
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

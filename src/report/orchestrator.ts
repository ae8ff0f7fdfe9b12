import * as path from 'node:path';
import { renderChart, type ChartRenderer, type ChartResult } from '../chart/renderer.js';
import { DeliveryFailure, errorMessage, InvalidPayloadError, RenderError } from '../errors.js';
import { buildReportEmail } from '../email/content.js';
import type { DeliveryResult, EmailSender } from '../email/sender.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';
import type { SectionKind } from '../pdf/layout.js';
import { renderPdf, type PdfRenderer } from '../pdf/renderer.js';
import type { ScoringEngine } from '../scoring/engine.js';
import { deriveReportKey } from '../scoring/key.js';
import type { ScoreModel } from '../scoring/model.js';

export interface ReportBundle {
  key: string;
  scoreModel: ScoreModel;
  chartPath?: string;
  chartBytes?: Uint8Array;
  pdfPath: string;
  pdfBytes: Uint8Array;
  pdfSections: SectionKind[];
  recipientEmail?: string;
}

export interface ReportSummary {
  key: string;
  overallScore: number;
  categoryScores: Readonly<Record<string, number>>;
  chartPath: string | null;
  pdfPath: string;
}

export type DeliveryOutcome =
  | { status: 'skipped' }
  | { status: 'sent'; recipient: string; statusCode: number; messageId?: string }
  | { status: 'failed'; recipient: string; failure: DeliveryFailure };

export interface ReportOutcome {
  bundle: ReportBundle;
  chartError?: RenderError;
  delivery: DeliveryOutcome;
}

export interface BuildReportOptions {
  includeChart?: boolean;
  outputFormat?: string;
  recipientEmail?: string;
  source?: string;
}

export interface OrchestratorOptions {
  engine: ScoringEngine;
  outputDir: string;
  chartRenderer?: ChartRenderer;
  pdfRenderer?: PdfRenderer;
  emailSender?: EmailSender;
  senderEmail?: string;
  logger?: LoggerLike;
}

export function toReportSummary(bundle: ReportBundle): ReportSummary {
  return {
    key: bundle.key,
    overallScore: bundle.scoreModel.overallScore,
    categoryScores: bundle.scoreModel.categoryScores,
    chartPath: bundle.chartPath ?? null,
    pdfPath: bundle.pdfPath,
  };
}

/**
 * Runs one assessment through scoring, chart, PDF and optional email.
 *
 * Scoring and PDF failures abort the build. A chart failure only drops the
 * chart from the report, and delivery problems are reported on the outcome
 * with the artifacts left in place.
 */
export class ReportOrchestrator {
  private readonly engine: ScoringEngine;
  private readonly chartRenderer: ChartRenderer;
  private readonly pdfRenderer: PdfRenderer;
  private readonly emailSender: EmailSender | undefined;
  private readonly senderEmail: string | undefined;
  private readonly logger: LoggerLike;

  readonly chartDir: string;
  readonly reportDir: string;

  constructor(options: OrchestratorOptions) {
    this.engine = options.engine;
    this.chartRenderer = options.chartRenderer ?? renderChart;
    this.pdfRenderer = options.pdfRenderer ?? renderPdf;
    this.emailSender = options.emailSender;
    this.senderEmail = options.senderEmail;
    this.logger = options.logger ?? silentLogger;
    this.chartDir = path.join(options.outputDir, 'charts');
    this.reportDir = path.join(options.outputDir, 'reports');
  }

  get canSendEmail(): boolean {
    return this.emailSender !== undefined && this.senderEmail !== undefined;
  }

  async buildReport(payload: unknown, options: BuildReportOptions = {}): Promise<ReportOutcome> {
    const { includeChart = true, outputFormat = 'pdf' } = options;
    if (outputFormat !== 'pdf') {
      throw new InvalidPayloadError(`Unsupported output format: ${outputFormat}`);
    }

    const done = this.logger.time('Report built', { source: options.source ?? null });
    const model = this.engine.computeScore(payload, options.source);
    const key = deriveReportKey(model.metadata);
    const log = this.logger.child({ key });

    let chart: ChartResult | undefined;
    let chartError: RenderError | undefined;
    if (includeChart) {
      try {
        chart = await this.chartRenderer(model, this.chartDir, { key, logger: log });
      } catch (error) {
        chartError = error instanceof RenderError
          ? error
          : new RenderError('chart', `Chart rendering failed: ${errorMessage(error)}`, { cause: error });
        log.warn('Chart unavailable, building report without it', { error: chartError.message });
      }
    }

    const pdf = await this.pdfRenderer(model, chart ? { bytes: chart.bytes } : undefined, this.reportDir, { key, logger: log });

    const recipient = options.recipientEmail ?? model.metadata.email ?? undefined;
    const bundle: ReportBundle = {
      key,
      scoreModel: model,
      pdfPath: pdf.path,
      pdfBytes: pdf.bytes,
      pdfSections: pdf.sections,
      ...(chart ? { chartPath: chart.path, chartBytes: chart.bytes } : {}),
      ...(recipient !== undefined ? { recipientEmail: recipient } : {}),
    };

    const delivery = recipient === undefined ? { status: 'skipped' as const } : await this.deliver(bundle, recipient, log);
    done();

    return chartError ? { bundle, chartError, delivery } : { bundle, delivery };
  }

  private async deliver(bundle: ReportBundle, recipient: string, log: LoggerLike): Promise<DeliveryOutcome> {
    if (!this.emailSender || this.senderEmail === undefined) {
      const failure = new DeliveryFailure(recipient, 'Email delivery is not configured');
      log.warn(failure.message);
      return { status: 'failed', recipient, failure };
    }

    const content = buildReportEmail(bundle.scoreModel, bundle.chartBytes ? { chartBytes: bundle.chartBytes } : {});
    let result: DeliveryResult;
    try {
      result = await this.emailSender.send({
        to: recipient,
        from: this.senderEmail,
        subject: content.subject,
        text: content.text,
        html: content.html,
        attachment: { filename: path.basename(bundle.pdfPath), bytes: bundle.pdfBytes },
      });
    } catch (error) {
      const failure = new DeliveryFailure(recipient, errorMessage(error), undefined, { cause: error });
      log.error('Report delivery failed', { recipient, reason: failure.message, statusCode: null });
      return { status: 'failed', recipient, failure };
    }

    if (!result.ok) {
      const failure = new DeliveryFailure(recipient, result.reason, result.statusCode);
      log.error('Report delivery failed', { recipient, reason: result.reason, statusCode: result.statusCode ?? null });
      return { status: 'failed', recipient, failure };
    }

    log.info('Report delivered', { recipient, statusCode: result.statusCode });
    return result.messageId === undefined
      ? { status: 'sent', recipient, statusCode: result.statusCode }
      : { status: 'sent', recipient, statusCode: result.statusCode, messageId: result.messageId };
  }
}

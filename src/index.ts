export { VERSION } from './version.js';

// Scoring
export { computeScore, createScoringEngine, payloadDigest, ScoringEngine, type ScoreOptions } from './scoring/engine.js';
export { computeOverallScore, type CategoryScore, type ScoreMetadata, type ScoreModel, type ScoreSummary } from './scoring/model.js';
export { parseScoringTable, validateScoringTable, type ScoringTable, type CategoryDefinition, type FieldTransform } from './scoring/table.js';
export { deriveReportKey } from './scoring/key.js';

// Rendering
export { buildChartSvg } from './chart/svg.js';
export { renderChart, type ChartRenderer, type ChartResult } from './chart/renderer.js';
export { buildReportLayout, type ReportLayout, type ReportSection } from './pdf/layout.js';
export { buildPdfDocument, renderPdf, type PdfRenderer, type PdfResult } from './pdf/renderer.js';
export { inspectReport, readReportSummary, type ReportInspection } from './pdf/inspect.js';

// Pipeline
export {
  ReportOrchestrator,
  toReportSummary,
  type BuildReportOptions,
  type DeliveryOutcome,
  type ReportBundle,
  type ReportOutcome,
  type ReportSummary,
} from './report/orchestrator.js';
export { buildReportEmail } from './email/content.js';
export { SendGridEmailSender, type MailClient } from './email/sendgrid.js';
export type { DeliveryResult, EmailMessage, EmailSender } from './email/sender.js';
export { PayloadStore, type StoredPayload } from './storage/payload-store.js';
export { WebServer, type ServerConfig } from './web/server.js';
export { createServices, type Services } from './app.js';

// Configuration and errors
export { loadConfig } from './config/loader.js';
export type { HealthScoreConfig } from './config/schema.js';
export { createLogger, Logger, type LoggerLike, type LogLevel } from './observability/logger.js';
export * from './errors.js';

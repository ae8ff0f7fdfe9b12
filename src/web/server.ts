import * as http from 'node:http';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { AddressInfo } from 'node:net';
import { errorMessage, InvalidPayloadError } from '../errors.js';
import { isEmailAddress } from '../email/sender.js';
import { silentLogger, type LoggerLike } from '../observability/logger.js';
import { toReportSummary, type DeliveryOutcome, type ReportOrchestrator, type ReportOutcome } from '../report/orchestrator.js';
import { isReportKey } from '../scoring/key.js';
import { newPayloadKey, type PayloadStore } from '../storage/payload-store.js';
import { isInside } from '../utils/paths.js';
import { decodePathParam, HttpError, readJsonBody, sendBytes, sendJson, sendText, statusForError } from './http.js';

export interface ServerConfig {
  port: number;
  host: string;
  orchestrator: ReportOrchestrator;
  store: PayloadStore;
  outputDir: string; // artifacts are only served from below this directory
  includeChart?: boolean;
  logger?: LoggerLike;
}

interface RequestContext {
  req: http.IncomingMessage;
  res: http.ServerResponse;
  url: URL;
  params: string[];
}

type Method = 'GET' | 'POST';

interface Route {
  method: Method;
  pattern: RegExp;
  handle(ctx: RequestContext): Promise<void>;
}

export const HEALTH_MESSAGE = 'Health Score API is running!';

function serializeDelivery(delivery: DeliveryOutcome): Record<string, unknown> {
  if (delivery.status === 'failed') {
    return {
      status: 'failed',
      recipient: delivery.recipient,
      reason: delivery.failure.message,
      statusCode: delivery.failure.statusCode ?? null,
    };
  }
  return { ...delivery };
}

export class WebServer {
  private server: http.Server | null = null;
  private readonly config: ServerConfig;
  private readonly logger: LoggerLike;
  private readonly outputDir: string;
  private readonly routes: Route[];

  constructor(config: ServerConfig) {
    this.config = config;
    this.logger = config.logger ?? silentLogger;
    this.outputDir = path.resolve(config.outputDir);
    this.routes = [
      { method: 'GET', pattern: /^\/health$/, handle: ctx => this.health(ctx) },
      { method: 'POST', pattern: /^\/api\/webhook$/, handle: ctx => this.webhook(ctx) },
      { method: 'POST', pattern: /^\/api\/webhook-to-pdf$/, handle: ctx => this.webhookToPdf(ctx) },
      { method: 'POST', pattern: /^\/api\/webhook-to-email$/, handle: ctx => this.webhookToEmail(ctx) },
      { method: 'GET', pattern: /^\/api\/files$/, handle: ctx => this.listFiles(ctx) },
      { method: 'GET', pattern: /^\/api\/files\/([^/]+)$/, handle: ctx => this.fileContent(ctx) },
      { method: 'POST', pattern: /^\/api\/files\/([^/]+)\/process$/, handle: ctx => this.processFile(ctx) },
      { method: 'POST', pattern: /^\/api\/files\/([^/]+)\/email$/, handle: ctx => this.emailFile(ctx) },
      { method: 'GET', pattern: /^\/api\/download-pdf$/, handle: ctx => this.serveArtifact(ctx, '.pdf', 'application/pdf') },
      { method: 'GET', pattern: /^\/api\/view-chart$/, handle: ctx => this.serveArtifact(ctx, '.png', 'image/png') },
    ];
  }

  async start(): Promise<AddressInfo> {
    await this.config.store.initialize();

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((err: unknown) => {
        this.logger.error('Request handler error', { error: errorMessage(err) });
        if (!res.headersSent) {
          sendText(res, 500, 'Internal Server Error');
        }
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        this.logger.info('Server listening', { url: `http://${this.config.host}:${address.port}` });
        resolve(address);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close(err => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const done = this.logger.time('Request', { method: req.method, path: url.pathname });

    // Add CORS headers for browser clients
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const matching = this.routes
      .map(route => ({ route, match: route.pattern.exec(url.pathname) }))
      .filter(entry => entry.match !== null);

    if (matching.length === 0) {
      sendJson(res, 404, { success: false, error: 'Not Found' });
      done();
      return;
    }

    const hit = matching.find(entry => entry.route.method === req.method);
    if (!hit?.match) {
      res.setHeader('Allow', matching.map(entry => entry.route.method).join(', '));
      sendJson(res, 405, { success: false, error: 'Method Not Allowed' });
      done();
      return;
    }

    const segments = hit.match.slice(1);
    try {
      const params = segments.map(p => decodePathParam(p));
      await hit.route.handle({ req, res, url, params });
    } catch (error) {
      const status = statusForError(error);
      if (status >= 500) {
        this.logger.error('Request failed', { path: url.pathname, error: errorMessage(error) });
      } else {
        this.logger.debug('Request rejected', { path: url.pathname, status, error: errorMessage(error) });
      }
      if (!res.headersSent) {
        sendJson(res, status, { success: false, error: errorMessage(error) });
      }
    }
    done();
  }

  private build(payload: unknown, options: { source: string; recipientEmail?: string }): Promise<ReportOutcome> {
    return this.config.orchestrator.buildReport(payload, {
      includeChart: this.config.includeChart ?? true,
      ...options,
    });
  }

  private relativeToOutput(filePath: string): string {
    return path.relative(this.outputDir, filePath).split(path.sep).join('/');
  }

  private describeReport(outcome: ReportOutcome, options: { includePdf: boolean }): Record<string, unknown> {
    const summary = toReportSummary(outcome.bundle);
    const chartPath = summary.chartPath === null ? null : this.relativeToOutput(summary.chartPath);
    const pdfPath = this.relativeToOutput(summary.pdfPath);

    return {
      key: summary.key,
      overallScore: summary.overallScore,
      categoryScores: summary.categoryScores,
      chartUrl: chartPath === null ? null : `/api/view-chart?path=${encodeURIComponent(chartPath)}`,
      ...(options.includePdf ? { pdfPath, pdfUrl: `/api/download-pdf?path=${encodeURIComponent(pdfPath)}` } : {}),
      ...(outcome.chartError ? { chartError: outcome.chartError.message } : {}),
    };
  }

  private async storeRequestPayload(req: http.IncomingMessage): Promise<{ payload: unknown; fileName: string }> {
    const payload = await readJsonBody(req);
    const { fileName } = await this.config.store.save(newPayloadKey(), payload);
    return { payload, fileName };
  }

  private recipientFrom(url: URL): string | undefined {
    const email = url.searchParams.get('email')?.trim();
    if (!email) return undefined;
    if (!isEmailAddress(email)) {
      throw new HttpError(400, `Invalid email address: ${email}`);
    }
    return email;
  }

  private async health({ res }: RequestContext): Promise<void> {
    sendText(res, 200, HEALTH_MESSAGE);
  }

  private async webhook({ req, res }: RequestContext): Promise<void> {
    const { payload, fileName } = await this.storeRequestPayload(req);
    const outcome = await this.build(payload, { source: fileName });

    sendJson(res, 200, {
      success: true,
      message: 'Webhook received, saved, and processed successfully',
      fileName,
      report: this.describeReport(outcome, { includePdf: true }),
      delivery: serializeDelivery(outcome.delivery),
    });
  }

  private async webhookToPdf({ req, res }: RequestContext): Promise<void> {
    const { payload, fileName } = await this.storeRequestPayload(req);
    const outcome = await this.build(payload, { source: fileName });
    sendBytes(res, outcome.bundle.pdfBytes, 'application/pdf', { download: `${outcome.bundle.key}.pdf` });
  }

  private async webhookToEmail({ req, res, url }: RequestContext): Promise<void> {
    const recipient = this.recipientFrom(url);
    const { payload, fileName } = await this.storeRequestPayload(req);
    const outcome = await this.build(payload, { source: fileName, ...(recipient ? { recipientEmail: recipient } : {}) });
    this.respondWithDelivery(res, outcome, { fileName });
  }

  private async listFiles({ res }: RequestContext): Promise<void> {
    const files = await this.config.store.list();
    sendJson(res, 200, {
      success: true,
      files: files.map(f => ({ name: f.name, createdAt: f.createdAt.toISOString(), size: f.size })),
    });
  }

  private async fileContent({ res, params }: RequestContext): Promise<void> {
    const fileName = path.basename(params[0] ?? '');
    const content = await this.config.store.read(fileName);
    sendJson(res, 200, { success: true, fileName, content });
  }

  private async processFile({ req, res, params }: RequestContext): Promise<void> {
    const body = await readJsonBody(req, { optional: true });
    const requested = typeof body === 'object' && body !== null && 'outputFormat' in body ? body.outputFormat : 'pdf';
    const outputFormat = typeof requested === 'string' ? requested.toLowerCase() : requested;
    if (outputFormat !== 'pdf' && outputFormat !== 'html') {
      throw new InvalidPayloadError(`Unsupported output format: ${String(requested)}`);
    }

    const fileName = path.basename(params[0] ?? '');
    const payload = await this.config.store.read(fileName);
    const outcome = await this.build(payload, { source: fileName });

    sendJson(res, 200, {
      success: true,
      message: 'File processed successfully',
      fileName,
      report: this.describeReport(outcome, { includePdf: outputFormat === 'pdf' }),
    });
  }

  private async emailFile({ res, url, params }: RequestContext): Promise<void> {
    const fileName = path.basename(params[0] ?? '');
    const payload = await this.config.store.read(fileName);
    const recipient = this.recipientFrom(url);
    const outcome = await this.build(payload, { source: fileName, ...(recipient ? { recipientEmail: recipient } : {}) });
    this.respondWithDelivery(res, outcome, { fileName });
  }

  private respondWithDelivery(res: http.ServerResponse, outcome: ReportOutcome, extra: { fileName: string }): void {
    const report = this.describeReport(outcome, { includePdf: true });
    const { delivery } = outcome;

    if (delivery.status === 'skipped') {
      throw new HttpError(400, 'No email address found in the payload or the email query parameter');
    }

    if (delivery.status === 'failed') {
      sendJson(res, 502, {
        success: false,
        error: delivery.failure.message,
        ...extra,
        report,
        delivery: serializeDelivery(delivery),
      });
      return;
    }

    sendJson(res, 200, {
      success: true,
      message: 'Email sent successfully',
      ...extra,
      report,
      delivery: serializeDelivery(delivery),
    });
  }

  private async serveArtifact({ res, url }: RequestContext, extension: string, contentType: string): Promise<void> {
    const requested = url.searchParams.get('path');
    if (!requested) {
      throw new HttpError(400, 'Missing path query parameter');
    }

    // Security: only files below the output directory
    const filePath = path.resolve(this.outputDir, requested);
    if (!isInside(this.outputDir, filePath)) {
      throw new HttpError(403, 'Forbidden');
    }
    if (path.extname(filePath).toLowerCase() !== extension) {
      throw new HttpError(400, `Expected a ${extension} file`);
    }
    if (!isReportKey(path.basename(filePath, path.extname(filePath)))) {
      throw new HttpError(400, 'Not a report artifact');
    }
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      throw new HttpError(404, 'File not found');
    }

    const bytes = await fs.promises.readFile(filePath);
    sendBytes(res, bytes, contentType, extension === '.pdf' ? { download: path.basename(filePath) } : {});
  }
}

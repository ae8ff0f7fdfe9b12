import type { HealthScoreConfig } from './config/schema.js';
import { loadScoringEngine } from './config/loader.js';
import type { EmailSender } from './email/sender.js';
import { SendGridEmailSender, type MailClient } from './email/sendgrid.js';
import type { LoggerLike } from './observability/logger.js';
import { ReportOrchestrator } from './report/orchestrator.js';
import type { ScoringEngine } from './scoring/engine.js';
import { PayloadStore } from './storage/payload-store.js';
import { getDataLayout, type DataLayout } from './utils/paths.js';

export interface Services {
  layout: DataLayout;
  engine: ScoringEngine;
  store: PayloadStore;
  orchestrator: ReportOrchestrator;
}

export interface CreateServicesOptions {
  outputDir?: string; // overrides <dataDir>/output
  mailClient?: MailClient;
}

/**
 * Wire the pipeline from a loaded configuration. Fails with a
 * ConfigurationError when the scoring table is unusable.
 */
export async function createServices(
  config: HealthScoreConfig,
  logger: LoggerLike,
  options: CreateServicesOptions = {}
): Promise<Services> {
  const layout = getDataLayout(config.dataDir);
  const engine = await loadScoringEngine(config.scoringTable, logger.child({ component: 'scoring' }));

  let emailSender: EmailSender | undefined;
  if (config.sendgridApiKey !== null) {
    emailSender = new SendGridEmailSender({
      apiKey: config.sendgridApiKey,
      logger: logger.child({ component: 'email' }),
      ...(options.mailClient ? { client: options.mailClient } : {}),
    });
  }

  const orchestrator = new ReportOrchestrator({
    engine,
    outputDir: options.outputDir ?? layout.output,
    logger: logger.child({ component: 'report' }),
    ...(emailSender ? { emailSender } : {}),
    ...(config.senderEmail !== null ? { senderEmail: config.senderEmail } : {}),
  });

  logger.debug('Services ready', { scoringVersion: engine.version, dataDir: layout.root, email: orchestrator.canSendEmail });

  return {
    layout,
    engine,
    store: new PayloadStore(layout.payloads, logger.child({ component: 'store' })),
    orchestrator,
  };
}

import * as path from 'node:path';
import type { Command, CommandContext } from './index.js';
import { EXIT_FAILURE, EXIT_OK, registerCommand, requirePositional, UsageError } from './index.js';
import { createServices } from '../../app.js';
import { formatScore } from '../../chart/svg.js';
import { isEmailAddress } from '../../email/sender.js';
import { toReportSummary } from '../../report/orchestrator.js';
import { readJsonFile } from '../../utils/json.js';
import { booleanFlag, stringFlag } from '../parser.js';

const reportCommand: Command = {
  name: 'report',
  usage: 'report <file> [--out <dir>] [--no-chart] [--email <address>]',
  description: 'Build the chart and PDF report for a payload, optionally emailing it',
  async run(ctx: CommandContext): Promise<number> {
    const file = requirePositional(ctx.args, 0, 'file');
    const out = stringFlag(ctx.args, 'out', 'o');
    const recipient = stringFlag(ctx.args, 'email');
    if (recipient !== undefined && !isEmailAddress(recipient)) {
      throw new UsageError(`Invalid email address: ${recipient}`);
    }

    const services = await createServices(ctx.config, ctx.logger, out ? { outputDir: path.resolve(out) } : {});
    const payload = await readJsonFile(file);
    const outcome = await services.orchestrator.buildReport(payload, {
      includeChart: booleanFlag(ctx.args, 'chart') ?? ctx.config.includeChart,
      source: path.basename(file),
      ...(recipient ? { recipientEmail: recipient } : {}),
    });

    const summary = toReportSummary(outcome.bundle);
    const { delivery } = outcome;

    if (ctx.output.isJson) {
      ctx.output.json({
        ...summary,
        chartError: outcome.chartError?.message ?? null,
        delivery: delivery.status === 'failed'
          ? { status: 'failed', recipient: delivery.recipient, reason: delivery.failure.message }
          : delivery,
      });
    } else {
      ctx.output.success(`Report ${summary.key}: overall score ${formatScore(summary.overallScore)} / 100`);
      ctx.output.log(`  PDF:   ${summary.pdfPath}`);
      ctx.output.log(`  Chart: ${summary.chartPath ?? 'not rendered'}`);
      if (outcome.chartError) {
        ctx.output.warn(`Chart skipped: ${outcome.chartError.message}`);
      }
      if (delivery.status === 'sent') {
        ctx.output.success(`Emailed to ${delivery.recipient}`);
      } else if (delivery.status === 'failed') {
        ctx.output.error(delivery.failure.message);
      }
    }

    return delivery.status === 'failed' ? EXIT_FAILURE : EXIT_OK;
  },
};

registerCommand(reportCommand);

export default reportCommand;

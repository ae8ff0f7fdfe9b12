import * as fs from 'node:fs';
import type { Command, CommandContext } from './index.js';
import { EXIT_OK, registerCommand, requirePositional, UsageError } from './index.js';
import { formatScore } from '../../chart/svg.js';
import { errorMessage } from '../../errors.js';
import { inspectReport, type ReportInspection } from '../../pdf/inspect.js';

const inspectCommand: Command = {
  name: 'inspect',
  usage: 'inspect <pdf>',
  description: 'Read the score summary embedded in a generated report',
  async run(ctx: CommandContext): Promise<number> {
    const file = requirePositional(ctx.args, 0, 'pdf');
    if (!fs.existsSync(file)) {
      throw new UsageError(`File not found: ${file}`);
    }

    const bytes = await fs.promises.readFile(file);
    let report: ReportInspection;
    try {
      report = await inspectReport(bytes);
    } catch (error) {
      throw new UsageError(`Not a readable health score report: ${errorMessage(error)}`);
    }

    if (ctx.output.isJson) {
      ctx.output.json(report);
      return EXIT_OK;
    }

    ctx.output.log(`${report.title ?? '(untitled)'}`);
    ctx.output.log(`Pages: ${report.pageCount}, chart: ${report.imageCount > 0 ? 'yes' : 'no'}`);
    ctx.output.log(`Overall score: ${formatScore(report.overallScore)}`);
    ctx.output.log('');
    ctx.output.log(ctx.output.table(
      ['Category', 'Score'],
      Object.entries(report.categoryScores).map(([id, score]) => [id, formatScore(score)])
    ));
    return EXIT_OK;
  },
};

registerCommand(inspectCommand);

export default inspectCommand;

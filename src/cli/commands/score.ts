import * as path from 'node:path';
import type { Command, CommandContext } from './index.js';
import { EXIT_OK, registerCommand, requirePositional } from './index.js';
import { formatScore } from '../../chart/svg.js';
import { loadScoringEngine } from '../../config/loader.js';
import { readJsonFile } from '../../utils/json.js';

const scoreCommand: Command = {
  name: 'score',
  usage: 'score <file>',
  description: 'Score an assessment payload without rendering anything',
  async run(ctx: CommandContext): Promise<number> {
    const file = requirePositional(ctx.args, 0, 'file');
    const engine = await loadScoringEngine(ctx.config.scoringTable, ctx.logger);
    const payload = await readJsonFile(file);
    const model = engine.computeScore(payload, path.basename(file));

    if (ctx.output.isJson) {
      ctx.output.json(model);
      return EXIT_OK;
    }

    ctx.output.log(`Overall score: ${formatScore(model.overallScore)} / 100 (table ${model.version})`);
    ctx.output.log('');
    ctx.output.log(ctx.output.table(
      ['Category', 'Score', 'Answers'],
      model.categories.map(c => [
        c.label,
        formatScore(c.score),
        c.defaulted ? 'default' : `${c.answered}/${c.expected}`,
      ])
    ));
    return EXIT_OK;
  },
};

registerCommand(scoreCommand);

export default scoreCommand;

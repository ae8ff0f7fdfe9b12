import type { Command, CommandContext } from './index.js';
import { EXIT_OK, registerCommand } from './index.js';
import { PayloadStore } from '../../storage/payload-store.js';
import { getDataLayout } from '../../utils/paths.js';

const filesCommand: Command = {
  name: 'files',
  usage: 'files',
  description: 'List stored webhook payloads, newest first',
  async run(ctx: CommandContext): Promise<number> {
    const store = new PayloadStore(getDataLayout(ctx.config.dataDir).payloads, ctx.logger);
    const files = await store.list();

    if (ctx.output.isJson) {
      ctx.output.json(files.map(f => ({ name: f.name, createdAt: f.createdAt.toISOString(), size: f.size })));
      return EXIT_OK;
    }

    if (files.length === 0) {
      ctx.output.log(`No stored payloads in ${store.getRoot()}`);
      return EXIT_OK;
    }

    ctx.output.log(ctx.output.table(
      ['Name', 'Received', 'Size'],
      files.map(f => [f.name, f.createdAt.toISOString(), `${f.size} B`])
    ));
    return EXIT_OK;
  },
};

registerCommand(filesCommand);

export default filesCommand;

import type { Command, CommandContext } from './index.js';
import { EXIT_OK, registerCommand } from './index.js';
import { createServices } from '../../app.js';
import { WebServer } from '../../web/server.js';

function waitForShutdown(signal: AbortSignal | undefined): Promise<void> {
  return new Promise(resolve => {
    const finish = (): void => {
      process.off('SIGINT', finish);
      process.off('SIGTERM', finish);
      resolve();
    };
    process.once('SIGINT', finish);
    process.once('SIGTERM', finish);
    if (signal?.aborted) finish();
    signal?.addEventListener('abort', finish, { once: true });
  });
}

const serveCommand: Command = {
  name: 'serve',
  usage: 'serve [--port <n>] [--host <addr>]',
  description: 'Start the webhook and report HTTP API',
  async run(ctx: CommandContext): Promise<number> {
    const services = await createServices(ctx.config, ctx.logger);
    const server = new WebServer({
      port: ctx.config.port,
      host: ctx.config.host,
      orchestrator: services.orchestrator,
      store: services.store,
      outputDir: services.layout.output,
      includeChart: ctx.config.includeChart,
      logger: ctx.logger.child({ component: 'http' }),
    });

    const address = await server.start();
    ctx.output.log(`Server running at http://${ctx.config.host}:${address.port}`);
    ctx.output.log('Press Ctrl+C to stop');
    if (ctx.output.isJson) {
      ctx.output.json({ host: ctx.config.host, port: address.port });
    }

    await waitForShutdown(ctx.signal);
    await server.stop();
    ctx.logger.info('Server stopped');
    return EXIT_OK;
  },
};

registerCommand(serveCommand);

export default serveCommand;

import { parseArgs, stringFlag, type ParsedArgs } from './parser.js';
import { createOutput, type Output } from './output.js';
import { commands, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, getCommand, UsageError } from './commands/index.js';
import { loadConfig } from '../config/loader.js';
import { ConfigurationError, errorMessage, InvalidPayloadError, PayloadNotFoundError } from '../errors.js';
import { createLogger } from '../observability/logger.js';
import { VERSION } from '../version.js';

// Import commands to register them
import './commands/serve.js';
import './commands/score.js';
import './commands/report.js';
import './commands/files.js';
import './commands/inspect.js';

export interface CliIo {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void; // also receives log lines
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

function exitCodeFor(error: unknown): number {
  if (
    error instanceof UsageError ||
    error instanceof ConfigurationError ||
    error instanceof InvalidPayloadError ||
    error instanceof PayloadNotFoundError
  ) {
    return EXIT_USAGE;
  }
  return EXIT_FAILURE;
}

// Global flags that map onto configuration keys
function configFlags(args: ParsedArgs): Record<string, unknown> {
  const flags: Record<string, unknown> = {};

  const port = stringFlag(args, 'port', 'p');
  if (port !== undefined) flags['port'] = Number(port);

  const host = stringFlag(args, 'host');
  if (host !== undefined) flags['host'] = host;

  const logLevel = stringFlag(args, 'log-level');
  if (logLevel !== undefined) flags['logLevel'] = logLevel;

  const dataDir = stringFlag(args, 'data-dir');
  if (dataDir !== undefined) flags['dataDir'] = dataDir;

  const table = stringFlag(args, 'scoring-table');
  if (table !== undefined) flags['scoringTable'] = table;

  if (args.flags['json'] === true) flags['json'] = true;

  return flags;
}

function printHelp(output: Output): void {
  output.log(`healthscore v${VERSION} - Health assessment scores, charts and PDF reports`);
  output.log('');
  output.log('Usage: healthscore <command> [options]');
  output.log('');
  output.log('Commands:');
  for (const cmd of commands.values()) {
    output.log(`  ${cmd.usage.padEnd(62)} ${cmd.description}`);
  }
  output.log('');
  output.log('Global Options:');
  output.log('  --help, -h          Show this help message');
  output.log('  --version, -v       Show version');
  output.log('  --json              Output as JSON');
  output.log('  --log-level <lvl>   Set log level (debug, info, warn, error, silent)');
  output.log('  --config <file>     Path to config file');
  output.log('  --data-dir <dir>    Where payloads and reports are stored');
  output.log('  --scoring-table <f> Scoring table JSON');
}

export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const args = parseArgs(argv);
  const output = createOutput({
    json: args.flags['json'] === true,
    ...(io.stdout ? { stdout: io.stdout } : {}),
    ...(io.stderr ? { stderr: io.stderr } : {}),
  });

  // Handle --version
  if (args.flags['version'] === true || args.flags['v'] === true) {
    if (output.isJson) output.json({ version: VERSION });
    else output.log(`healthscore v${VERSION}`);
    return EXIT_OK;
  }

  // Handle --help or no command
  if (args.flags['help'] === true || args.flags['h'] === true || !args.command) {
    printHelp(output);
    return EXIT_OK;
  }

  const cmd = getCommand(args.command);
  if (!cmd) {
    output.error(`Unknown command: ${args.command}`);
    output.log(`Run 'healthscore --help' for usage.`);
    return EXIT_USAGE;
  }

  try {
    const configPath = stringFlag(args, 'config');
    const config = await loadConfig({
      cliFlags: configFlags(args),
      ...(configPath ? { configPath } : {}),
      ...(io.cwd ? { cwd: io.cwd } : {}),
      ...(io.env ? { env: io.env } : {}),
    });
    const logger = createLogger({
      level: config.logLevel,
      json: config.json,
      ...(io.stderr ? { sink: io.stderr } : {}),
    });

    return await cmd.run({
      args,
      output,
      config,
      logger,
      ...(io.signal ? { signal: io.signal } : {}),
    });
  } catch (error) {
    output.error(errorMessage(error));
    return exitCodeFor(error);
  }
}

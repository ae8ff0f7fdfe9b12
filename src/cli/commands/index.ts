import type { HealthScoreConfig } from '../../config/schema.js';
import type { LoggerLike } from '../../observability/logger.js';
import type { ParsedArgs } from '../parser.js';
import type { Output } from '../output.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Wrong arguments on the command line. Exits with EXIT_USAGE.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CommandContext {
  args: ParsedArgs;
  output: Output;
  config: HealthScoreConfig;
  logger: LoggerLike;
  signal?: AbortSignal; // aborts long-running commands such as serve
}

export interface Command {
  name: string;
  usage: string;
  description: string;
  run(ctx: CommandContext): Promise<number>;
}

export const commands: Map<string, Command> = new Map();

export function registerCommand(cmd: Command): void {
  commands.set(cmd.name, cmd);
}

export function getCommand(name: string): Command | undefined {
  return commands.get(name);
}

export function requirePositional(args: ParsedArgs, index: number, name: string): string {
  const value = args.positionals[index];
  if (value === undefined) {
    throw new UsageError(`Missing argument <${name}>`);
  }
  return value;
}

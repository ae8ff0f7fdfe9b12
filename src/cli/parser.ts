export type FlagValue = string | boolean;

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  flags: Record<string, FlagValue>;
}

// Flags that never take a value, so `--json report.json` keeps the positional
const BOOLEAN_FLAGS = new Set(['json', 'help', 'version', 'h', 'v']);

// Helper to check if a string looks like a flag (not a negative number)
function isFlag(str: string): boolean {
  if (!str.startsWith('-') || str === '-') return false;
  return !/^-\d+(\.\d+)?$/.test(str);
}

export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: undefined,
    positionals: [],
    flags: {},
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (!arg) {
      i++;
      continue;
    }

    if (arg === '--') {
      // Everything after a bare double dash is positional
      result.positionals.push(...args.slice(i + 1));
      break;
    }

    if (arg.startsWith('--')) {
      const equalIndex = arg.indexOf('=');
      if (equalIndex !== -1) {
        result.flags[arg.slice(2, equalIndex)] = arg.slice(equalIndex + 1);
      } else if (arg.startsWith('--no-')) {
        result.flags[arg.slice(5)] = false;
      } else {
        const key = arg.slice(2);
        const nextArg = args[i + 1];
        if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !isFlag(nextArg)) {
          result.flags[key] = nextArg;
          i++; // Skip next arg as it's the value
        } else {
          result.flags[key] = true;
        }
      }
    } else if (isFlag(arg)) {
      const key = arg.slice(1);

      // Handle multiple short flags like -abc as -a -b -c
      if (key.length > 1) {
        for (const char of key) {
          result.flags[char] = true;
        }
      } else {
        const nextArg = args[i + 1];
        if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !isFlag(nextArg)) {
          result.flags[key] = nextArg;
          i++;
        } else {
          result.flags[key] = true;
        }
      }
    } else if (result.command === undefined) {
      result.command = arg;
    } else {
      result.positionals.push(arg);
    }

    i++;
  }

  return result;
}

export function stringFlag(args: ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = args.flags[name];
    if (typeof value === 'string' && value !== '') return value;
  }
  return undefined;
}

export function booleanFlag(args: ParsedArgs, name: string): boolean | undefined {
  const value = args.flags[name];
  return typeof value === 'boolean' ? value : undefined;
}

import { InvalidArgumentError } from '../errors.js';

export interface ParsedArgs {
  positionals: string[];
  options: Map<string, string | true>;
}

// Flags that never take a value
const BOOLEAN_FLAGS = new Set(['--strip-parens', '--help']);

export function parseArgs(args: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const options = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (BOOLEAN_FLAGS.has(arg)) {
      options.set(arg, true);
    } else if (arg.startsWith('--')) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new InvalidArgumentError(`Option ${arg} needs a value`);
      }
      options.set(arg, value);
      i++;
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, options };
}

export function stringOption(parsed: ParsedArgs, name: string): string | undefined {
  const value = parsed.options.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function intOption(parsed: ParsedArgs, name: string): number | undefined {
  const raw = stringOption(parsed, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentError(`Option ${name} expects an integer, got "${raw}"`);
  }
  return value;
}

export function listOption(parsed: ParsedArgs, name: string): string[] | undefined {
  const raw = stringOption(parsed, name);
  return raw?.split(',').map((item) => item.trim()).filter((item) => item);
}

/**
 * Argument parsing for CLI commands.
 *
 * `--name value` and `--name=value` set a value flag; value flags may
 * repeat. Any other `--name` is a switch. Everything else is positional.
 */

import { CliUsageError } from './errors.js';

export interface ParsedArgs {
  readonly positionals: readonly string[];
  readonly values: ReadonlyMap<string, readonly string[]>;
  readonly switches: ReadonlySet<string>;
}

/**
 * Parses arguments.
 *
 * @param args - Arguments after the command name.
 * @param valueFlags - Names (without dashes) of flags that take a value.
 * @throws CliUsageError when a value flag has no value.
 */
export function parseArgs(args: readonly string[], valueFlags: readonly string[] = []): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const switches = new Set<string>();

  const addValue = (name: string, value: string): void => {
    values.set(name, [...(values.get(name) ?? []), value]);
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (!arg.startsWith('--') || arg === '--') {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const equals = body.indexOf('=');
    const name = equals === -1 ? body : body.slice(0, equals);
    if (!valueFlags.includes(name)) {
      switches.add(name);
      continue;
    }
    if (equals !== -1) {
      addValue(name, body.slice(equals + 1));
      continue;
    }
    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new CliUsageError(`--${name} needs a value`);
    }
    addValue(name, next);
    i++;
  }

  return { positionals, values, switches };
}

/**
 * Last value given for a flag.
 */
export function flagValue(parsed: ParsedArgs, name: string): string | undefined {
  return parsed.values.get(name)?.at(-1);
}

export function flagValues(parsed: ParsedArgs, name: string): readonly string[] {
  return parsed.values.get(name) ?? [];
}

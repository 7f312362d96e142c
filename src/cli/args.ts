export interface ParsedArgs {
  flags: Record<string, string>;
  positionals: string[];
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Splits argv into --name value flags, bare switches and positionals.
 * Switches listed in booleanFlags take no value and are stored as "true".
 */
export function parseArgs(argv: string[], booleanFlags: readonly string[] = []): ParsedArgs {
  const flags: Record<string, string> = {};
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const [name, inline] = splitFlag(arg.slice(2));
    if (booleanFlags.includes(name)) {
      flags[name] = 'true';
    } else if (inline !== undefined) {
      flags[name] = inline;
    } else {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`--${name} needs a value`);
      }
      flags[name] = value;
      i++;
    }
  }

  return { flags, positionals };
}

function splitFlag(flag: string): [string, string | undefined] {
  const index = flag.indexOf('=');
  return index === -1 ? [flag, undefined] : [flag.slice(0, index), flag.slice(index + 1)];
}

/**
 * Parses a --port value; undefined means the flag was not given
 */
export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const port = Number(value);
  if (!/^\d+$/.test(value) || port < 1 || port > 65535) {
    throw new UsageError(`--port must be between 1 and 65535, got ${value}`);
  }
  return port;
}

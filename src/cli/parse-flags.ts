export type Flags = Record<string, string[] | true>;

export type ParsedArgs = {
  command?: string;
  flags: Flags;
};

export class CliUsageError extends Error {
  readonly code = "usage_error";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * `scrape --parser knifecenter --urls a b --output-type json` ->
 * `{ command: "scrape", flags: { parser: ["knifecenter"], urls: ["a", "b"], "output-type": ["json"] } }`.
 * A flag without values is `true`; `--key=value` is accepted too.
 */
export function parseFlags(argv: readonly string[]): ParsedArgs {
  const flags: Flags = {};
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      if (command === undefined && Object.keys(flags).length === 0) command = token;
      continue;
    }

    const [key, inlineValue] = token.slice(2).split(/=(.*)/s, 2);
    const valueTokens: string[] = inlineValue !== undefined ? [inlineValue] : [];
    let j = i + 1;
    while (j < argv.length && !argv[j].startsWith("--")) {
      valueTokens.push(argv[j]);
      j++;
    }

    if (valueTokens.length > 0) {
      const existing = flags[key];
      flags[key] = Array.isArray(existing) ? [...existing, ...valueTokens] : valueTokens;
      i = j - 1;
    } else if (flags[key] === undefined) {
      flags[key] = true;
    }
  }

  return { command, flags };
}

export const flagString = (flags: Flags, key: string): string | undefined => {
  const value = flags[key];
  if (value === undefined) return undefined;
  if (value === true) throw new CliUsageError(`--${key} requires a value`);
  return value[value.length - 1];
};

export const flagList = (flags: Flags, key: string): string[] => {
  const value = flags[key];
  if (value === undefined) return [];
  if (value === true) throw new CliUsageError(`--${key} requires at least one value`);
  return value;
};

export const flagInt = (flags: Flags, key: string): number | undefined => {
  const raw = flagString(flags, key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new CliUsageError(`--${key} must be an integer. Received: ${raw}`);
  return value;
};

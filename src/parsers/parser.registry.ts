import type { PageParser } from "../ports/PageParser";

export type ParserDefinition = {
  name: string;
  description: string;
  /** `options` is the parser's raw config section; validate what you need. */
  create(options: Record<string, unknown>): PageParser;
};

export class UnknownParserError extends Error {
  readonly code = "unknown_parser";
  readonly parserName: string;
  readonly available: string[];

  constructor(parserName: string, available: string[]) {
    super(`Unknown parser '${parserName}'. Available parsers: ${available.join(", ") || "(none)"}`);
    this.name = "UnknownParserError";
    this.parserName = parserName;
    this.available = available;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ParserRegistry = {
  get(name: string): ParserDefinition;
  create(name: string, options?: Record<string, unknown>): PageParser;
  listParsers(): Array<{ name: string; description: string }>;
};

export const createParserRegistry = (definitions: readonly ParserDefinition[]): ParserRegistry => {
  const byName = new Map<string, ParserDefinition>();
  for (const definition of definitions) {
    if (byName.has(definition.name)) {
      throw new Error(`Parser '${definition.name}' is registered twice`);
    }
    byName.set(definition.name, definition);
  }

  const get = (name: string): ParserDefinition => {
    const definition = byName.get(name);
    if (!definition) throw new UnknownParserError(name, Array.from(byName.keys()));
    return definition;
  };

  return {
    get,
    create: (name, options = {}) => get(name).create(options),
    listParsers: () =>
      Array.from(byName.values()).map(({ name, description }) => ({ name, description }))
  };
};

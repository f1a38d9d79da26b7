export class ConfigError extends Error {
  readonly code = "config_invalid";
  readonly source?: string;
  readonly key?: string;
  readonly cause?: unknown;

  constructor(message: string, details: { source?: string; key?: string; cause?: unknown } = {}) {
    let fullMessage = message;
    if (details.source) fullMessage += ` in ${details.source}`;
    if (details.key) fullMessage += ` for key ${details.key}`;
    super(fullMessage);
    this.name = "ConfigError";
    this.source = details.source;
    this.key = details.key;
    this.cause = details.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

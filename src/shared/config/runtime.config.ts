import { settingsCaps, type SettingsInput } from "./settings";

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalBoolean = (env: NodeJS.ProcessEnv, name: string): boolean | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  throw new Error(`${name}=${raw} must be one of true, false, 1, 0`);
};

/**
 * Reads `SCRAPER_*` overrides. Unset variables come back as `undefined`, which
 * `deepMerge` skips, so the result can be layered over file-based settings.
 */
export const loadRuntimeOverridesFromEnv = (env: NodeJS.ProcessEnv = process.env): SettingsInput => {
  const overrides: SettingsInput = {
    concurrency: parseOptionalIntInRange(env, "SCRAPER_CONCURRENCY", settingsCaps.concurrency),
    sessionsCount: parseOptionalIntInRange(env, "SCRAPER_SESSIONS_COUNT", settingsCaps.sessionsCount),
    delayMs: parseOptionalIntInRange(env, "SCRAPER_DELAY_MS", settingsCaps.delayMs),
    timeoutMs: parseOptionalIntInRange(env, "SCRAPER_TIMEOUT_MS", settingsCaps.timeoutMs),
    connectTimeoutMs: parseOptionalIntInRange(env, "SCRAPER_CONNECT_TIMEOUT_MS", settingsCaps.connectTimeoutMs),
    useProxy: parseOptionalBoolean(env, "SCRAPER_USE_PROXY"),
    userAgent: env.SCRAPER_USER_AGENT?.trim() ? env.SCRAPER_USER_AGENT.trim() : undefined
  };

  const retryCount = parseOptionalIntInRange(env, "SCRAPER_RETRY_COUNT", settingsCaps.retryCount);
  if (retryCount !== undefined) overrides.retry = { count: retryCount };

  return overrides;
};

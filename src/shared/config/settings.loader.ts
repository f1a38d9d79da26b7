import { readFile } from "fs/promises";
import path from "path";
import { silentLogger, type Logger } from "../logging/logger";
import { ConfigError } from "./config.errors";
import {
  deepMerge,
  defaultSettings,
  isPlainObject,
  resolveSettings,
  withSettingsOverrides,
  type Settings,
  type SettingsInput
} from "./settings";

export const configFileName = "scrapers.json";

export type LoadedScraperConfig = {
  settings: Settings;
  /** Raw parser section, parsers validate their own options from it. */
  parserOptions: Record<string, unknown>;
  source: string;
};

export type LoadScraperConfigArgs = {
  parserName: string;
  configDir: string;
  envOverrides?: SettingsInput;
  cliOverrides?: SettingsInput;
  logger?: Logger;
};

// fs errors can come from another realm (e.g. a test sandbox), so no instanceof here.
const errnoCode = (err: unknown): unknown =>
  typeof err === "object" && err !== null && "code" in err ? err.code : undefined;

const errorMessage = (err: unknown): string =>
  typeof err === "object" && err !== null && "message" in err && typeof err.message === "string"
    ? err.message
    : String(err);

const readOptionalFile = async (filePath: string): Promise<string | undefined> => {
  try {
    return await readFile(filePath, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw new ConfigError(`Error reading config file: ${errorMessage(err)}`, {
      source: filePath,
      cause: err
    });
  }
};

const parseConfigFile = (content: string, source: string): Record<string, unknown> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Malformed JSON: ${errorMessage(err)}`, { source, cause: err });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config root must be an object", { source });
  }
  return parsed;
};

/** Non-empty lines that do not start with `#`. */
export const readListLines = (content: string): string[] =>
  content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));

const selectParserSection = (
  raw: Record<string, unknown>,
  parserName: string,
  source: string
): Record<string, unknown> | undefined => {
  const parsers = raw.parsers;
  if (parsers === undefined) return undefined;
  if (!isPlainObject(parsers)) {
    throw new ConfigError("'parsers' must be an object", { source, key: "parsers" });
  }
  const section = parsers[parserName];
  if (section === undefined || section === null) return undefined;
  if (!isPlainObject(section)) {
    throw new ConfigError("Parser section must be an object", { source, key: `parsers.${parserName}` });
  }
  return section;
};

/**
 * Builds the settings snapshot for one parser.
 * Precedence: defaults < file section < env overrides < CLI overrides.
 */
export const loadScraperConfig = async (args: LoadScraperConfigArgs): Promise<LoadedScraperConfig> => {
  const { parserName, configDir, envOverrides = {}, cliOverrides = {}, logger = silentLogger } = args;
  const source = path.join(configDir, configFileName);

  const content = await readOptionalFile(source);
  let section: Record<string, unknown> | undefined;
  if (content === undefined) {
    logger.warn("config.file_missing", { source });
  } else {
    section = selectParserSection(parseConfigFile(content, source), parserName, source);
    if (!section) logger.warn("config.section_missing", { source, parser: parserName });
  }

  const merged = deepMerge(deepMerge(section ?? {}, envOverrides), cliOverrides);
  let settings = resolveSettings(merged, defaultSettings, source);

  if (settings.proxy.file) {
    const proxyFile = path.isAbsolute(settings.proxy.file)
      ? settings.proxy.file
      : path.join(configDir, settings.proxy.file);
    const proxyContent = await readOptionalFile(proxyFile);
    if (proxyContent === undefined) {
      logger.warn("config.proxy_file_missing", { proxyFile });
    } else {
      const loaded = readListLines(proxyContent);
      settings = withSettingsOverrides(settings, { proxy: { list: [...settings.proxy.list, ...loaded] } });
      logger.info("config.proxies_loaded", { proxyFile, count: loaded.length });
    }
  }

  return { settings, parserOptions: section ?? {}, source };
};

import { isLogLevel, logLevels, type LogLevel } from "../logging/logger";

export type Env = {
  CONFIG_DIR: string;
  OUTPUT_DIR: string;
  MONGO_URI: string;
  LOG_LEVEL: LogLevel;
};

const validateMongoUri = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid mongodb:// or mongodb+srv:// URI. Received: ${value}`);
  }

  if (parsed.protocol !== "mongodb:" && parsed.protocol !== "mongodb+srv:") {
    throw new Error(`${name} must use mongodb or mongodb+srv scheme. Received: ${value}`);
  }

  return value;
};

const validateLogLevel = (name: string, value: string): LogLevel => {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new Error(`${name} must be one of ${logLevels.join(", ")}. Received: ${value}`);
  }
  return normalized;
};

const nonEmpty = (value: string | undefined): string | undefined =>
  value != null && value.trim() !== "" ? value.trim() : undefined;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const CONFIG_DIR = nonEmpty(env.CONFIG_DIR) ?? "config";
  const OUTPUT_DIR = nonEmpty(env.OUTPUT_DIR) ?? "output";
  const MONGO_URI = validateMongoUri("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/scraper");
  const LOG_LEVEL = validateLogLevel("LOG_LEVEL", env.LOG_LEVEL ?? "info");

  return { CONFIG_DIR, OUTPUT_DIR, MONGO_URI, LOG_LEVEL };
};

import { z } from "zod";
import { ConfigError } from "./config.errors";

export const settingsCaps = {
  concurrency: { min: 1, max: 100 },
  sessionsCount: { min: 1, max: 50 },
  delayMs: { min: 0, max: 60000 },
  timeoutMs: { min: 1000, max: 300000 },
  connectTimeoutMs: { min: 100, max: 60000 },
  retryCount: { min: 0, max: 10 }
} as const;

const boundedInt = (caps: { min: number; max: number }) => z.number().int().min(caps.min).max(caps.max);

export const settingsSchema = z.object({
  concurrency: boundedInt(settingsCaps.concurrency),
  sessionsCount: boundedInt(settingsCaps.sessionsCount),
  delayMs: z.number().min(settingsCaps.delayMs.min).max(settingsCaps.delayMs.max),
  timeoutMs: boundedInt(settingsCaps.timeoutMs),
  connectTimeoutMs: boundedInt(settingsCaps.connectTimeoutMs),
  userAgent: z.string().trim().min(1),
  useProxy: z.boolean(),
  retry: z.object({
    count: boundedInt(settingsCaps.retryCount),
    delayMs: z.number().min(0),
    backoffFactor: z.number().min(1),
    maxDelayMs: z.number().min(0),
    statusCodes: z.array(z.number().int().min(100).max(599)),
    jitterRatio: z.number().min(0).max(1)
  }),
  proxy: z.object({
    list: z.array(z.string()),
    file: z.string().trim().min(1).optional(),
    maxRequestsPerProxy: z.number().int().min(1)
  }),
  batch: z.object({
    size: z.number().int().min(1),
    delayMs: z.number().min(0)
  }),
  deduplication: z.object({
    primaryKeys: z.array(z.string().trim().min(1))
  }),
  storage: z.object({
    kind: z.string().trim().min(1),
    outputFile: z.string().trim().min(1).optional()
  })
});

export type Settings = z.output<typeof settingsSchema>;
export type RetrySettings = Settings["retry"];
export type ProxySettings = Settings["proxy"];

type NestedInput<T> = T extends readonly unknown[] ? T : T extends object ? Partial<T> : T;

export type SettingsInput = {
  [K in keyof Settings]?: NestedInput<Settings[K]>;
};

export const defaultSettings: Settings = deepFreeze({
  concurrency: 1,
  sessionsCount: 1,
  delayMs: 1000,
  timeoutMs: 30000,
  connectTimeoutMs: 10000,
  userAgent:
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/133.0.0.0 Safari/537.36",
  useProxy: false,
  retry: {
    count: 3,
    delayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 30000,
    statusCodes: [408, 429, 500, 502, 503, 504],
    jitterRatio: 0
  },
  proxy: {
    list: [],
    maxRequestsPerProxy: 10
  },
  batch: {
    size: 20,
    delayMs: 1000
  },
  deduplication: {
    primaryKeys: ["url", "sku"]
  },
  storage: {
    kind: "csv"
  }
});

export const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Recursively merges `override` into `base` and returns a new object.
 * Arrays and scalars replace; `undefined` leaves the base value in place.
 */
export const deepMerge = (
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> => {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return result;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

export const validateSettings = (candidate: unknown, source?: string): Settings => {
  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(`Invalid settings: ${formatIssues(parsed.error)}`, { source, cause: parsed.error });
  }
  return deepFreeze(parsed.data);
};

/**
 * Builds a validated, frozen settings snapshot from `input` layered over `base`.
 */
export const resolveSettings = (
  input: Record<string, unknown> | SettingsInput = {},
  base: Settings = defaultSettings,
  source?: string
): Settings => validateSettings(deepMerge(base, input), source);

export const withSettingsOverrides = (settings: Settings, patch: SettingsInput): Settings =>
  resolveSettings(patch, settings);

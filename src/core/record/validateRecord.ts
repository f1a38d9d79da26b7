import { z } from "zod";
import { isPlainObject } from "../../shared/config/settings";
import type { ScrapedRecord } from "./record.types";

export class InvalidRecordError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidRecordError";
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const numericString = /^-?\d+(\.\d+)?$/;

const toNumber = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return numericString.test(trimmed) ? Number(trimmed) : value;
};

const emptyToUndefined = (value: unknown): unknown =>
  value === null || (typeof value === "string" && value.trim() === "") ? undefined : value;

const price = z.preprocess(toNumber, z.number().finite().nonnegative());

const recordSchema = z.object({
  shopName: z.string().trim().min(1),
  sku: z.preprocess(
    emptyToUndefined,
    z.union([z.string().trim(), z.number().transform(String)]).optional()
  ),
  name: z.string().trim().min(1),
  priceRegular: price,
  pricePromo: z.preprocess(emptyToUndefined, price.optional()),
  scrapedAt: z.string().datetime({ offset: true }),
  url: z.string().url()
});

export type ValidateRecordDefaults = {
  shopName: string;
  now?: () => Date;
};

const describeKind = (value: unknown): string =>
  value === null ? "null" : Array.isArray(value) ? "array" : typeof value;

/**
 * Validates one raw parser item. `shopName` and `scrapedAt` are filled in when
 * the parser leaves them out; unknown fields are stripped.
 */
export const validateRecord = async (raw: unknown, defaults: ValidateRecordDefaults): Promise<ScrapedRecord> => {
  if (!isPlainObject(raw)) {
    const issue = `(root): Expected object, received ${describeKind(raw)}`;
    throw new InvalidRecordError(`Invalid record: ${issue}`, [issue]);
  }

  const now = defaults.now ?? (() => new Date());
  const candidate = {
    ...raw,
    shopName: raw.shopName ?? defaults.shopName,
    scrapedAt: raw.scrapedAt ?? now().toISOString()
  };

  const parsed = await recordSchema.safeParseAsync(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new InvalidRecordError(`Invalid record: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
};

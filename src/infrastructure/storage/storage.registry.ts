import type { RecordStorage } from "../../ports/RecordStorage";
import { ConfigError } from "../../shared/config/config.errors";
import type { Logger } from "../../shared/logging/logger";
import { CsvRecordStorage } from "./CsvRecordStorage";
import { JsonRecordStorage } from "./JsonRecordStorage";
import { MongoRecordStorage } from "./MongoRecordStorage";

export type StorageContext = {
  mongoUri: string;
  primaryKeys: readonly string[];
  logger: Logger;
};

export type StorageDescriptor = {
  /** `file` destinations are paths, `collection` destinations are names. */
  destination: "file" | "collection";
  create(context: StorageContext): RecordStorage;
};

export type StorageRegistry = {
  kinds(): string[];
  get(kind: string): StorageDescriptor;
  create(kind: string, context: StorageContext): RecordStorage;
};

export const builtInStorages: Record<string, StorageDescriptor> = {
  csv: { destination: "file", create: ({ logger }) => new CsvRecordStorage(logger) },
  json: { destination: "file", create: ({ logger }) => new JsonRecordStorage(logger) },
  mongo: {
    destination: "collection",
    create: ({ mongoUri, primaryKeys, logger }) => new MongoRecordStorage(mongoUri, primaryKeys, logger)
  }
};

export const createStorageRegistry = (
  descriptors: Record<string, StorageDescriptor> = builtInStorages
): StorageRegistry => {
  const entries = new Map(Object.entries(descriptors));

  const get = (kind: string): StorageDescriptor => {
    const descriptor = entries.get(kind);
    if (!descriptor) {
      throw new ConfigError(`Unknown storage kind '${kind}'. Available: ${Array.from(entries.keys()).join(", ")}`, {
        key: "storage.kind"
      });
    }
    return descriptor;
  };

  return {
    kinds: () => Array.from(entries.keys()),
    get,
    create: (kind, context) => get(kind).create(context)
  };
};

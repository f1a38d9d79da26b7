import { MongoClient, type AnyBulkWriteOperation, type Collection, type Document } from "mongodb";
import { compositeKey, defaultDedupeKeys } from "../../core/record/dedupeRecords";
import type { ScrapedRecord } from "../../core/record/record.types";
import type { RecordStorage, SaveResult } from "../../ports/RecordStorage";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { recordIndexes } from "./mongo.indexes";

/**
 * Keeps the latest value seen for each key inside one batch, so a single
 * bulkWrite never targets the same document twice.
 */
export const dedupeByKeysKeepLast = (
  items: readonly ScrapedRecord[],
  primaryKeys: readonly string[]
): ScrapedRecord[] => {
  const byKey = new Map<string, ScrapedRecord>();
  for (const item of items) byKey.set(compositeKey(item, primaryKeys), item);
  return Array.from(byKey.values());
};

export const buildUpsertOps = (
  items: readonly ScrapedRecord[],
  primaryKeys: readonly string[]
): AnyBulkWriteOperation<Document>[] =>
  items.map((item) => {
    const record: Record<string, unknown> = item;
    const filter = Object.fromEntries(primaryKeys.map((key) => [key, record[key] ?? null]));
    return {
      updateOne: {
        filter,
        update: { $set: { ...item } },
        upsert: true
      }
    };
  });

/**
 * Mongo storage using bulk upsert keyed by the deduplication keys.
 * `destination` is the collection name.
 */
export class MongoRecordStorage implements RecordStorage {
  readonly kind = "mongo";
  private client?: MongoClient;
  private readonly collections = new Map<string, Collection<Document>>();
  private readonly primaryKeys: readonly string[];

  constructor(
    private readonly mongoUri: string,
    primaryKeys: readonly string[],
    private readonly logger: Logger = silentLogger,
    private readonly dbName?: string
  ) {
    this.primaryKeys = primaryKeys.length > 0 ? primaryKeys : defaultDedupeKeys;
  }

  private async getCollection(name: string): Promise<Collection<Document>> {
    const cached = this.collections.get(name);
    if (cached) return cached;

    if (!this.client) {
      const client = new MongoClient(this.mongoUri);
      await client.connect();
      this.client = client;
    }

    const col = this.client.db(this.dbName).collection(name);
    for (const idx of recordIndexes(this.primaryKeys)) {
      await col.createIndex(idx.keys, idx.options);
    }

    this.collections.set(name, col);
    return col;
  }

  async save(items: readonly ScrapedRecord[], destination: string): Promise<SaveResult> {
    if (items.length === 0) {
      this.logger.warn("storage.nothing_to_save", { kind: this.kind, destination });
      return { destination, written: 0 };
    }

    const col = await this.getCollection(destination);
    const ops = buildUpsertOps(dedupeByKeysKeepLast(items, this.primaryKeys), this.primaryKeys);
    const res = await col.bulkWrite(ops, { ordered: false });
    const upserted = res.upsertedCount ?? 0;
    const modified = res.modifiedCount ?? 0;
    this.logger.info("storage.saved", { kind: this.kind, destination, upserted, modified });
    return { destination, written: upserted + modified };
  }

  async close(): Promise<void> {
    await this.client?.close();
    this.client = undefined;
    this.collections.clear();
  }
}

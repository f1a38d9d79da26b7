import type { ScrapedRecord } from "../../core/record/record.types";
import type { RecordStorage, SaveResult } from "../../ports/RecordStorage";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { writeOutputFile } from "./fileOutput";

export class JsonRecordStorage implements RecordStorage {
  readonly kind = "json";

  constructor(private readonly logger: Logger = silentLogger) {}

  async save(items: readonly ScrapedRecord[], destination: string): Promise<SaveResult> {
    if (items.length === 0) {
      this.logger.warn("storage.nothing_to_save", { kind: this.kind, destination });
      return { destination, written: 0 };
    }

    await writeOutputFile(destination, `${JSON.stringify(items, null, 2)}\n`);
    this.logger.info("storage.saved", { kind: this.kind, destination, written: items.length });
    return { destination, written: items.length };
  }

  async close(): Promise<void> {
    return;
  }
}

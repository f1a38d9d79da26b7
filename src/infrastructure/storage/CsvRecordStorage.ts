import { stringify } from "csv-stringify/sync";
import { recordFields, type ScrapedRecord } from "../../core/record/record.types";
import type { RecordStorage, SaveResult } from "../../ports/RecordStorage";
import { silentLogger, type Logger } from "../../shared/logging/logger";
import { writeOutputFile } from "./fileOutput";

export const csvDelimiter = ";";

/** `;`-separated file with a header row in record field order. */
export class CsvRecordStorage implements RecordStorage {
  readonly kind = "csv";

  constructor(private readonly logger: Logger = silentLogger) {}

  async save(items: readonly ScrapedRecord[], destination: string): Promise<SaveResult> {
    if (items.length === 0) {
      this.logger.warn("storage.nothing_to_save", { kind: this.kind, destination });
      return { destination, written: 0 };
    }

    const content = stringify([...items], {
      header: true,
      delimiter: csvDelimiter,
      columns: [...recordFields]
    });
    await writeOutputFile(destination, content);
    this.logger.info("storage.saved", { kind: this.kind, destination, written: items.length });
    return { destination, written: items.length };
  }

  async close(): Promise<void> {
    return;
  }
}

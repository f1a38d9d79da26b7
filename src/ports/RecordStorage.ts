import type { ScrapedRecord } from "../core/record/record.types";

export type SaveResult = {
  destination: string;
  written: number;
};

export interface RecordStorage {
  readonly kind: string;
  save(items: readonly ScrapedRecord[], destination: string): Promise<SaveResult>;
  close(): Promise<void>;
}

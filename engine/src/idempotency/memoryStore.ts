import type { IdempotencyRecord } from "@incident/shared";
import type { IdempotencyStore } from "./types.js";

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly records = new Map<string, IdempotencyRecord>();

  async contains(key: string): Promise<boolean> {
    return this.records.has(key);
  }

  async get(key: string): Promise<IdempotencyRecord | null> {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  async put(key: string, record: IdempotencyRecord): Promise<boolean> {
    if (this.records.has(key)) return false;
    this.records.set(key, structuredClone(record));
    return true;
  }
}

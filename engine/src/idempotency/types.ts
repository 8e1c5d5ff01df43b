import { isJsonObject, type IdempotencyRecord } from "@incident/shared";

/**
 * Key -> result cache shared by engines that must not repeat a side effect. Records are
 * insert-once: `put` reports whether this caller's record was the one stored.
 */
export interface IdempotencyStore {
  contains(key: string): Promise<boolean>;
  get(key: string): Promise<IdempotencyRecord | null>;
  put(key: string, record: IdempotencyRecord): Promise<boolean>;
}

export function isIdempotencyRecord(value: unknown): value is IdempotencyRecord {
  return (
    isJsonObject(value) &&
    typeof value.taskId === "string" &&
    typeof value.taskName === "string" &&
    typeof value.completedAt === "string" &&
    isJsonObject(value.output)
  );
}

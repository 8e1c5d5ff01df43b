import type { Redis } from "ioredis";
import type { IdempotencyRecord } from "@incident/shared";
import { isIdempotencyRecord, type IdempotencyStore } from "./types.js";

export const IDEMPOTENCY_PREFIX = "idempotency:";

export class RedisIdempotencyStore implements IdempotencyStore {
  constructor(
    private readonly redis: Redis,
    private readonly prefix = IDEMPOTENCY_PREFIX
  ) {}

  async contains(key: string): Promise<boolean> {
    return (await this.redis.exists(this.prefix + key)) === 1;
  }

  async get(key: string): Promise<IdempotencyRecord | null> {
    const raw = await this.redis.get(this.prefix + key);
    if (raw === null) return null;
    const parsed: unknown = JSON.parse(raw);
    if (!isIdempotencyRecord(parsed)) {
      throw new Error(`Idempotency record for '${key}' is malformed.`);
    }
    return parsed;
  }

  async put(key: string, record: IdempotencyRecord): Promise<boolean> {
    const stored = await this.redis.set(this.prefix + key, JSON.stringify(record), "NX");
    return stored === "OK";
  }
}

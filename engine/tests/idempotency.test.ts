import { describe, expect, it } from "vitest";
import type { IdempotencyRecord } from "@incident/shared";
import { InMemoryIdempotencyStore } from "../src/idempotency/memoryStore.js";
import { PostgresIdempotencyStore } from "../src/idempotency/postgresStore.js";
import { RedisIdempotencyStore } from "../src/idempotency/redisStore.js";
import type { IdempotencyStore } from "../src/idempotency/types.js";

const record: IdempotencyRecord = {
  taskId: "task-1",
  taskName: "rotate",
  output: { status: "success" },
  completedAt: "2026-02-01T10:00:00.000Z"
};

type Row = { key: string; task_id: string; task_name: string; output: unknown; completed_at: Date };

/** Answers the three statements the store issues, keyed on `key`. */
class FakePool {
  readonly rows = new Map<string, Row>();

  async query(text: string, values: unknown[]) {
    const key = String(values[0]);
    if (text.includes("INSERT INTO idempotency_records")) {
      if (this.rows.has(key)) return { rows: [] };
      this.rows.set(key, {
        key,
        task_id: String(values[1]),
        task_name: String(values[2]),
        output: JSON.parse(String(values[3])),
        completed_at: new Date(String(values[4]))
      });
      return { rows: [{ key }] };
    }
    const row = this.rows.get(key);
    return { rows: row ? [row] : [] };
  }
}

class FakeRedis {
  readonly values = new Map<string, string>();

  async exists(key: string) {
    return this.values.has(key) ? 1 : 0;
  }

  async get(key: string) {
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, mode: string) {
    if (mode === "NX" && this.values.has(key)) return null;
    this.values.set(key, value);
    return "OK";
  }
}

const backends: [string, () => IdempotencyStore][] = [
  ["memory", () => new InMemoryIdempotencyStore()],
  ["postgres", () => new PostgresIdempotencyStore(new FakePool() as never)],
  ["redis", () => new RedisIdempotencyStore(new FakeRedis() as never)]
];

describe.each(backends)("%s idempotency store", (_name, create) => {
  it("stores the first record for a key and keeps it", async () => {
    const store = create();

    expect(await store.contains("rotate:bob")).toBe(false);
    expect(await store.put("rotate:bob", record)).toBe(true);
    expect(await store.put("rotate:bob", { ...record, taskId: "task-2" })).toBe(false);

    expect(await store.contains("rotate:bob")).toBe(true);
    expect(await store.get("rotate:bob")).toEqual(record);
  });

  it("returns null for unknown keys", async () => {
    expect(await create().get("missing")).toBeNull();
  });
});

describe("RedisIdempotencyStore", () => {
  it("namespaces keys", async () => {
    const redis = new FakeRedis();
    await new RedisIdempotencyStore(redis as never).put("rotate:bob", record);

    expect([...redis.values.keys()]).toEqual(["idempotency:rotate:bob"]);
  });

  it("rejects records it cannot read back", async () => {
    const redis = new FakeRedis();
    redis.values.set("idempotency:broken", JSON.stringify({ taskId: "task-1" }));

    await expect(new RedisIdempotencyStore(redis as never).get("broken")).rejects.toThrow(
      "Idempotency record for 'broken' is malformed."
    );
  });
});

describe("InMemoryIdempotencyStore", () => {
  it("keeps its own copy of a record", async () => {
    const store = new InMemoryIdempotencyStore();
    const output = { status: "success" };
    await store.put("k", { ...record, output });
    output.status = "changed";

    expect((await store.get("k"))?.output).toEqual({ status: "success" });
  });
});

import type { Pool } from "pg";
import type { IdempotencyRecord, JsonObject } from "@incident/shared";
import type { IdempotencyStore } from "./types.js";

type IdempotencyRow = {
  key: string;
  task_id: string;
  task_name: string;
  output: JsonObject;
  completed_at: Date;
};

function toIdempotencyRecord(row: IdempotencyRow): IdempotencyRecord {
  return {
    taskId: row.task_id,
    taskName: row.task_name,
    output: row.output,
    completedAt: row.completed_at.toISOString()
  };
}

export class PostgresIdempotencyStore implements IdempotencyStore {
  constructor(private readonly pool: Pool) {}

  async contains(key: string): Promise<boolean> {
    const result = await this.pool.query<{ key: string }>(
      `SELECT key FROM idempotency_records WHERE key = $1`,
      [key]
    );
    return result.rows.length > 0;
  }

  async get(key: string): Promise<IdempotencyRecord | null> {
    const result = await this.pool.query<IdempotencyRow>(
      `SELECT key, task_id, task_name, output, completed_at
       FROM idempotency_records
       WHERE key = $1`,
      [key]
    );
    const row = result.rows[0];
    return row ? toIdempotencyRecord(row) : null;
  }

  async put(key: string, record: IdempotencyRecord): Promise<boolean> {
    const inserted = await this.pool.query<{ key: string }>(
      `INSERT INTO idempotency_records (key, task_id, task_name, output, completed_at)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (key) DO NOTHING
       RETURNING key`,
      [key, record.taskId, record.taskName, JSON.stringify(record.output), record.completedAt]
    );
    return inserted.rows.length > 0;
  }
}

import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { closePool, getPool, withTransaction } from "../db.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Compiled to dist/engine/src/scripts, so the SQL is found from the package root.
function migrationsDir(): string {
  const fromSource = path.resolve(__dirname, "../../migrations");
  return __dirname.includes(`${path.sep}dist${path.sep}`)
    ? path.resolve(__dirname, "../../../../engine/migrations")
    : fromSource;
}

async function main(): Promise<void> {
  const directory = migrationsDir();
  const files = (await fs.readdir(directory))
    .filter((file) => file.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  await getPool().query(
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       version TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  for (const file of files) {
    const already = await getPool().query<{ version: string }>(
      `SELECT version FROM schema_migrations WHERE version = $1`,
      [file]
    );
    if (already.rowCount && already.rowCount > 0) {
      continue;
    }
    const sql = await fs.readFile(path.join(directory, file), "utf8");
    await withTransaction(async (client) => {
      await client.query(sql);
      await client.query(`INSERT INTO schema_migrations (version) VALUES ($1)`, [file]);
    });
    console.log(`Applied migration: ${file}`);
  }

  await closePool();
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});

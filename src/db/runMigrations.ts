import fs from "node:fs/promises";
import path from "node:path";
import { Client } from "pg";

type Migration = { name: string; sql: string };

const MIGRATIONS_DIR = path.join(__dirname, "migrations");

async function readMigrations(): Promise<Migration[]> {
  const names = (await fs.readdir(MIGRATIONS_DIR)).filter((n) => n.endsWith(".sql")).sort();
  return Promise.all(
    names.map(async (name) => ({ name, sql: await fs.readFile(path.join(MIGRATIONS_DIR, name), "utf8") }))
  );
}

/** Applies every not-yet-applied .sql file under ./migrations, in name order, one transaction each. */
export async function runMigrations(databaseUrl: string): Promise<string[]> {
  const client = new Client({ connectionString: databaseUrl });
  await client.connect();

  const applied: string[] = [];
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name text PRIMARY KEY,
        applied_at timestamptz NOT NULL DEFAULT now()
      );
    `);
    const done = await client.query<{ name: string }>("SELECT name FROM schema_migrations");
    const seen = new Set(done.rows.map((r) => r.name));

    for (const m of await readMigrations()) {
      if (seen.has(m.name)) continue;
      console.log(`[db:migrate] Applying ${m.name}`);
      await client.query("BEGIN");
      try {
        await client.query(m.sql);
        await client.query("INSERT INTO schema_migrations(name) VALUES ($1)", [m.name]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
      applied.push(m.name);
    }
  } finally {
    await client.end();
  }
  return applied;
}

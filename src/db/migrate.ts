import { env } from "../config";
import { runMigrations } from "./runMigrations";

async function main() {
  if (!env.DATABASE_URL) throw new Error("Missing env var: DATABASE_URL");
  const applied = await runMigrations(env.DATABASE_URL);
  console.log(`[db:migrate] Done (${applied.length} applied)`);
}

main().catch((err) => {
  console.error("[db:migrate] Failed:", err);
  process.exitCode = 1;
});

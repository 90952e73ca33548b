import { env } from "./config";
import { buildServer } from "./http/buildServer";
import { AlarmStore } from "./adapters/alarms/AlarmStore";
import { PgAlarmStore } from "./adapters/alarms/PgAlarmStore";
import { InMemoryAlarmStore } from "./adapters/alarms/InMemoryAlarmStore";
import { getPool } from "./db/pool";

function createAlarmStore(): AlarmStore {
  if (env.DATABASE_URL) return new PgAlarmStore(getPool());
  if (env.NODE_ENV === "production") throw new Error("Missing DATABASE_URL in production");
  console.warn("[api] DATABASE_URL not set. Using InMemoryAlarmStore (alarms are lost on restart).");
  return new InMemoryAlarmStore();
}

async function main() {
  const app = buildServer({ alarms: createAlarmStore() });

  await app.listen({ port: env.PORT, host: "0.0.0.0" });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});

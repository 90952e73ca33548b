import { DateTime } from "luxon";
import { env } from "./config";
import { ALARM_TICK_CRON, createBoss, JOB_ALARM_TICK } from "./jobs/boss";
import { getPool } from "./db/pool";
import { PgAlarmStore } from "./adapters/alarms/PgAlarmStore";
import { runAlarmTick } from "./workers/alarmTick";

async function main() {
  if (!env.DATABASE_URL) throw new Error("Missing env var: DATABASE_URL");

  const boss = createBoss(env.DATABASE_URL);
  boss.on("error", (err) => console.error("[worker] pg-boss error:", err));
  await boss.start();

  const alarms = new PgAlarmStore(getPool());

  await boss.createQueue(JOB_ALARM_TICK);
  await boss.work(JOB_ALARM_TICK, async () => {
    const events = await runAlarmTick(alarms, DateTime.now().setZone(env.DEFAULT_TIMEZONE));
    for (const event of events) {
      console.log(`[worker] ${event.type} ${event.alarmId} (${event.alarm.alarmDate} ${event.alarm.alarmTime})`);
    }
    return null;
  });

  await boss.schedule(JOB_ALARM_TICK, ALARM_TICK_CRON, {}, { tz: env.DEFAULT_TIMEZONE });

  console.log("[worker] started");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});

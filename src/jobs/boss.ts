import PgBoss from "pg-boss";

export const JOB_ALARM_TICK = "alarm-tick";

export const ALARM_TICK_CRON = "* * * * *";

export function createBoss(databaseUrl: string): PgBoss {
  return new PgBoss({ connectionString: databaseUrl });
}

import { DatabaseError, Pool } from "pg";
import { Alarm, AlarmStatus } from "../../domain/alarm/alarmClock";
import { AlarmNameTakenError, AlarmStore, CreateAlarmInput } from "./AlarmStore";

type AlarmRow = {
  id: string;
  name: string;
  alarm_date: string;
  alarm_time: string;
  snooze_minutes: number;
  is_active: boolean;
  status: AlarmStatus;
  created_at: Date;
  updated_at: Date;
};

// Dates and times come back as text so no timezone conversion happens in the driver.
const COLUMNS = `
  id, name,
  to_char(alarm_date, 'YYYY-MM-DD') AS alarm_date,
  to_char(alarm_time, 'HH24:MI:SS') AS alarm_time,
  snooze_minutes, is_active, status, created_at, updated_at
`;

const UNIQUE_VIOLATION = "23505";

function toAlarm(row: AlarmRow): Alarm {
  return {
    id: row.id,
    name: row.name,
    alarmDate: row.alarm_date,
    alarmTime: row.alarm_time,
    snoozeMinutes: row.snooze_minutes,
    isActive: row.is_active,
    status: row.status,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString()
  };
}

export class PgAlarmStore implements AlarmStore {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  async list(): Promise<Alarm[]> {
    const res = await this.pool.query<AlarmRow>(`SELECT ${COLUMNS} FROM alarms ORDER BY created_at`);
    return res.rows.map(toAlarm);
  }

  async get(id: string): Promise<Alarm | null> {
    const res = await this.pool.query<AlarmRow>(`SELECT ${COLUMNS} FROM alarms WHERE id = $1`, [id]);
    return res.rows[0] ? toAlarm(res.rows[0]) : null;
  }

  async create(input: CreateAlarmInput): Promise<Alarm> {
    try {
      const res = await this.pool.query<AlarmRow>(
        `
          INSERT INTO alarms (name, alarm_date, alarm_time, snooze_minutes)
          VALUES ($1, $2, $3, $4)
          RETURNING ${COLUMNS}
        `,
        [input.name, input.alarmDate, input.alarmTime, input.snoozeMinutes]
      );
      return toAlarm(res.rows[0]);
    } catch (err) {
      if (err instanceof DatabaseError && err.code === UNIQUE_VIOLATION) throw new AlarmNameTakenError(input.name);
      throw err;
    }
  }

  async save(alarm: Alarm): Promise<Alarm> {
    const res = await this.pool.query<AlarmRow>(
      `
        UPDATE alarms
        SET alarm_date = $2,
            alarm_time = $3,
            snooze_minutes = $4,
            is_active = $5,
            status = $6,
            updated_at = now()
        WHERE id = $1
        RETURNING ${COLUMNS}
      `,
      [alarm.id, alarm.alarmDate, alarm.alarmTime, alarm.snoozeMinutes, alarm.isActive, alarm.status]
    );
    if (!res.rows[0]) throw new Error(`Unknown alarm: ${alarm.id}`);
    return toAlarm(res.rows[0]);
  }
}

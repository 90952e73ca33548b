import { FastifyInstance } from "fastify";
import { DateTime } from "luxon";
import { z } from "zod";
import { env } from "../../config";
import { AlarmNameTakenError, AlarmStore } from "../../adapters/alarms/AlarmStore";
import {
  activateAlarm,
  Alarm,
  countdownSeconds,
  deactivateAlarm,
  initialAlarmDate,
  nextAlarmAt,
  setAlarmTime,
  snoozeAlarm,
  stopAlarm
} from "../../domain/alarm/alarmClock";
import { parseAlarmExpression } from "../../domain/parsing/parseAlarmExpression";
import { formatTimeOfDay, parseTimeOfDay } from "../../domain/parsing/parseTimeOfDay";
import { requireApiToken } from "../auth/apiAuth";
import { Clock } from "../buildServer";
import { ParseRequestSchema } from "./parse";

type AlarmParams = { Params: { id: string } };

const CreateAlarmSchema = z.object({
  name: z.string().trim().min(1).max(80),
  snoozeMinutes: z.number().int().positive().max(120).default(env.DEFAULT_SNOOZE_MINUTES),
  time: z
    .string()
    .regex(/^\d{1,2}:\d{2}(:\d{2})?$/)
    .default(env.DEFAULT_ALARM_TIME)
});

const AlarmIdSchema = z.string().uuid();

const TRANSITIONS: Record<string, (alarm: Alarm, now: DateTime) => Alarm> = {
  activate: (alarm) => activateAlarm(alarm),
  deactivate: (alarm) => deactivateAlarm(alarm),
  snooze: snoozeAlarm,
  stop: stopAlarm
};

// Ids are uuids; anything else cannot name an alarm.
async function findAlarm(store: AlarmStore, id: string): Promise<Alarm | null> {
  return AlarmIdSchema.safeParse(id).success ? store.get(id) : null;
}

function present(alarm: Alarm, now: DateTime) {
  return {
    ...alarm,
    nextAlarm: nextAlarmAt(alarm, now).toISO(),
    countdownSeconds: countdownSeconds(alarm, now)
  };
}

export function registerAlarmRoutes(app: FastifyInstance, store: AlarmStore, clock: Clock) {
  app.register(async (api) => {
    requireApiToken(api);

    api.get("/v1/alarms", async () => {
      const now = clock();
      const alarms = await store.list();
      return { ok: true, alarms: alarms.map((a) => present(a, now)) };
    });

    api.post("/v1/alarms", async (req, reply) => {
      const input = CreateAlarmSchema.parse(req.body ?? {});
      const now = clock();
      const time = parseTimeOfDay(input.time);

      let alarm: Alarm;
      try {
        alarm = await store.create({
          name: input.name,
          snoozeMinutes: input.snoozeMinutes,
          alarmDate: initialAlarmDate(time, now),
          alarmTime: formatTimeOfDay(time)
        });
      } catch (err) {
        if (!(err instanceof AlarmNameTakenError)) throw err;
        reply.code(409);
        return { ok: false, error: "name_taken" };
      }

      reply.code(201);
      return { ok: true, alarm: present(alarm, now) };
    });

    api.get<AlarmParams>("/v1/alarms/:id", async (req, reply) => {
      const alarm = await findAlarm(store, req.params.id);
      if (!alarm) {
        reply.code(404);
        return { ok: false, error: "not_found" };
      }
      return { ok: true, alarm: present(alarm, clock()) };
    });

    api.post<AlarmParams>("/v1/alarms/:id/set", async (req, reply) => {
      const input = ParseRequestSchema.parse(req.body ?? {});
      const alarm = await findAlarm(store, req.params.id);
      if (!alarm) {
        reply.code(404);
        return { ok: false, error: "not_found" };
      }

      const now = clock();
      const parsed = parseAlarmExpression(input.text, input.language ?? env.DEFAULT_LANGUAGE, {
        now,
        logger: { warn: (msg) => req.log.warn(msg) }
      });
      const saved = await store.save(setAlarmTime(alarm, parsed, now));
      req.log.info({ alarmId: saved.id, alarmDate: saved.alarmDate, alarmTime: saved.alarmTime }, "alarm set");
      return { ok: true, alarm: present(saved, now) };
    });

    for (const [action, apply] of Object.entries(TRANSITIONS)) {
      api.post<AlarmParams>(`/v1/alarms/:id/${action}`, async (req, reply) => {
        const alarm = await findAlarm(store, req.params.id);
        if (!alarm) {
          reply.code(404);
          return { ok: false, error: "not_found" };
        }
        const now = clock();
        const saved = await store.save(apply(alarm, now));
        return { ok: true, alarm: present(saved, now) };
      });
    }
  });
}

import { DateTime } from "luxon";
import { ParsedDateTime, toDateTime } from "../parsing/parseAlarmExpression";
import { formatTimeOfDay, parseTimeOfDay, TimeOfDay } from "../parsing/parseTimeOfDay";

export type AlarmStatus = "dormant" | "triggered" | "snoozed";

export type Alarm = {
  id: string;
  name: string;
  alarmDate: string; // YYYY-MM-DD
  alarmTime: string; // HH:MM:SS
  snoozeMinutes: number;
  isActive: boolean;
  status: AlarmStatus;
  createdAt: string;
  updatedAt: string;
};

export type AlarmTriggeredEvent = {
  type: "alarm_clock_triggered";
  alarmId: string;
  alarm: Alarm;
};

export type TickResult = {
  alarm: Alarm;
  event: AlarmTriggeredEvent | null;
};

function isoDate(dt: DateTime): string {
  return dt.toISODate() ?? "";
}

function clockOf(dt: DateTime): TimeOfDay {
  return { hour: dt.hour, minute: dt.minute, second: dt.second };
}

function withMoment(alarm: Alarm, moment: DateTime): Alarm {
  return { ...alarm, alarmDate: isoDate(moment), alarmTime: formatTimeOfDay(clockOf(moment)) };
}

/** The alarm's date and time as a moment in the zone of `now`. */
export function nextAlarmAt(alarm: Alarm, now: DateTime): DateTime {
  const time = parseTimeOfDay(alarm.alarmTime);
  return DateTime.fromISO(alarm.alarmDate, { zone: now.zone }).set({
    hour: time.hour,
    minute: time.minute,
    second: time.second,
    millisecond: 0
  });
}

/** Today when the time is still ahead, tomorrow when it has already passed. */
export function initialAlarmDate(time: TimeOfDay, now: DateTime): string {
  const today = now.startOf("day");
  const candidate = today.set({ hour: time.hour, minute: time.minute, second: time.second });
  return isoDate(candidate < now ? today.plus({ days: 1 }) : today);
}

/** Event id used by listeners: "alarm_clock_<name>", lower-cased, spaces as underscores. */
export function alarmEventId(name: string): string {
  return `alarm_clock_${name.toLowerCase().replace(/ /g, "_")}`;
}

export function setAlarmTime(alarm: Alarm, parsed: ParsedDateTime, now: DateTime): Alarm {
  let moment = toDateTime(parsed);
  if (moment < now) moment = moment.plus({ days: 1 });
  return { ...withMoment(alarm, moment), status: "dormant" };
}

export function activateAlarm(alarm: Alarm): Alarm {
  return { ...alarm, isActive: true, status: "dormant" };
}

export function deactivateAlarm(alarm: Alarm): Alarm {
  return { ...alarm, isActive: false, status: "dormant" };
}

/** Only a ringing alarm can be snoozed; it rings again `snoozeMinutes` from now. */
export function snoozeAlarm(alarm: Alarm, now: DateTime): Alarm {
  if (alarm.status !== "triggered") return alarm;
  const until = now.plus({ minutes: alarm.snoozeMinutes }).set({ millisecond: 0 });
  return { ...withMoment(alarm, until), status: "snoozed" };
}

/** Stopping moves the alarm to the same time on the next day. */
export function stopAlarm(alarm: Alarm, now: DateTime): Alarm {
  if (alarm.status !== "triggered" && alarm.status !== "snoozed") return alarm;
  const next = DateTime.fromISO(alarm.alarmDate, { zone: now.zone }).plus({ days: 1 });
  return { ...alarm, alarmDate: isoDate(next), status: "dormant" };
}

export function tickAlarm(alarm: Alarm, now: DateTime): TickResult {
  if (!alarm.isActive || alarm.status === "triggered") return { alarm, event: null };
  if (nextAlarmAt(alarm, now) > now) return { alarm, event: null };

  const triggered: Alarm = { ...alarm, status: "triggered" };
  return {
    alarm: triggered,
    event: { type: "alarm_clock_triggered", alarmId: alarmEventId(alarm.name), alarm: triggered }
  };
}

export function countdownSeconds(alarm: Alarm, now: DateTime): number {
  if (!alarm.isActive) return 0;
  const left = nextAlarmAt(alarm, now).diff(now, "seconds").seconds;
  return left > 0 ? Math.floor(left) : 0;
}

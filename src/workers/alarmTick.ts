import { DateTime } from "luxon";
import { AlarmStore } from "../adapters/alarms/AlarmStore";
import { AlarmTriggeredEvent, tickAlarm } from "../domain/alarm/alarmClock";

/** Marks every due alarm as triggered and returns the events to announce. */
export async function runAlarmTick(store: AlarmStore, now: DateTime): Promise<AlarmTriggeredEvent[]> {
  const events: AlarmTriggeredEvent[] = [];
  for (const alarm of await store.list()) {
    const { event } = tickAlarm(alarm, now);
    if (!event) continue;
    const saved = await store.save(event.alarm);
    events.push({ ...event, alarm: saved });
  }
  return events;
}

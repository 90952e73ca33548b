import { describe, expect, test } from "vitest";
import { DateTime } from "luxon";
import { InMemoryAlarmStore } from "../../adapters/alarms/InMemoryAlarmStore";
import { runAlarmTick } from "../alarmTick";

const ZONE = "Europe/Amsterdam";

describe("runAlarmTick", () => {
  test("triggers due active alarms once and persists them", async () => {
    const store = new InMemoryAlarmStore();
    const due = await store.create({
      name: "Bedroom",
      snoozeMinutes: 9,
      alarmDate: "2024-06-01",
      alarmTime: "07:00:00"
    });
    await store.save({ ...due, isActive: true });
    const inactive = await store.create({
      name: "Guest Room",
      snoozeMinutes: 9,
      alarmDate: "2024-06-01",
      alarmTime: "06:00:00"
    });

    const now = DateTime.fromISO("2024-06-01T07:00:20", { zone: ZONE });
    const events = await runAlarmTick(store, now);

    expect(events).toHaveLength(1);
    expect(events[0].alarmId).toBe("alarm_clock_bedroom");
    expect((await store.get(due.id))?.status).toBe("triggered");
    expect((await store.get(inactive.id))?.status).toBe("dormant");

    expect(await runAlarmTick(store, now.plus({ minutes: 1 }))).toEqual([]);
  });
});

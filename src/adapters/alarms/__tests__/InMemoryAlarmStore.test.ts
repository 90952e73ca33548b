import { describe, expect, test } from "vitest";
import { AlarmNameTakenError } from "../AlarmStore";
import { InMemoryAlarmStore } from "../InMemoryAlarmStore";

const input = { name: "Bedroom", snoozeMinutes: 9, alarmDate: "2024-06-01", alarmTime: "07:00:00" };

describe("InMemoryAlarmStore", () => {
  test("names are unique ignoring case", async () => {
    const store = new InMemoryAlarmStore();
    await store.create(input);
    await expect(store.create({ ...input, name: "BEDROOM" })).rejects.toBeInstanceOf(AlarmNameTakenError);
    expect(store.alarms.size).toBe(1);
  });

  test("saving an unknown alarm fails", async () => {
    const store = new InMemoryAlarmStore();
    const alarm = await store.create(input);
    store.alarms.clear();
    await expect(store.save(alarm)).rejects.toThrow(`Unknown alarm: ${alarm.id}`);
  });
});

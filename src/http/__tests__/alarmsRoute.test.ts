import { afterAll, beforeEach, describe, expect, test } from "vitest";
import { DateTime } from "luxon";
import { InMemoryAlarmStore } from "../../adapters/alarms/InMemoryAlarmStore";
import { runAlarmTick } from "../../workers/alarmTick";
import { buildServer } from "../buildServer";

const ZONE = "Europe/Amsterdam";
const AUTH = { authorization: "Bearer test-api-token" };

describe("Alarms API", () => {
  const store = new InMemoryAlarmStore();
  let now = DateTime.fromISO("2024-06-01T06:00:00", { zone: ZONE });
  const app = buildServer({ alarms: store, clock: () => now });

  beforeEach(() => {
    store.alarms.clear();
    now = DateTime.fromISO("2024-06-01T06:00:00", { zone: ZONE });
  });

  afterAll(async () => {
    await app.close();
  });

  async function createAlarm(name: string): Promise<string> {
    const res = await app.inject({ method: "POST", url: "/v1/alarms", headers: AUTH, payload: { name } });
    expect(res.statusCode).toBe(201);
    return res.json().alarm.id;
  }

  test("requires the API token", async () => {
    const missing = await app.inject({ method: "GET", url: "/v1/alarms" });
    expect(missing.statusCode).toBe(401);

    const wrong = await app.inject({
      method: "GET",
      url: "/v1/alarms",
      headers: { authorization: "Bearer nope" }
    });
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({ ok: false, error: "unauthorized" });
  });

  test("creates an inactive alarm at the default time", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/v1/alarms",
      headers: AUTH,
      payload: { name: "Bedroom" }
    });
    expect(res.statusCode).toBe(201);
    expect(res.json().alarm).toMatchObject({
      name: "Bedroom",
      alarmDate: "2024-06-01",
      alarmTime: "07:00:00",
      snoozeMinutes: 9,
      isActive: false,
      status: "dormant",
      nextAlarm: "2024-06-01T07:00:00.000+02:00",
      countdownSeconds: 0
    });

    const dup = await app.inject({
      method: "POST",
      url: "/v1/alarms",
      headers: AUTH,
      payload: { name: "bedroom" }
    });
    expect(dup.statusCode).toBe(409);
    expect(dup.json()).toEqual({ ok: false, error: "name_taken" });
  });

  test("sets the time from an expression and counts down once active", async () => {
    const id = await createAlarm("Bedroom");

    const set = await app.inject({
      method: "POST",
      url: `/v1/alarms/${id}/set`,
      headers: AUTH,
      payload: { text: "tomorrow at 6:30" }
    });
    expect(set.statusCode).toBe(200);
    expect(set.json().alarm).toMatchObject({ alarmDate: "2024-06-02", alarmTime: "06:30:00" });

    const activated = await app.inject({ method: "POST", url: `/v1/alarms/${id}/activate`, headers: AUTH });
    expect(activated.json().alarm).toMatchObject({ isActive: true, countdownSeconds: 88200 });

    const bad = await app.inject({
      method: "POST",
      url: `/v1/alarms/${id}/set`,
      headers: AUTH,
      payload: { text: "someday" }
    });
    expect(bad.statusCode).toBe(422);
    expect(bad.json().error).toBe("invalid_date_format");
  });

  test("concurrent creates with one name give a single alarm", async () => {
    const [first, second] = await Promise.all([
      app.inject({ method: "POST", url: "/v1/alarms", headers: AUTH, payload: { name: "Study" } }),
      app.inject({ method: "POST", url: "/v1/alarms", headers: AUTH, payload: { name: "study" } })
    ]);
    expect([first.statusCode, second.statusCode].sort()).toEqual([201, 409]);
    expect(store.alarms.size).toBe(1);
  });

  test("unknown alarms are 404", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/alarms/missing", headers: AUTH });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: "not_found" });

    const stop = await app.inject({ method: "POST", url: "/v1/alarms/missing/stop", headers: AUTH });
    expect(stop.statusCode).toBe(404);
  });

  test("a ringing alarm can be snoozed and stopped", async () => {
    const id = await createAlarm("Kids Room");
    await app.inject({ method: "POST", url: `/v1/alarms/${id}/activate`, headers: AUTH });

    now = DateTime.fromISO("2024-06-01T07:00:10", { zone: ZONE });
    const events = await runAlarmTick(store, now);
    expect(events.map((e) => e.alarmId)).toEqual(["alarm_clock_kids_room"]);

    const snoozed = await app.inject({ method: "POST", url: `/v1/alarms/${id}/snooze`, headers: AUTH });
    expect(snoozed.json().alarm).toMatchObject({
      alarmDate: "2024-06-01",
      alarmTime: "07:09:10",
      status: "snoozed",
      countdownSeconds: 540
    });

    const stopped = await app.inject({ method: "POST", url: `/v1/alarms/${id}/stop`, headers: AUTH });
    expect(stopped.json().alarm).toMatchObject({ alarmDate: "2024-06-02", status: "dormant" });

    const listed = await app.inject({ method: "GET", url: "/v1/alarms", headers: AUTH });
    expect(listed.json().alarms).toHaveLength(1);
  });
});

describe("Alarms API with a uuid-typed store", () => {
  // Postgres rejects a non-uuid id with an error instead of an empty result.
  class UuidColumnStore extends InMemoryAlarmStore {
    async get(id: string) {
      if (!/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/.test(id)) {
        throw new Error(`invalid input syntax for type uuid: "${id}"`);
      }
      return super.get(id);
    }
  }

  const app = buildServer({
    alarms: new UuidColumnStore(),
    clock: () => DateTime.fromISO("2024-06-01T06:00:00", { zone: ZONE })
  });

  afterAll(async () => {
    await app.close();
  });

  test("a malformed id is 404 without reaching the store", async () => {
    const res = await app.inject({ method: "GET", url: "/v1/alarms/not-a-uuid", headers: AUTH });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: "not_found" });

    const snooze = await app.inject({ method: "POST", url: "/v1/alarms/not-a-uuid/snooze", headers: AUTH });
    expect(snooze.statusCode).toBe(404);
  });

  test("a well-formed unknown id is 404", async () => {
    const res = await app.inject({
      method: "GET",
      url: "/v1/alarms/00000000-0000-4000-8000-000000000000",
      headers: AUTH
    });
    expect(res.statusCode).toBe(404);
  });
});

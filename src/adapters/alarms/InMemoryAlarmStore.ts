import { randomUUID } from "node:crypto";
import { Alarm } from "../../domain/alarm/alarmClock";
import { AlarmNameTakenError, AlarmStore, CreateAlarmInput } from "./AlarmStore";

export class InMemoryAlarmStore implements AlarmStore {
  public alarms = new Map<string, Alarm>();

  async list(): Promise<Alarm[]> {
    return [...this.alarms.values()].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  async get(id: string): Promise<Alarm | null> {
    return this.alarms.get(id) ?? null;
  }

  async create(input: CreateAlarmInput): Promise<Alarm> {
    const key = input.name.toLowerCase();
    if ([...this.alarms.values()].some((a) => a.name.toLowerCase() === key)) {
      throw new AlarmNameTakenError(input.name);
    }
    const now = new Date().toISOString();
    const alarm: Alarm = {
      id: randomUUID(),
      ...input,
      isActive: false,
      status: "dormant",
      createdAt: now,
      updatedAt: now
    };
    this.alarms.set(alarm.id, alarm);
    return alarm;
  }

  async save(alarm: Alarm): Promise<Alarm> {
    if (!this.alarms.has(alarm.id)) throw new Error(`Unknown alarm: ${alarm.id}`);
    const saved = { ...alarm, updatedAt: new Date().toISOString() };
    this.alarms.set(saved.id, saved);
    return saved;
  }
}

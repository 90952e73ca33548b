import { Alarm } from "../../domain/alarm/alarmClock";

export type CreateAlarmInput = {
  name: string;
  snoozeMinutes: number;
  alarmDate: string;
  alarmTime: string;
};

/** Alarm names are unique, ignoring case. */
export class AlarmNameTakenError extends Error {
  constructor(public readonly alarmName: string) {
    super(`An alarm named "${alarmName}" already exists`);
    this.name = "AlarmNameTakenError";
  }
}

export interface AlarmStore {
  list(): Promise<Alarm[]>;
  get(id: string): Promise<Alarm | null>;
  create(input: CreateAlarmInput): Promise<Alarm>;
  save(alarm: Alarm): Promise<Alarm>;
}

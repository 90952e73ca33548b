import { z } from "zod";

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3007),

  // Optional because tests/local dev can run with the in-memory alarm store.
  DATABASE_URL: z.string().min(1).optional(),

  // Single shared token guarding the alarm routes.
  API_TOKEN: z.string().min(1).optional(),

  DEFAULT_TIMEZONE: z.string().min(1).default("UTC"),
  DEFAULT_LANGUAGE: z.string().min(2).default("en"),
  DEFAULT_SNOOZE_MINUTES: z.coerce.number().int().positive().max(120).default(9),
  DEFAULT_ALARM_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d:[0-5]\d$/)
    .default("07:00:00")
});

export type Env = z.infer<typeof EnvSchema>;

export const env: Env = EnvSchema.parse(process.env);

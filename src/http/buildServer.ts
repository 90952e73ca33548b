import Fastify, { FastifyInstance } from "fastify";
import { DateTime } from "luxon";
import { ZodError } from "zod";
import { env } from "../config";
import { AlarmStore } from "../adapters/alarms/AlarmStore";
import { DateTimeParseError } from "../domain/parsing/errors";
import { registerHealthRoutes } from "./routes/health";
import { registerParseRoutes } from "./routes/parse";
import { registerAlarmRoutes } from "./routes/alarms";

export type AppServices = {
  alarms: AlarmStore;
  // Tests pin the clock; everything else reads the configured local time.
  clock?: () => DateTime;
};

export type Clock = () => DateTime;

export function systemClock(): DateTime {
  return DateTime.now().setZone(env.DEFAULT_TIMEZONE);
}

export function buildServer(services: AppServices): FastifyInstance {
  const app = Fastify({ logger: env.NODE_ENV !== "test" });
  const clock: Clock = services.clock ?? systemClock;

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ZodError) {
      reply.code(400);
      return reply.send({ ok: false, error: "invalid_request", issues: err.issues.map((i) => i.message) });
    }
    if (err instanceof DateTimeParseError) {
      // Shown to the user as a validation error, message and all.
      req.log.info({ code: err.code, input: err.input }, "unparseable expression");
      reply.code(422);
      return reply.send({ ok: false, error: err.code, message: err.message });
    }
    return reply.send(err);
  });

  registerHealthRoutes(app);
  registerParseRoutes(app, clock);
  registerAlarmRoutes(app, services.alarms, clock);

  return app;
}

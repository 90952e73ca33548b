import { FastifyInstance } from "fastify";
import { z } from "zod";
import { env } from "../../config";
import { supportedLanguages } from "../../domain/language/languageProfiles";
import { formatParsed, parseAlarmExpression } from "../../domain/parsing/parseAlarmExpression";
import { Clock } from "../buildServer";

export const ParseRequestSchema = z.object({
  text: z.string().max(200),
  language: z.string().min(2).max(16).optional()
});

export function registerParseRoutes(app: FastifyInstance, clock: Clock) {
  app.get("/v1/languages", async () => ({ ok: true, languages: supportedLanguages() }));

  app.post("/v1/parse", async (req) => {
    const input = ParseRequestSchema.parse(req.body ?? {});
    const parsed = parseAlarmExpression(input.text, input.language ?? env.DEFAULT_LANGUAGE, {
      now: clock(),
      logger: { warn: (msg) => req.log.warn(msg) }
    });
    return { ok: true, ...formatParsed(parsed) };
  });
}

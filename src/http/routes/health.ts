import { FastifyInstance } from "fastify";
import { supportedLanguages } from "../../domain/language/languageProfiles";

export function registerHealthRoutes(app: FastifyInstance) {
  app.get("/healthz", async () => ({ ok: true, languages: supportedLanguages() }));
}

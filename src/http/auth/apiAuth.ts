import { FastifyInstance } from "fastify";
import { env } from "../../config";

function extractBearer(headerValue: string | undefined): string | null {
  if (!headerValue?.startsWith("Bearer ")) return null;
  return headerValue.slice("Bearer ".length).trim() || null;
}

export function requireApiToken(app: FastifyInstance) {
  app.addHook("preHandler", async (req, reply) => {
    const expected = env.API_TOKEN;
    if (!expected) {
      // Misconfigured environment.
      reply.code(503);
      return reply.send({ ok: false, error: "api_token_not_configured" });
    }

    const token = extractBearer(req.headers["authorization"]);
    if (!token || token !== expected) {
      reply.header("WWW-Authenticate", "Bearer");
      reply.code(401);
      return reply.send({ ok: false, error: "unauthorized" });
    }
  });
}

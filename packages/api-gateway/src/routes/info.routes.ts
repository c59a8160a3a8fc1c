import type { FastifyInstance } from "fastify";
import { SUPPORTED_LANGUAGES, languageLabel } from "@tetraglot/languages";
import { HELP_MESSAGE } from "../messages.js";
import { ok } from "./envelope.js";

export async function infoRoutes(fastify: FastifyInstance): Promise<void> {
  /** GET /v1/languages — supported languages in display order */
  fastify.get("/v1/languages", async (req, reply) => {
    const languages = SUPPORTED_LANGUAGES.map((code) => ({ code, label: languageLabel(code) }));
    return reply.send(ok({ languages }, req.id));
  });

  /** GET /v1/help — input formats */
  fastify.get("/v1/help", async (req, reply) => {
    return reply.send(ok({ reply: HELP_MESSAGE }, req.id));
  });
}

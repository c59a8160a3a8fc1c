import type { FastifyInstance } from "fastify";
import type { Config } from "../config/index.js";

export async function healthRoutes(fastify: FastifyInstance, opts: { config: Config }): Promise<void> {
  const { config } = opts;

  /** GET /health — liveness (always 200 if the process is running) */
  fastify.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      uptime: Math.floor(process.uptime()),
      ts: new Date().toISOString(),
    });
  });

  /** GET /health/ready — readiness (checks the provider key is configured) */
  fastify.get("/health/ready", async (_request, reply) => {
    if (!config.llmApiKey) {
      return reply.code(503).send({ status: "error", reason: "LLM_API_KEY not configured" });
    }
    return reply.send({
      status: "ok",
      model: config.llmModel,
      rateLimit: `${config.rateLimitMax} req / ${config.rateLimitWindowMs / 1000}s`,
    });
  });
}

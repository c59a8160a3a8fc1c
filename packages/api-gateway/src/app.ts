import Fastify, { type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { createConversationService, type CacheBackend, type ProviderGateway } from "@tetraglot/translator";

import type { Config } from "./config/index.js";
import { healthRoutes } from "./routes/health.routes.js";
import { infoRoutes } from "./routes/info.routes.js";
import { messageRoutes } from "./routes/messages.routes.js";
import { userRoutes } from "./routes/users.routes.js";

export interface AppDeps {
  config: Config;
  /** Single-attempt provider; retries are applied per the config */
  gateway: ProviderGateway;
  cacheBackend: CacheBackend;
}

/** Rate-limit bucket: the user id when the request names one, else the IP */
export function rateLimitKey(request: FastifyRequest): string {
  const { params, body } = request;
  if (typeof params === "object" && params !== null && "userId" in params && typeof params.userId === "string") {
    return `user:${params.userId}`;
  }
  if (typeof body === "object" && body !== null && "userId" in body && typeof body.userId === "string") {
    return `user:${body.userId}`;
  }
  return `ip:${request.ip}`;
}

export async function buildApp(deps: AppDeps) {
  const { config } = deps;

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      redact: ["req.headers.authorization", "req.headers[\"x-api-key\"]", "*.apiKey", "*.llmApiKey"],
    },
    requestIdHeader: "x-request-id",
    requestIdLogLabel: "requestId",
    trustProxy: true,
    bodyLimit: 64 * 1024,
    // Provider calls with retries can take a while
    connectionTimeout: config.providerTimeoutMs * (config.providerMaxRetries + 1) + 15_000,
    keepAliveTimeout: 5_000,
  });

  const conversation = createConversationService({
    gateway: deps.gateway,
    cacheBackend: deps.cacheBackend,
    maxRetries: config.providerMaxRetries,
    history: { enabled: config.historyEnabled, limit: config.historyLimit },
    logger: fastify.log,
  });

  // ─── Plugins ────────────────────────────────────────────────────────────────

  await fastify.register(helmet, {
    contentSecurityPolicy: config.env === "production",
  });

  await fastify.register(cors, {
    origin: (_origin, cb) => cb(null, true),
    methods: ["GET", "POST", "PUT", "OPTIONS"],
    allowedHeaders: ["Content-Type", "X-Request-ID", "Origin", "Accept"],
  });

  await fastify.register(rateLimit, {
    global: true,
    // Run after body parsing so POST bodies can name the user
    hook: "preHandler",
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindowMs,
    keyGenerator: rateLimitKey,
    // Thrown by the plugin; the error handler below wraps it in the envelope
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      code: "RATE_LIMITED",
      message: `Too many requests. Retry after ${Math.ceil(context.ttl / 1000)}s.`,
    }),
  });

  // ─── OpenAPI ─────────────────────────────────────────────────────────────────

  await fastify.register(swagger, {
    openapi: {
      info: { title: "Tetraglot API", description: "Four-language chat translation (ru, en, de, hy)", version: "0.1.0" },
    },
  });

  await fastify.register(swaggerUi, { routePrefix: "/docs", uiConfig: { deepLinking: true } });

  // ─── Routes ─────────────────────────────────────────────────────────────────

  await fastify.register(healthRoutes, { config });
  await fastify.register(infoRoutes);
  await fastify.register(messageRoutes, { conversation });
  await fastify.register(userRoutes, { conversation });

  // ─── Error handlers ──────────────────────────────────────────────────────────

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) fastify.log.error({ err: error, requestId: request.id }, "Unhandled error");
    void reply.code(statusCode).send({
      data: null,
      requestId: request.id,
      errors: [{
        code: error.code ?? "INTERNAL_ERROR",
        message: statusCode >= 500 ? "An internal server error occurred." : error.message,
      }],
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send({
      data: null,
      requestId: request.id,
      errors: [{ code: "NOT_FOUND", message: `${request.method} ${request.url} not found.` }],
    });
  });

  return fastify;
}

/**
 * Per-user settings.
 *
 * GET /v1/users/:userId/pair      → active pair, or auto mode
 * PUT /v1/users/:userId/pair      → { pair: "en-de" | "auto" }
 * GET /v1/users/:userId/history   → recent translations, newest first
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { normalizePair } from "@tetraglot/languages";
import type { ConversationService } from "@tetraglot/translator";
import {
  AUTO_MODE_MESSAGE,
  HISTORY_DISABLED_MESSAGE,
  HISTORY_EMPTY_MESSAGE,
  INVALID_PAIR_MESSAGE,
  formatHistory,
  pairSavedMessage,
} from "../messages.js";
import { badRequest, firstIssue, ok } from "./envelope.js";
import { UserIdSchema } from "./messages.routes.js";

const UserParamsSchema = z.object({ userId: UserIdSchema });
const PairBodySchema = z.object({ pair: z.string().trim().min(1) });

export async function userRoutes(
  fastify: FastifyInstance,
  opts: { conversation: ConversationService }
): Promise<void> {
  const { conversation } = opts;

  fastify.get("/v1/users/:userId/pair", async (req, reply) => {
    const params = UserParamsSchema.safeParse(req.params);
    if (!params.success) return reply.code(400).send(badRequest(firstIssue(params.error.issues), req.id));

    const pair = await conversation.getActivePair(params.data.userId);
    return reply.send(ok({ mode: pair ? "pair" : "auto", pair }, req.id));
  });

  fastify.put("/v1/users/:userId/pair", async (req, reply) => {
    const params = UserParamsSchema.safeParse(req.params);
    if (!params.success) return reply.code(400).send(badRequest(firstIssue(params.error.issues), req.id));
    const body = PairBodySchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send(badRequest(firstIssue(body.error.issues), req.id));

    if (body.data.pair.toLowerCase() === "auto") {
      await conversation.clearActivePair(params.data.userId);
      return reply.send(ok({ mode: "auto", pair: null, reply: AUTO_MODE_MESSAGE }, req.id));
    }

    const directional = normalizePair(body.data.pair);
    const pair = directional ? await conversation.setActivePair(params.data.userId, directional[0], directional[1]) : null;
    if (!pair) return reply.code(400).send(badRequest(INVALID_PAIR_MESSAGE, req.id, "INVALID_PAIR"));

    return reply.send(ok({ mode: "pair", pair, reply: pairSavedMessage(pair) }, req.id));
  });

  fastify.get("/v1/users/:userId/history", async (req, reply) => {
    const params = UserParamsSchema.safeParse(req.params);
    if (!params.success) return reply.code(400).send(badRequest(firstIssue(params.error.issues), req.id));

    if (!conversation.historyEnabled) {
      return reply.send(ok({ enabled: false, entries: [], reply: HISTORY_DISABLED_MESSAGE }, req.id));
    }
    const entries = await conversation.listHistory(params.data.userId);
    return reply.send(
      ok({ enabled: true, entries, reply: entries.length > 0 ? formatHistory(entries) : HISTORY_EMPTY_MESSAGE }, req.id)
    );
  });
}

/**
 * Message routes: the chat surface.
 *
 * POST /v1/messages                  → translate one message
 * POST /v1/users/:userId/clarify     → name the language of the pending message
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { normalizeLanguage } from "@tetraglot/languages";
import type { ClarifyResult, ConversationService } from "@tetraglot/translator";
import {
  NOTHING_TO_CLARIFY_MESSAGE,
  TRANSLATION_ERROR_MESSAGE,
  UNKNOWN_LANGUAGE_MESSAGE,
  formatTranslationReply,
  rejectionMessage,
} from "../messages.js";
import { badRequest, firstIssue, ok } from "./envelope.js";

export const UserIdSchema = z.string().trim().min(1).max(128);

const MessageBodySchema = z.object({
  userId: UserIdSchema,
  text: z.string(),
});

const ClarifyBodySchema = z.object({
  language: z.string().min(1),
});

const UserParamsSchema = z.object({ userId: UserIdSchema });

/** Reply text plus a machine-readable outcome */
export function toReplyPayload(outcome: ClarifyResult, showSource: (mode: string) => boolean) {
  switch (outcome.kind) {
    case "rejected":
      return { status: "rejected", reason: outcome.reason, reply: rejectionMessage(outcome.reason) };
    case "translated":
      return {
        status: "translated",
        reply: formatTranslationReply(outcome.result, { showSource: showSource(outcome.result.mode) }),
        fromCache: outcome.fromCache,
        result: outcome.result,
      };
    case "failed":
      return {
        status: "failed",
        reason: outcome.error.kind,
        reply: outcome.error.kind === "unknown_language" ? UNKNOWN_LANGUAGE_MESSAGE : TRANSLATION_ERROR_MESSAGE,
      };
    case "nothing_to_clarify":
      return { status: "nothing_to_clarify", reply: NOTHING_TO_CLARIFY_MESSAGE };
  }
}

export async function messageRoutes(
  fastify: FastifyInstance,
  opts: { conversation: ConversationService }
): Promise<void> {
  const { conversation } = opts;

  fastify.post("/v1/messages", async (req, reply) => {
    const parsed = MessageBodySchema.safeParse(req.body);
    if (!parsed.success) return reply.code(400).send(badRequest(firstIssue(parsed.error.issues), req.id));

    const outcome = await conversation.handleText(parsed.data.userId, parsed.data.text);
    return reply.send(ok(toReplyPayload(outcome, (mode) => mode === "auto_all"), req.id));
  });

  fastify.post("/v1/users/:userId/clarify", async (req, reply) => {
    const params = UserParamsSchema.safeParse(req.params);
    if (!params.success) return reply.code(400).send(badRequest(firstIssue(params.error.issues), req.id));
    const body = ClarifyBodySchema.safeParse(req.body);
    if (!body.success) return reply.code(400).send(badRequest(firstIssue(body.error.issues), req.id));

    const language = normalizeLanguage(body.data.language);
    if (!language) {
      return reply.code(400).send(badRequest(`Unsupported language: ${body.data.language}`, req.id, "UNSUPPORTED_LANGUAGE"));
    }

    const outcome = await conversation.clarify(params.data.userId, language);
    // A clarified message always shows which language it was read as
    return reply.send(ok(toReplyPayload(outcome, () => true), req.id));
  });
}

/**
 * Challenge/response authentication routes (Web Site role).
 *
 * GET  <path>?address=alice@example.org - Resolve the address and issue an
 *                                         encrypted challenge (JWE body)
 * POST <path>                           - Submit the signed response (JWS body)
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { FanErrorCode, JOSE_JSON_MIME, JOSE_MIME, formatDid } from "@fan-auth/core";
import { writeLimitConfig } from "../middleware/rateLimit.js";

/** Response header carrying the issued attempt id. */
export const ATTEMPT_HEADER = "x-fan-attempt";

export interface AuthRoutesOptions {
  path: string;
}

// ---------------------------------------------------------------------------
// Helper
// ---------------------------------------------------------------------------

function sendError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  message: string,
  details: Record<string, unknown> = {},
): FastifyReply {
  return reply.status(statusCode).send({
    error: { code, message, details },
  });
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export default async function authRoutes(
  fastify: FastifyInstance,
  options: AuthRoutesOptions,
): Promise<void> {
  // JWS bodies arrive as text in either serialization.
  fastify.addContentTypeParser(
    [JOSE_MIME, JOSE_JSON_MIME],
    { parseAs: "string" },
    async (_request: FastifyRequest, body: string) => body,
  );

  // ---------- GET <path>?address= - Issue challenge ----------

  fastify.get(
    options.path,
    async (
      request: FastifyRequest<{ Querystring: { address?: string } }>,
      reply: FastifyReply,
    ) => {
      const { address } = request.query;
      if (typeof address !== "string" || address === "") {
        return sendError(reply, 400, FanErrorCode.MALFORMED_ADDRESS, "Query parameter \"address\" is required");
      }

      const document = await fastify.resolver.resolve(address);
      const issued = await fastify.authenticator.issue(document);

      return reply
        .header(ATTEMPT_HEADER, issued.attempt.identifier)
        .header("cache-control", "no-store")
        .header("content-type", issued.mediaType)
        .send(issued.jwe);
    },
  );

  // ---------- POST <path> - Verify response ----------

  fastify.post(
    options.path,
    { config: writeLimitConfig },
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const { body } = request;
      if (typeof body !== "string" || body.trim() === "") {
        return sendError(
          reply,
          400,
          FanErrorCode.MALFORMED_PAYLOAD,
          `Body must be a JWS sent as ${JOSE_MIME} or ${JOSE_JSON_MIME}`,
        );
      }

      const result = await fastify.authenticator.respond(body.trim());
      return reply.header("cache-control", "no-store").send({
        status: "authenticated",
        did: formatDid(result.subjectDid),
        attempt: result.attemptId,
      });
    },
  );
}

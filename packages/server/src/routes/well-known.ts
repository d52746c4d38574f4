/**
 * Document and health routes.
 *
 * GET /fan.did                - Agent's self-signed document
 * GET /did-fan/user/:name.did - User document signed by the agent
 * GET /health                 - Health check
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { AGENT_TRUST_PATH, FanErrorCode, USER_PATH_PREFIX, formatDid } from "@fan-auth/core";
import type { DocumentRequest, ServedDocument } from "../services/documents.js";

const DOCUMENT_SUFFIX = ".did";

// ---------------------------------------------------------------------------
// Helpers
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

function conditionalHeaders(request: FastifyRequest): DocumentRequest {
  return {
    accept: request.headers.accept,
    ifModifiedSince: request.headers["if-modified-since"],
    ifNoneMatch: request.headers["if-none-match"],
  };
}

function sendDocument(reply: FastifyReply, served: ServedDocument): FastifyReply {
  reply
    .header("last-modified", served.lastModified.toUTCString())
    .header("etag", served.etag)
    .header("cache-control", "no-cache");

  if (served.status === 304) {
    return reply.status(304).send();
  }
  return reply.status(200).header("content-type", served.mediaType).send(served.body);
}

// ---------------------------------------------------------------------------
// Plugin
// ---------------------------------------------------------------------------

export default async function wellKnownRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  // ---------- GET /fan.did - Agent document ----------

  fastify.get(
    AGENT_TRUST_PATH,
    async (request: FastifyRequest, reply: FastifyReply) => {
      const served = await fastify.documents.serveRoot(conditionalHeaders(request));
      return sendDocument(reply, served);
    },
  );

  // ---------- GET /did-fan/user/:file - User document ----------

  fastify.get(
    `${USER_PATH_PREFIX}:file`,
    async (
      request: FastifyRequest<{ Params: { file: string } }>,
      reply: FastifyReply,
    ) => {
      const { file } = request.params;
      if (!file.endsWith(DOCUMENT_SUFFIX) || file.length === DOCUMENT_SUFFIX.length) {
        return sendError(reply, 404, FanErrorCode.DOCUMENT_NOT_FOUND, "Not a DID document path", {
          path: request.url,
        });
      }

      const name = file.slice(0, -DOCUMENT_SUFFIX.length);
      const served = await fastify.documents.serveUser(name, conditionalHeaders(request));
      return sendDocument(reply, served);
    },
  );

  // ---------- GET /health - Health check ----------

  fastify.get(
    "/health",
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const uptimeSeconds = Math.floor(
        (Date.now() - fastify.startedAt) / 1000,
      );

      return reply.send({
        status: "ok",
        version: "0.1.0",
        did: formatDid(fastify.documents.rootDid),
        uptime_seconds: uptimeSeconds,
      });
    },
  );
}

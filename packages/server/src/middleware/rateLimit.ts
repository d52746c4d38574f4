/**
 * Rate limiting configuration.
 *
 * Read routes: `rateLimitRead` req/min per IP (set globally in app.ts)
 * Write routes: `rateLimitWrite` req/min per IP
 */

import type { FastifyRequest, RouteOptions } from "fastify";
import { config } from "../config.js";

/**
 * Rate limit configuration for write routes (challenge responses).
 * Takes effect only when the rate-limit plugin is registered.
 */
export const writeLimitConfig: RouteOptions["config"] = {
  rateLimit: {
    max: config.rateLimitWrite,
    timeWindow: "1 minute",
    keyGenerator: (request: FastifyRequest) => request.ip,
  },
};

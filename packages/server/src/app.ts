/**
 * Fastify application setup.
 *
 * One process plays both server roles: as an Agent it serves `/fan.did` and
 * the user documents it vouches for; as a Web Site it issues and checks
 * challenges. Exports `buildApp()` for testing and `start()` for production.
 */

import "dotenv/config";

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import type { JWK } from "jose";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import {
  ChallengeAuthenticator,
  DocumentCache,
  FanErrorCode,
  Resolver,
  formatDid,
  isFanError,
  type Fetcher,
  type SovereignSource,
} from "@fan-auth/core";

import { config } from "./config.js";
import { Database } from "./db/schema.js";
import { DocumentService } from "./services/documents.js";
import { loadSigningKeys } from "./services/signing-keys.js";
import {
  FileSystemStorage,
  SqliteStorage,
  type StorageDriver,
} from "./services/storage.js";

import authRoutes from "./routes/auth.js";
import wellKnownRoutes from "./routes/well-known.js";

// ---------------------------------------------------------------------------
// Fastify type augmentation - decorate instance with services
// ---------------------------------------------------------------------------

declare module "fastify" {
  interface FastifyInstance {
    documents: DocumentService;
    resolver: Resolver;
    authenticator: ChallengeAuthenticator;
    startedAt: number;
  }
}

export interface AppOverrides {
  databaseUrl: string;
  skipRateLimit: boolean;
  logLevel: string;
  domain: string;
  storage: StorageDriver;
  signingKeys: JWK[];
  fetcher: Fetcher;
  sovereignSource: SovereignSource;
  cacheFallback: boolean;
  attemptTtlMs: number;
}

export function createStorage(databaseUrl: string = config.databaseUrl): StorageDriver {
  if (config.storageDriver === "filesystem") {
    return new FileSystemStorage(config.storageRoot, config.documentFormat);
  }
  mkdirSync(dirname(databaseUrl), { recursive: true });
  return new SqliteStorage(new Database(databaseUrl));
}

// ---------------------------------------------------------------------------
// Build application
// ---------------------------------------------------------------------------

export async function buildApp(
  overrides?: Partial<AppOverrides>,
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: overrides?.logLevel ?? config.logLevel,
      ...(config.nodeEnv === "development"
        ? { transport: { target: "pino-pretty" } }
        : {}),
    },
  });

  // -----------------------------------------------------------------------
  // Plugins
  // -----------------------------------------------------------------------

  await app.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
    exposedHeaders: ["x-fan-attempt", "last-modified", "etag"],
  });

  if (!overrides?.skipRateLimit) {
    await app.register(rateLimit, {
      global: true,
      max: config.rateLimitRead,
      timeWindow: "1 minute",
    });
  }

  // -----------------------------------------------------------------------
  // Services
  // -----------------------------------------------------------------------

  const signingKeys = overrides?.signingKeys ?? (await loadSigningKeys(config.signingKeysPath));
  const storage = overrides?.storage ?? createStorage(overrides?.databaseUrl ?? config.databaseUrl);

  const documents = new DocumentService({
    storage,
    signingKeys,
    domain: overrides?.domain ?? config.domain,
    defaultFormat: config.documentFormat,
    authPath: config.authPath,
    logger: app.log,
  });

  const resolver = new Resolver({
    fetcher: overrides?.fetcher,
    cache: new DocumentCache({ ttlMs: config.cacheTtlMs }),
    refresh: "always",
    fallbackToCache: overrides?.cacheFallback ?? config.cacheFallback,
    sovereignSource: overrides?.sovereignSource,
    logger: app.log,
  });

  const authenticator = new ChallengeAuthenticator({
    attemptTtlMs: overrides?.attemptTtlMs ?? config.attemptTtlMs,
    logger: app.log,
  });
  authenticator.startSweeper(config.attemptSweepMs);

  // -----------------------------------------------------------------------
  // Decorate Fastify instance
  // -----------------------------------------------------------------------

  app.decorate("documents", documents);
  app.decorate("resolver", resolver);
  app.decorate("authenticator", authenticator);
  app.decorate("startedAt", Date.now());

  // -----------------------------------------------------------------------
  // Global error handler (before routes, which capture it when defined)
  // -----------------------------------------------------------------------

  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    if (isFanError(error)) {
      if (error.httpStatus >= 500) {
        request.log.error(error);
      } else {
        request.log.info({ code: error.code }, error.message);
      }
      return reply.status(error.httpStatus).send({
        error: {
          code: error.code,
          message: error.message,
          details: error.details ?? {},
        },
      });
    }

    const statusCode = error.statusCode ?? 500;

    // Rate limit errors from @fastify/rate-limit
    if (statusCode === 429) {
      return reply.status(429).send({
        error: {
          code: FanErrorCode.RATE_LIMIT_EXCEEDED,
          message: "Rate limit exceeded",
          details: { retryAfter: error.message },
        },
      });
    }

    // Fastify's own request errors (bad media type, empty body)
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        error: {
          code: FanErrorCode.MALFORMED_PAYLOAD,
          message: error.message,
          details: {},
        },
      });
    }

    request.log.error(error);

    return reply.status(statusCode).send({
      error: {
        code: FanErrorCode.INTERNAL_ERROR,
        message:
          config.nodeEnv === "production"
            ? "Internal server error"
            : error.message,
        details:
          config.nodeEnv === "production" ? {} : { stack: error.stack },
      },
    });
  });

  // -----------------------------------------------------------------------
  // Routes
  // -----------------------------------------------------------------------

  await app.register(wellKnownRoutes);
  await app.register(authRoutes, { path: config.authPath });

  // -----------------------------------------------------------------------
  // Graceful shutdown - clean up resources on Fastify close
  // -----------------------------------------------------------------------

  app.addHook("onClose", async () => {
    authenticator.stopSweeper();
    storage.close();
  });

  return app;
}

// ---------------------------------------------------------------------------
// Production start
// ---------------------------------------------------------------------------

export async function start(): Promise<void> {
  const app = await buildApp();

  // Graceful shutdown on signals
  const shutdown = async () => {
    app.log.info("Shutting down...");
    try {
      await app.close();
      process.exit(0);
    } catch (err) {
      app.log.error(err, "Error during shutdown");
      process.exit(1);
    }
  };
  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(
      `FAN agent ${formatDid(app.documents.rootDid)} listening on port ${config.port} (${config.nodeEnv})`,
    );
  } catch (err) {
    app.log.fatal(err);
    process.exit(1);
  }
}

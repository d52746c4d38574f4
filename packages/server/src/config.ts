/**
 * Server configuration.
 *
 * Loads environment variables with defaults for local development.
 */

import { DID_CBOR_MIME, DID_JSON_MIME } from "@fan-auth/core";

export type StorageDriverName = "sqlite" | "filesystem";

export interface ServerConfig {
  /** HTTP port (default 3400) */
  port: number;
  /** Listen address */
  host: string;
  /** "development" | "production" | "test" */
  nodeEnv: string;
  /** Pino log level */
  logLevel: string;

  /** Domain (and optional `:port`) this site serves documents for */
  domain: string;

  /** Where served documents are kept */
  storageDriver: StorageDriverName;
  /** SQLite database file path */
  databaseUrl: string;
  /** Root directory for the filesystem driver */
  storageRoot: string;
  /** Serialization of documents on disk (filesystem driver) */
  documentFormat: string;

  /** JWK Set (or single JWK) file holding the private signing keys */
  signingKeysPath: string;

  /** Path of the challenge/response endpoint */
  authPath: string;
  /** Lifetime of an issued challenge */
  attemptTtlMs: number;
  /** Interval of the pending-attempt sweep */
  attemptSweepMs: number;
  /** Lifetime of cached DID documents */
  cacheTtlMs: number;
  /** Serve cached documents when a refresh fails at the transport level */
  cacheFallback: boolean;

  /** Read endpoints: max requests per minute per IP */
  rateLimitRead: number;
  /** Write endpoints: max requests per minute per IP */
  rateLimitWrite: number;
}

function envInt(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envStr(key: string, fallback: string): string {
  const raw = process.env[key];
  return raw !== undefined && raw !== "" ? raw : fallback;
}

function envBool(key: string, fallback: boolean): boolean {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

function envChoice<T extends string>(key: string, choices: readonly T[], fallback: T): T {
  const raw = process.env[key];
  return choices.find((choice) => choice === raw) ?? fallback;
}

export const config: ServerConfig = {
  port: envInt("PORT", 3400),
  host: envStr("HOST", "0.0.0.0"),
  nodeEnv: envStr("NODE_ENV", "development"),
  logLevel: envStr("LOG_LEVEL", "info"),

  domain: envStr("FAN_DOMAIN", "localhost"),

  storageDriver: envChoice<StorageDriverName>("STORAGE_DRIVER", ["sqlite", "filesystem"], "sqlite"),
  databaseUrl: envStr("DATABASE_URL", "./data/fan.db"),
  storageRoot: envStr("STORAGE_ROOT", "./data/root"),
  documentFormat: envChoice("DOCUMENT_FORMAT", [DID_JSON_MIME, DID_CBOR_MIME], DID_JSON_MIME),

  signingKeysPath: envStr("SIGNING_KEYS", "./data/signing.jwks"),

  authPath: envStr("AUTH_PATH", "/fan/auth"),
  attemptTtlMs: envInt("ATTEMPT_TTL_MS", 300_000),
  attemptSweepMs: envInt("ATTEMPT_SWEEP_MS", 60_000),
  cacheTtlMs: envInt("CACHE_TTL_MS", 3_600_000),
  cacheFallback: envBool("CACHE_FALLBACK", false),

  rateLimitRead: envInt("RATE_LIMIT_READ", 100),
  rateLimitWrite: envInt("RATE_LIMIT_WRITE", 20),
};

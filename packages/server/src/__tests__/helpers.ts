/**
 * Shared server test helpers.
 */

import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { FastifyInstance } from "fastify";
import type { JWK } from "jose";
import { generateKeyPair, type Fetcher, type JwkPair } from "@fan-auth/core";

export function makeTestDir(prefix: string): string {
  const dir = join(tmpdir(), `fan-${prefix}-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTestDir(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // cleanup best-effort
  }
}

export async function makeSigningKeys(count: number): Promise<{ pairs: JwkPair[]; privateJwks: JWK[] }> {
  const pairs: JwkPair[] = [];
  for (let i = 0; i < count; i++) {
    pairs.push(await generateKeyPair("P-256"));
  }
  return { pairs, privateJwks: pairs.map((pair) => pair.privateJwk) };
}

/**
 * A fetcher that dispatches `https://<host>/...` to the Fastify app
 * registered for that host through `inject()`. Unknown hosts fail like a
 * refused connection.
 */
export function injectFetcher(hosts: Record<string, FastifyInstance>): Fetcher {
  return async (url, request = {}) => {
    const app = hosts[url.host];
    if (!app) {
      throw new Error(`connect ECONNREFUSED ${url.host}`);
    }

    const headers: Record<string, string> = {};
    if (request.ifModifiedSince) {
      headers["if-modified-since"] = request.ifModifiedSince.toUTCString();
    }
    if (request.accept) {
      headers.accept = request.accept;
    }

    const response = await app.inject({ method: "GET", url: url.pathname + url.search, headers });
    const contentType = response.headers["content-type"];
    const lastModified = response.headers["last-modified"];
    return {
      status: response.statusCode,
      body: new Uint8Array(response.rawPayload),
      contentType: typeof contentType === "string" ? contentType : undefined,
      lastModified: typeof lastModified === "string" ? new Date(lastModified) : undefined,
    };
  };
}

/** Media type without parameters. */
export function essence(contentType: string | string[] | number | undefined): string | undefined {
  return typeof contentType === "string" ? contentType.split(";")[0].trim() : undefined;
}

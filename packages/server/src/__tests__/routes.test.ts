/**
 * Route integration tests.
 *
 * Uses Fastify's inject() method for end-to-end route testing
 * without starting a real HTTP server.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import { join } from "node:path";
import type { FastifyInstance } from "fastify";
import type { JWK } from "jose";
import {
  FanErrorCode,
  JOSE_JSON_MIME,
  JOSE_MIME,
  formatDid,
  generateKeyPair,
  keysFor,
  signCompactJws,
  verifyAgentSelfSignature,
  verifySubjectSignature,
  type JwkPair,
} from "@fan-auth/core";

import { buildApp } from "../app.js";
import { essence, makeSigningKeys, makeTestDir, removeTestDir } from "./helpers.js";

// ---------------------------------------------------------------------------
// Test setup
// ---------------------------------------------------------------------------

const ALICE_MODIFIED = new Date("2026-01-05T10:00:00Z");

let app: FastifyInstance;
let testDir: string;
let signingKeys: JWK[];
let alice: JwkPair;

beforeAll(async () => {
  signingKeys = (await makeSigningKeys(2)).privateJwks;
  alice = await generateKeyPair("P-256");
});

beforeEach(async () => {
  testDir = makeTestDir("route-test");

  app = await buildApp({
    databaseUrl: join(testDir, "test.db"),
    skipRateLimit: true,
    logLevel: "silent",
    domain: "agent.test",
    signingKeys,
  });
  await app.documents.publish("alice", { authentication: [alice.publicJwk] }, ALICE_MODIFIED);
});

afterEach(async () => {
  await app.close();
  removeTestDir(testDir);
});

async function rootDocument() {
  const response = await app.inject({ method: "GET", url: "/fan.did" });
  return verifyAgentSelfSignature("agent.test", {
    status: response.statusCode,
    body: new Uint8Array(response.rawPayload),
  });
}

// ===========================================================================
// Health endpoint
// ===========================================================================

describe("GET /health", () => {
  it("should return health status with the agent DID", async () => {
    const response = await app.inject({ method: "GET", url: "/health" });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe("ok");
    expect(body.version).toBe("0.1.0");
    expect(body.did).toBe("did:fan:agent.test:fan-agent");
    expect(body.uptime_seconds).toBeGreaterThanOrEqual(0);
  });
});

// ===========================================================================
// Agent document
// ===========================================================================

describe("GET /fan.did", () => {
  it("should serve a document signed by every agent key", async () => {
    const response = await app.inject({ method: "GET", url: "/fan.did" });

    expect(response.statusCode).toBe(200);
    expect(essence(response.headers["content-type"])).toBe(JOSE_JSON_MIME);
    expect(response.headers["last-modified"]).toBeDefined();
    expect(response.headers["etag"]).toMatch(/^W\/"/);

    const doc = await rootDocument();
    expect(formatDid(doc.subjectDid)).toBe("did:fan:agent.test:fan-agent");
    expect(keysFor(doc, "authentication")).toHaveLength(2);
  });

  it("should answer 304 to a conditional request with its own Last-Modified", async () => {
    const first = await app.inject({ method: "GET", url: "/fan.did" });
    const lastModified = first.headers["last-modified"];
    expect(typeof lastModified).toBe("string");

    const second = await app.inject({
      method: "GET",
      url: "/fan.did",
      headers: { "if-modified-since": typeof lastModified === "string" ? lastModified : "" },
    });
    expect(second.statusCode).toBe(304);
    expect(second.body).toBe("");
  });
});

// ===========================================================================
// User documents
// ===========================================================================

describe("GET /did-fan/user/:name.did", () => {
  it("should serve a user document the agent vouches for", async () => {
    const response = await app.inject({ method: "GET", url: "/did-fan/user/alice.did" });

    expect(response.statusCode).toBe(200);
    expect(response.headers["last-modified"]).toBe("Mon, 05 Jan 2026 10:00:00 GMT");

    const doc = await verifySubjectSignature(await rootDocument(), response.body);
    expect(formatDid(doc.subjectDid)).toBe("did:fan:agent.test:alice");
    expect(keysFor(doc, "authentication")).toEqual([alice.publicJwk]);
  });

  it("should serve percent-encoded identifiers", async () => {
    await app.documents.publish("無爲", { authentication: [alice.publicJwk] });
    const response = await app.inject({
      method: "GET",
      url: "/did-fan/user/%e7%84%a1%e7%88%b2.did",
    });

    expect(response.statusCode).toBe(200);
    const doc = await verifySubjectSignature(await rootDocument(), response.body);
    expect(formatDid(doc.subjectDid)).toBe("did:fan:agent.test:%e7%84%a1%e7%88%b2");
  });

  it("should answer 304 when the document has not changed", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/did-fan/user/alice.did",
      headers: { "if-modified-since": "Mon, 05 Jan 2026 10:00:00 GMT" },
    });
    expect(response.statusCode).toBe(304);
  });

  it("should return 404 for unknown identifiers", async () => {
    const response = await app.inject({ method: "GET", url: "/did-fan/user/nobody.did" });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe(FanErrorCode.DOCUMENT_NOT_FOUND);
  });

  it("should return 404 for paths without the .did suffix", async () => {
    const response = await app.inject({ method: "GET", url: "/did-fan/user/alice" });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe(FanErrorCode.DOCUMENT_NOT_FOUND);
  });

  it("should reject names that could escape the store", async () => {
    const response = await app.inject({ method: "GET", url: "/did-fan/user/.hidden.did" });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe(FanErrorCode.MALFORMED_ADDRESS);
  });
});

// ===========================================================================
// Authentication endpoint (input validation)
// ===========================================================================

describe("Authentication endpoint", () => {
  it("GET /fan/auth - should require an address", async () => {
    const response = await app.inject({ method: "GET", url: "/fan/auth" });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe(FanErrorCode.MALFORMED_ADDRESS);
  });

  it("GET /fan/auth - should reject malformed addresses", async () => {
    const response = await app.inject({
      method: "GET",
      url: "/fan/auth?address=not-an-address",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: {
        code: FanErrorCode.MALFORMED_ADDRESS,
        message: 'Address "not-an-address" has no "@"',
        details: {},
      },
    });
  });

  it("GET /fan/auth - should reject a malformed port", async () => {
    const response = await app.inject({
      method: "GET",
      url: `/fan/auth?address=${encodeURIComponent("alice@agent.test:70000")}`,
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe(FanErrorCode.MALFORMED_PORT);
  });

  it("POST /fan/auth - should reject bodies that are not a JWS", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/fan/auth",
      headers: { "content-type": JOSE_MIME },
      payload: "not-a-jws",
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().error.code).toBe(FanErrorCode.MALFORMED_PAYLOAD);
  });

  it("POST /fan/auth - should reject unsupported media types", async () => {
    const response = await app.inject({
      method: "POST",
      url: "/fan/auth",
      headers: { "content-type": "application/xml" },
      payload: "<jws/>",
    });

    expect(response.statusCode).toBe(415);
    expect(response.json().error.code).toBe(FanErrorCode.MALFORMED_PAYLOAD);
  });

  it("POST /fan/auth - should reject responses for unknown attempts", async () => {
    const payload = { data: Buffer.alloc(32).toString("base64"), identifier: "no-such-attempt" };
    const jws = await signCompactJws(new TextEncoder().encode(JSON.stringify(payload)), alice.privateJwk);

    const response = await app.inject({
      method: "POST",
      url: "/fan/auth",
      headers: { "content-type": JOSE_MIME },
      payload: jws,
    });

    expect(response.statusCode).toBe(401);
    expect(response.json().error).toEqual({
      code: FanErrorCode.UNKNOWN_ATTEMPT,
      message: "No pending authentication attempt no-such-attempt",
      details: { attempt: "no-such-attempt" },
    });
  });
});

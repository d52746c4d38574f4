import type { JWK } from "jose";
import { generateKeyPair, type JwkPair, type KeyCurve } from "../crypto/keys.js";
import { buildDIDDocument, type DocumentKeys, toDIDDocument } from "../did/document.js";
import { DID_JSON_MIME, encodeDocument } from "../did/formats.js";
import { addressToDid, agentTrustUrl, didToLookupUrl, parseAddress } from "../did/identifier.js";
import { signDocument } from "../trust/envelope.js";
import type { Did, DIDDocument, DIDDocumentWire } from "../types/did.js";
import { type FanErrorCode, isFanError } from "../types/errors.js";
import { JOSE_MIME, type Fetcher, type FetchResponse } from "../types/fetch.js";

// ---------------------------------------------------------------------------
// Parties
// ---------------------------------------------------------------------------

export interface TestAgent {
  domain: string;
  port?: number;
  did: string;
  keys: JwkPair[];
  wire: DIDDocumentWire;
  /** Private halves of every authentication key. */
  signingKeys: JWK[];
  trustUrl: URL;
}

export interface TestUser {
  address: string;
  did: Did;
  keys: JwkPair[];
  wire: DIDDocumentWire;
  lookupUrl: URL;
}

export async function makeAgent(domain: string, keyCount = 2, port?: number): Promise<TestAgent> {
  const keys: JwkPair[] = [];
  for (let i = 0; i < keyCount; i++) {
    keys.push(await generateKeyPair("P-256"));
  }
  const authority = port !== undefined ? `${domain}%3F${port}` : domain;
  const did = `did:fan:${authority}:fan-agent`;
  const wire = buildDIDDocument(did, { authentication: keys.map((k) => k.publicJwk) });
  return {
    domain,
    port,
    did,
    keys,
    wire,
    signingKeys: keys.map((k) => k.privateJwk),
    trustUrl: agentTrustUrl(domain, port),
  };
}

export async function makeUser(address: string, curves: KeyCurve[] = ["P-256"]): Promise<TestUser> {
  const did = addressToDid(parseAddress(address));
  const keys: JwkPair[] = [];
  for (const curve of curves) {
    keys.push(await generateKeyPair(curve));
  }
  const wire = buildDIDDocument(did, { authentication: keys.map((k) => k.publicJwk) });
  return { address, did, keys, wire, lookupUrl: didToLookupUrl(did) };
}

/** A sovereign user whose document certifies itself. */
export async function makeSovereign(identifier: string): Promise<{ did: Did; key: JwkPair; jws: string }> {
  const did = addressToDid(parseAddress(`${identifier}@_sovereign_`));
  const key = await generateKeyPair("P-256");
  const keys: DocumentKeys = { authentication: [key.publicJwk], capabilityInvocation: [key.publicJwk] };
  const signed = await signDocument(buildDIDDocument(did, keys), DID_JSON_MIME, [key.privateJwk]);
  return { did, key, jws: signed.body };
}

export async function signedAgentDocument(agent: TestAgent, signers = agent.signingKeys): Promise<string> {
  return (await signDocument(agent.wire, DID_JSON_MIME, signers)).body;
}

export async function signedUserDocument(
  agent: TestAgent,
  user: Pick<TestUser, "wire">,
  signers = agent.signingKeys,
): Promise<string> {
  return (await signDocument(user.wire, DID_JSON_MIME, signers)).body;
}

/** A verified-model document built directly, for tests that skip the trust pipeline. */
export function modelOf(wire: DIDDocumentWire): DIDDocument {
  return toDIDDocument(wire, encodeDocument(wire, DID_JSON_MIME), DID_JSON_MIME);
}

/** The FanError code `fn` throws, if any. */
export function thrownCode(fn: () => unknown): FanErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    return isFanError(err) ? err.code : undefined;
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// In-process fetcher
// ---------------------------------------------------------------------------

export interface StubRoute {
  status?: number;
  body?: string;
  lastModified?: Date;
}

export interface RecordedRequest {
  url: string;
  ifModifiedSince?: Date;
}

/**
 * Serves canned responses by URL. A route holding an Error simulates a
 * transport failure; unknown URLs answer 404. Honours If-Modified-Since for
 * routes that carry a Last-Modified.
 */
export class StubFetcher {
  readonly routes = new Map<string, StubRoute | Error>();
  readonly requests: RecordedRequest[] = [];

  readonly fetch: Fetcher = async (url, request = {}) => {
    this.requests.push({ url: url.href, ifModifiedSince: request.ifModifiedSince });
    const route = this.routes.get(url.href);
    if (route === undefined) {
      return { status: 404, body: new Uint8Array() };
    }
    if (route instanceof Error) {
      throw route;
    }
    if (
      route.lastModified &&
      request.ifModifiedSince &&
      route.lastModified.getTime() <= request.ifModifiedSince.getTime()
    ) {
      return { status: 304, body: new Uint8Array(), lastModified: route.lastModified };
    }
    const response: FetchResponse = {
      status: route.status ?? 200,
      body: new TextEncoder().encode(route.body ?? ""),
      contentType: JOSE_MIME,
      lastModified: route.lastModified,
    };
    return response;
  };

  serve(url: URL, body: string, lastModified?: Date): void {
    this.routes.set(url.href, { body, lastModified });
  }

  fail(url: URL, error: Error | StubRoute): void {
    this.routes.set(url.href, error);
  }

  countFor(url: URL): number {
    return this.requests.filter((r) => r.url === url.href).length;
  }
}

export function ok(body: string): FetchResponse {
  return { status: 200, body: new TextEncoder().encode(body), contentType: JOSE_MIME };
}

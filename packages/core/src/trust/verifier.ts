/**
 * Trust verification of served documents.
 *
 * Three roots of trust:
 * - an agent's `/fan.did` must be signed by every key in its own
 *   `authentication` set;
 * - a user document must be signed by every key in the agent's
 *   `authentication` set;
 * - a sovereign document must be signed by every key in its own
 *   `capabilityInvocation` set. Nobody vouches for the binding between a
 *   sovereign identifier and its keys, so callers may still refuse it.
 */

import type { JWK } from "jose";
import { verifyAllSigned } from "../crypto/signing.js";
import { keysFor, toDIDDocument } from "../did/document.js";
import { formatDid } from "../did/identifier.js";
import type { DIDDocument } from "../types/did.js";
import { FanError, FanErrorCode, isFanError } from "../types/errors.js";
import type { FetchResponse } from "../types/fetch.js";
import { openDocumentEnvelope, type OpenedEnvelope } from "./envelope.js";

/** Codes that mean "the bytes could not be read", folded into the caller's untrusted code. */
const MALFORMED_CODES: ReadonlySet<FanErrorCode> = new Set([
  FanErrorCode.MALFORMED_PAYLOAD,
  FanErrorCode.MALFORMED_DOCUMENT,
]);

function open(serialized: string, untrusted: FanErrorCode, what: string): OpenedEnvelope {
  try {
    return openDocumentEnvelope(serialized);
  } catch (err) {
    if (isFanError(err) && MALFORMED_CODES.has(err.code)) {
      throw new FanError(untrusted, `${what}: ${err.message}`, undefined, { cause: err });
    }
    throw err;
  }
}

function toModel(envelope: OpenedEnvelope, untrusted: FanErrorCode, what: string): DIDDocument {
  try {
    return toDIDDocument(envelope.wire, envelope.bytes, envelope.contentType);
  } catch (err) {
    if (isFanError(err) && MALFORMED_CODES.has(err.code)) {
      throw new FanError(untrusted, `${what}: ${err.message}`, undefined, { cause: err });
    }
    throw err;
  }
}

async function requireSigners(
  envelope: OpenedEnvelope,
  required: readonly JWK[],
  untrusted: FanErrorCode,
  what: string,
): Promise<void> {
  if (required.length === 0) {
    throw new FanError(
      FanErrorCode.NO_VERIFICATION_METHODS,
      `${what}: required signer set is empty`,
    );
  }
  if (!(await verifyAllSigned(envelope.jws, required))) {
    throw new FanError(untrusted, `${what}: not signed by every required key`, {
      required: required.map((jwk) => jwk.kid ?? null),
    });
  }
}

function bodyText(response: FetchResponse): string {
  return new TextDecoder().decode(response.body);
}

/**
 * Verify an agent's self-signed trust document as fetched from
 * `https://<domain>[:port]/fan.did`. The document's DID must carry the same
 * domain and port.
 * @throws {FanError} AGENT_DOCUMENT_UNREACHABLE for a non-2xx response,
 *   AGENT_UNTRUSTED or NO_VERIFICATION_METHODS otherwise.
 */
export async function verifyAgentSelfSignature(
  domain: string,
  fetched: FetchResponse,
  port?: number,
): Promise<DIDDocument> {
  const authority = port !== undefined ? `${domain}:${port}` : domain;
  const what = `Agent document for ${authority}`;
  if (fetched.status < 200 || fetched.status >= 300) {
    throw new FanError(
      FanErrorCode.AGENT_DOCUMENT_UNREACHABLE,
      `${what} returned HTTP ${fetched.status}`,
      { domain, status: fetched.status },
    );
  }

  const envelope = open(bodyText(fetched), FanErrorCode.AGENT_UNTRUSTED, what);
  const document = toModel(envelope, FanErrorCode.AGENT_UNTRUSTED, what);
  await requireSigners(
    envelope,
    keysFor(document, "authentication"),
    FanErrorCode.AGENT_UNTRUSTED,
    what,
  );

  const { sovereign, domain: named, port: namedPort } = document.subjectDid;
  if (sovereign || named !== domain || namedPort !== port) {
    throw new FanError(
      FanErrorCode.AGENT_UNTRUSTED,
      `${what} names ${formatDid(document.subjectDid)}, which is not on ${authority}`,
    );
  }
  return document;
}

/**
 * Verify a user document against the agent that serves it.
 * @throws {FanError} SUBJECT_UNTRUSTED or NO_VERIFICATION_METHODS.
 */
export async function verifySubjectSignature(
  agentDocument: DIDDocument,
  fetchedJws: string,
): Promise<DIDDocument> {
  const what = `Subject document vouched for by ${formatDid(agentDocument.subjectDid)}`;
  const required = keysFor(agentDocument, "authentication");
  if (required.length === 0) {
    throw new FanError(FanErrorCode.NO_VERIFICATION_METHODS, `${what}: agent lists no authentication keys`);
  }

  const envelope = open(fetchedJws, FanErrorCode.SUBJECT_UNTRUSTED, what);
  await requireSigners(envelope, required, FanErrorCode.SUBJECT_UNTRUSTED, what);
  return toModel(envelope, FanErrorCode.SUBJECT_UNTRUSTED, what);
}

/**
 * Verify a self-certifying sovereign document.
 * @throws {FanError} SUBJECT_UNTRUSTED or NO_VERIFICATION_METHODS.
 */
export async function verifySovereign(jws: string): Promise<DIDDocument> {
  const what = "Sovereign document";
  const envelope = open(jws, FanErrorCode.SUBJECT_UNTRUSTED, what);
  const document = toModel(envelope, FanErrorCode.SUBJECT_UNTRUSTED, what);

  if (!document.subjectDid.sovereign) {
    throw new FanError(
      FanErrorCode.SUBJECT_UNTRUSTED,
      `${what} names ${formatDid(document.subjectDid)}, which is not sovereign`,
    );
  }

  await requireSigners(
    envelope,
    keysFor(document, "capabilityInvocation"),
    FanErrorCode.SUBJECT_UNTRUSTED,
    what,
  );
  return document;
}

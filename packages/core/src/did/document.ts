/**
 * DID Document construction, validation and key extraction.
 */

import type { JWK } from "jose";
import { base58btc } from "multiformats/bases/base58";
import { z } from "zod";
import { toPublicJwk } from "../crypto/keys.js";
import type {
  Did,
  DIDDocument,
  DIDDocumentWire,
  VerificationMethod,
  VerificationMethodWire,
  VerificationPurpose,
} from "../types/did.js";
import { FanError, FanErrorCode, isFanError } from "../types/errors.js";
import { formatDid, parseDid } from "./identifier.js";

/** Ed25519 multicodec prefix: 0xed 0x01 */
const ED25519_MULTICODEC_PREFIX = new Uint8Array([0xed, 0x01]);

/** X25519 multicodec prefix: 0xec 0x01 */
const X25519_MULTICODEC_PREFIX = new Uint8Array([0xec, 0x01]);

const DID_CONTEXT = "https://www.w3.org/ns/did/v1";
const JWK_CONTEXT = "https://w3id.org/security/suites/jws-2020/v1";

const PURPOSES: readonly VerificationPurpose[] = [
  "authentication",
  "capabilityInvocation",
  "assertionMethod",
  "keyAgreement",
];

// ---------------------------------------------------------------------------
// Wire validation
// ---------------------------------------------------------------------------

const jwkSchema = z.custom<JWK>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "kty" in value &&
    typeof value.kty === "string",
  { message: "publicKeyJwk must be a JWK object" },
);

const verificationMethodSchema = z.object({
  id: z.string().min(1),
  type: z.string(),
  controller: z.string(),
  publicKeyJwk: jwkSchema.optional(),
  publicKeyMultibase: z.string().optional(),
});

const relationshipSchema = z.array(z.union([z.string().min(1), verificationMethodSchema]));

const didDocumentSchema: z.ZodType<DIDDocumentWire> = z.object({
  "@context": z.union([z.string(), z.array(z.string())]).optional(),
  id: z.string(),
  controller: z.union([z.string(), z.array(z.string())]).optional(),
  alsoKnownAs: z.array(z.string()).optional(),
  verificationMethod: z.array(verificationMethodSchema).optional(),
  authentication: relationshipSchema.optional(),
  assertionMethod: relationshipSchema.optional(),
  keyAgreement: relationshipSchema.optional(),
  capabilityInvocation: relationshipSchema.optional(),
  service: z
    .array(
      z.object({
        id: z.string(),
        type: z.string(),
        serviceEndpoint: z.union([z.string(), z.array(z.string()), z.record(z.unknown())]),
      }),
    )
    .optional(),
});

/**
 * Validate a decoded value as a DID document.
 * @throws {FanError} MALFORMED_DOCUMENT listing the first schema violations.
 */
export function parseWireDocument(value: unknown): DIDDocumentWire {
  const result = didDocumentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new FanError(FanErrorCode.MALFORMED_DOCUMENT, `Invalid DID document: ${issues}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/** Keys to publish, by relationship. Private members are stripped. */
export interface DocumentKeys {
  authentication?: readonly JWK[];
  capabilityInvocation?: readonly JWK[];
  assertionMethod?: readonly JWK[];
  keyAgreement?: readonly JWK[];
}

/**
 * Build a DID document publishing `keys` as JsonWebKey2020 methods. A key
 * listed under several relationships (same `kid`) becomes one method.
 * @param serviceEndpoint - Optional endpoint advertised as a `FanAuthService`.
 */
export function buildDIDDocument(
  did: Did | string,
  keys: DocumentKeys,
  serviceEndpoint?: string,
): DIDDocumentWire {
  const id = typeof did === "string" ? did : formatDid(did);
  const methods = new Map<string, VerificationMethodWire>();
  const document: DIDDocumentWire = {
    "@context": [DID_CONTEXT, JWK_CONTEXT],
    id,
    verificationMethod: [],
  };

  for (const purpose of PURPOSES) {
    const jwks = keys[purpose];
    if (!jwks || jwks.length === 0) continue;

    document[purpose] = jwks.map((jwk) => {
      const fragment = jwk.kid ?? `key-${methods.size + 1}`;
      const methodId = `${id}#${fragment}`;
      if (!methods.has(methodId)) {
        methods.set(methodId, {
          id: methodId,
          type: "JsonWebKey2020",
          controller: id,
          publicKeyJwk: toPublicJwk(jwk),
        });
      }
      return methodId;
    });
  }

  document.verificationMethod = [...methods.values()];
  if (serviceEndpoint) {
    document.service = [{ id: `${id}#fan-auth`, type: "FanAuthService", serviceEndpoint }];
  }
  return document;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function malformed(message: string): FanError {
  return new FanError(FanErrorCode.MALFORMED_DOCUMENT, message);
}

function absoluteId(documentId: string, id: string): string {
  return id.startsWith("#") ? `${documentId}${id}` : id;
}

function methodKey(method: VerificationMethodWire): JWK {
  if (method.publicKeyJwk) {
    return toPublicJwk(method.publicKeyJwk);
  }
  if (method.publicKeyMultibase) {
    return multibaseToJwk(method.publicKeyMultibase);
  }
  throw malformed(`Verification method ${method.id} has no public key`);
}

/**
 * Turn a validated wire document into the verified model. Called only by
 * the trust verifier once the bytes' signatures have been checked.
 * @throws {FanError} MALFORMED_DOCUMENT for dangling references, missing
 *   keys or a subject that is not a did:fan DID.
 */
export function toDIDDocument(
  wire: DIDDocumentWire,
  raw: Uint8Array,
  contentType: string,
): DIDDocument {
  let subjectDid: Did;
  try {
    subjectDid = parseDid(wire.id);
  } catch (err) {
    if (isFanError(err)) throw malformed(`Document subject: ${err.message}`);
    throw err;
  }

  const methods = new Map<string, VerificationMethod>();
  const addMethod = (method: VerificationMethodWire): string => {
    const id = absoluteId(wire.id, method.id);
    if (!methods.has(id)) {
      methods.set(id, {
        id,
        type: method.type,
        controller: method.controller,
        publicKeyJwk: methodKey(method),
        purposes: [],
      });
    }
    return id;
  };

  for (const method of wire.verificationMethod ?? []) {
    addMethod(method);
  }

  const relationships = new Map<VerificationPurpose, string[]>();
  for (const purpose of PURPOSES) {
    const ids: string[] = [];
    for (const entry of wire[purpose] ?? []) {
      const id = typeof entry === "string" ? absoluteId(wire.id, entry) : addMethod(entry);
      const method = methods.get(id);
      if (!method) {
        throw malformed(`${purpose} references unknown verification method ${id}`);
      }
      if (!method.purposes.includes(purpose)) method.purposes.push(purpose);
      if (!ids.includes(id)) ids.push(id);
    }
    relationships.set(purpose, ids);
  }

  return {
    subjectDid,
    verificationMethods: [...methods.values()],
    authentication: relationships.get("authentication") ?? [],
    capabilityInvocation: relationships.get("capabilityInvocation") ?? [],
    wire,
    raw,
    contentType,
  };
}

/** The methods listed under `purpose`, in document order. */
export function methodsFor(
  document: Pick<DIDDocument, "verificationMethods" | "authentication" | "capabilityInvocation">,
  purpose: "authentication" | "capabilityInvocation",
): VerificationMethod[] {
  const byId = new Map(document.verificationMethods.map((method) => [method.id, method]));
  return document[purpose].flatMap((id) => {
    const method = byId.get(id);
    return method ? [method] : [];
  });
}

/** Public keys of the methods listed under `purpose`. */
export function keysFor(
  document: Pick<DIDDocument, "verificationMethods" | "authentication" | "capabilityInvocation">,
  purpose: "authentication" | "capabilityInvocation",
): JWK[] {
  return methodsFor(document, purpose).map((method) => method.publicKeyJwk);
}

// ---------------------------------------------------------------------------
// Multibase keys
// ---------------------------------------------------------------------------

/**
 * Convert an Ed25519 or X25519 `publicKeyMultibase` to an OKP JWK.
 * @throws {FanError} MALFORMED_DOCUMENT for other key types or bad encodings.
 */
export function multibaseToJwk(multibase: string): JWK {
  let decoded: Uint8Array;
  try {
    decoded = base58btc.decode(multibase);
  } catch {
    throw malformed(`Invalid base58btc multibase key "${multibase}"`);
  }

  if (hasPrefix(decoded, ED25519_MULTICODEC_PREFIX)) {
    return { kty: "OKP", crv: "Ed25519", x: toBase64Url(decoded.slice(2)) };
  }
  if (hasPrefix(decoded, X25519_MULTICODEC_PREFIX)) {
    return { kty: "OKP", crv: "X25519", x: toBase64Url(decoded.slice(2)) };
  }
  throw malformed(
    `Unsupported multicodec prefix ${bytesToHex(decoded.slice(0, 2))} in publicKeyMultibase`,
  );
}

function hasPrefix(bytes: Uint8Array, prefix: Uint8Array): boolean {
  return bytes.length > prefix.length && prefix.every((byte, i) => bytes[i] === byte);
}

function toBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64url");
}

function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

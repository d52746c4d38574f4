/**
 * JWS signing, decoding and key-set verification.
 *
 * Decoding never verifies: `decodeJws` returns an `UnverifiedJws`, and only
 * `verifySignature` / `verifyAllSigned` decide whether a key signed it.
 */

import {
  base64url,
  CompactSign,
  decodeProtectedHeader,
  flattenedVerify,
  GeneralSign,
  type JWK,
  type JWSHeaderParameters,
} from "jose";
import { z } from "zod";
import { FanError, FanErrorCode } from "../types/errors.js";
import { JOSE_JSON_MIME, JOSE_MIME } from "../types/fetch.js";
import { importKey, isPrivateJwk, signingAlgorithm } from "./keys.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One signature of a JWS, as serialized. */
export interface JwsSignature {
  protected?: string;
  header?: JWSHeaderParameters;
  signature: string;
}

/** A parsed JWS whose signatures have not been checked. */
export interface UnverifiedJws {
  readonly verified: false;
  /** Decoded payload bytes. */
  readonly payload: Uint8Array;
  /** The payload exactly as it was signed (base64url). */
  readonly encodedPayload: string;
  readonly signatures: readonly JwsSignature[];
  readonly serialization: "compact" | "json";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const headerSchema = z.custom<JWSHeaderParameters>(isRecord);

const signatureSchema = z.object({
  protected: z.string().optional(),
  header: headerSchema.optional(),
  signature: z.string(),
});

const jsonJwsSchema = z.union([
  z.object({ payload: z.string(), signatures: z.array(signatureSchema).min(1) }),
  signatureSchema.extend({ payload: z.string() }),
]);

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function malformed(message: string, cause?: unknown): FanError {
  return new FanError(FanErrorCode.MALFORMED_PAYLOAD, message, undefined, { cause });
}

function decodePayload(encoded: string): Uint8Array {
  try {
    return base64url.decode(encoded);
  } catch (err) {
    throw malformed("JWS payload is not base64url", err);
  }
}

/**
 * Parse a JWS in compact or JSON (general / flattened) serialization.
 * @throws {FanError} MALFORMED_PAYLOAD if the input is not a JWS.
 */
export function decodeJws(jws: string): UnverifiedJws {
  const input = jws.trim();

  if (input.startsWith("{")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(input);
    } catch (err) {
      throw malformed("JWS JSON serialization is not valid JSON", err);
    }
    const result = jsonJwsSchema.safeParse(parsed);
    if (!result.success) {
      throw malformed(`Invalid JWS JSON serialization: ${result.error.message}`);
    }
    const value = result.data;
    const signatures =
      "signatures" in value
        ? value.signatures
        : [{ protected: value.protected, header: value.header, signature: value.signature }];
    return {
      verified: false,
      payload: decodePayload(value.payload),
      encodedPayload: value.payload,
      signatures,
      serialization: "json",
    };
  }

  const parts = input.split(".");
  if (parts.length !== 3) {
    throw malformed(`Compact JWS must have 3 parts, got ${parts.length}`);
  }
  const [protectedHeader, payload, signature] = parts;
  return {
    verified: false,
    payload: decodePayload(payload),
    encodedPayload: payload,
    signatures: [{ protected: protectedHeader, signature }],
    serialization: "compact",
  };
}

/** Protected and unprotected header of one signature, merged. */
export function signatureHeader(signature: JwsSignature): JWSHeaderParameters {
  let protectedHeader: JWSHeaderParameters = {};
  if (signature.protected) {
    try {
      protectedHeader = decodeProtectedHeader({ protected: signature.protected, signature: "" });
    } catch {
      protectedHeader = {};
    }
  }
  return { ...signature.header, ...protectedHeader };
}

/** Media type for a serialized JWS or JWE. */
export function joseMediaType(serialized: string): string {
  return serialized.trimStart().startsWith("{") ? JOSE_JSON_MIME : JOSE_MIME;
}

// ---------------------------------------------------------------------------
// Signing
// ---------------------------------------------------------------------------

function requirePrivate(jwk: JWK): void {
  if (!isPrivateJwk(jwk)) {
    throw new FanError(FanErrorCode.KEY_NOT_FOUND, "Signing requires a private key", {
      kid: jwk.kid,
    });
  }
}

/** Sign `payload` with one private key, compact serialization. */
export async function signCompactJws(payload: Uint8Array, privateJwk: JWK): Promise<string> {
  requirePrivate(privateJwk);
  const alg = signingAlgorithm(privateJwk);
  const key = await importKey(privateJwk, alg);
  return new CompactSign(payload)
    .setProtectedHeader(privateJwk.kid ? { alg, kid: privateJwk.kid } : { alg })
    .sign(key);
}

/**
 * Sign `payload` with every key. One key yields compact serialization,
 * several yield general JSON serialization over the same payload.
 */
export async function signJws(payload: Uint8Array, privateJwks: readonly JWK[]): Promise<string> {
  if (privateJwks.length === 0) {
    throw new FanError(FanErrorCode.KEY_NOT_FOUND, "No signing keys supplied");
  }
  if (privateJwks.length === 1) {
    return signCompactJws(payload, privateJwks[0]);
  }

  const signer = new GeneralSign(payload);
  for (const jwk of privateJwks) {
    requirePrivate(jwk);
    const alg = signingAlgorithm(jwk);
    const key = await importKey(jwk, alg);
    signer.addSignature(key).setProtectedHeader(jwk.kid ? { alg, kid: jwk.kid } : { alg });
  }
  return JSON.stringify(await signer.sign());
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

/**
 * True if any signature on `jws` validates under `publicJwk`. A key or
 * signature using an unsupported algorithm counts as not signed.
 */
export async function signedBy(jws: UnverifiedJws, publicJwk: JWK): Promise<boolean> {
  let alg: string;
  let key: Awaited<ReturnType<typeof importKey>>;
  try {
    alg = signingAlgorithm(publicJwk);
    key = await importKey(publicJwk, alg);
  } catch {
    return false;
  }

  for (const signature of jws.signatures) {
    try {
      await flattenedVerify(
        {
          payload: jws.encodedPayload,
          protected: signature.protected,
          header: signature.header,
          signature: signature.signature,
        },
        key,
        { algorithms: [alg] },
      );
      return true;
    } catch {
      continue;
    }
  }
  return false;
}

/** OR-reduction: true iff at least one candidate key signed `jws`. */
export async function verifySignature(
  jws: UnverifiedJws,
  candidateKeys: readonly JWK[],
): Promise<boolean> {
  let any = false;
  for (const key of candidateKeys) {
    any = any || (await signedBy(jws, key));
  }
  return any;
}

/**
 * AND-reduction: true iff every required key signed `jws`. An empty key set
 * is never satisfied.
 */
export async function verifyAllSigned(
  jws: UnverifiedJws,
  requiredKeys: readonly JWK[],
): Promise<boolean> {
  let all = requiredKeys.length > 0;
  for (const key of requiredKeys) {
    all = all && (await signedBy(jws, key));
  }
  return all;
}

/**
 * Key handling: algorithm selection per JWK, import and generation.
 *
 * Asymmetric primitives come from `jose`; nothing here implements a cipher.
 */

import {
  calculateJwkThumbprint,
  exportJWK,
  generateKeyPair as joseGenerateKeyPair,
  importJWK,
  type GenerateKeyPairResult,
  type JWK,
  type KeyLike,
} from "jose";
import { FanError, FanErrorCode } from "../types/errors.js";

/** Content encryption for every JWE the engine produces. */
export const CONTENT_ENCRYPTION = "A256GCM";

/** JWS algorithms the engine accepts: asymmetric only. */
const SIGNING_ALGORITHMS: ReadonlySet<string> = new Set([
  "ES256",
  "ES384",
  "ES512",
  "ES256K",
  "EdDSA",
  "RS256",
  "RS384",
  "RS512",
  "PS256",
  "PS384",
  "PS512",
]);

const KEY_MANAGEMENT_ALGORITHMS: ReadonlySet<string> = new Set([
  "ECDH-ES+A256KW",
  "ECDH-ES+A192KW",
  "ECDH-ES+A128KW",
  "RSA-OAEP-256",
  "RSA-OAEP",
]);

const EC_SIGNING: Record<string, string> = {
  "P-256": "ES256",
  "P-384": "ES384",
  "P-521": "ES512",
  secp256k1: "ES256K",
};

const EC_ENCRYPTION_CURVES: ReadonlySet<string> = new Set(["P-256", "P-384", "P-521", "X25519", "X448"]);

const PRIVATE_MEMBERS = ["d", "p", "q", "dp", "dq", "qi", "k", "oth"] as const;

/** Key types `generateKeyPair` can produce. */
export type KeyCurve = "P-256" | "P-384" | "P-521" | "Ed25519" | "X25519" | "RSA";

/** A generated key pair, both halves as JWK with a thumbprint `kid`. */
export interface JwkPair {
  publicJwk: JWK;
  privateJwk: JWK;
}

function describe(jwk: JWK): string {
  return jwk.crv ? `${jwk.kty}/${jwk.crv}` : String(jwk.kty);
}

/**
 * The JWS algorithm a key signs with.
 * @throws {FanError} UNSUPPORTED_ALGORITHM if the key cannot sign.
 */
export function signingAlgorithm(jwk: JWK): string {
  if (jwk.alg && SIGNING_ALGORITHMS.has(jwk.alg)) {
    return jwk.alg;
  }

  let alg: string | undefined;
  if (jwk.kty === "EC" && jwk.crv) {
    alg = EC_SIGNING[jwk.crv];
  } else if (jwk.kty === "OKP" && (jwk.crv === "Ed25519" || jwk.crv === "Ed448")) {
    alg = "EdDSA";
  } else if (jwk.kty === "RSA") {
    alg = "RS256";
  }

  if (!alg) {
    throw new FanError(FanErrorCode.UNSUPPORTED_ALGORITHM, `Key type ${describe(jwk)} cannot sign`, {
      kid: jwk.kid,
    });
  }
  return alg;
}

/**
 * The JWE key management algorithm used to encrypt to a key.
 * @throws {FanError} UNSUPPORTED_ALGORITHM if the key cannot receive encrypted content.
 */
export function encryptionAlgorithm(jwk: JWK): string {
  if (jwk.alg && KEY_MANAGEMENT_ALGORITHMS.has(jwk.alg)) {
    return jwk.alg;
  }
  if ((jwk.kty === "EC" || jwk.kty === "OKP") && jwk.crv && EC_ENCRYPTION_CURVES.has(jwk.crv)) {
    return "ECDH-ES+A256KW";
  }
  if (jwk.kty === "RSA") {
    return "RSA-OAEP-256";
  }
  throw new FanError(
    FanErrorCode.UNSUPPORTED_ALGORITHM,
    `Key type ${describe(jwk)} cannot be encrypted to`,
    { kid: jwk.kid },
  );
}

/** True if the JWK carries private key material. */
export function isPrivateJwk(jwk: JWK): boolean {
  return PRIVATE_MEMBERS.some((member) => member in jwk);
}

/** Strip every private member from a JWK. */
export function toPublicJwk(jwk: JWK): JWK {
  const copy: JWK = { ...jwk };
  for (const member of PRIVATE_MEMBERS) {
    delete copy[member];
  }
  return copy;
}

/**
 * Import a JWK for use with `alg`.
 * @throws {FanError} UNSUPPORTED_ALGORITHM if jose rejects the key for that algorithm.
 */
export async function importKey(jwk: JWK, alg: string): Promise<KeyLike | Uint8Array> {
  try {
    return await importJWK(jwk, alg);
  } catch (err) {
    throw new FanError(
      FanErrorCode.UNSUPPORTED_ALGORITHM,
      `Cannot import ${describe(jwk)} key for ${alg}`,
      { kid: jwk.kid },
      { cause: err },
    );
  }
}

const GENERATORS: Record<KeyCurve, () => Promise<GenerateKeyPairResult<KeyLike>>> = {
  "P-256": () => joseGenerateKeyPair("ES256", { extractable: true }),
  "P-384": () => joseGenerateKeyPair("ES384", { extractable: true }),
  "P-521": () => joseGenerateKeyPair("ES512", { extractable: true }),
  Ed25519: () => joseGenerateKeyPair("EdDSA", { crv: "Ed25519", extractable: true }),
  X25519: () => joseGenerateKeyPair("ECDH-ES+A256KW", { crv: "X25519", extractable: true }),
  RSA: () => joseGenerateKeyPair("RS256", { modulusLength: 2048, extractable: true }),
};

/** Generate a key pair; the returned JWKs carry a SHA-256 thumbprint `kid`. */
export async function generateKeyPair(curve: KeyCurve = "P-256"): Promise<JwkPair> {
  const pair = await GENERATORS[curve]();
  const publicJwk = await exportJWK(pair.publicKey);
  const privateJwk = await exportJWK(pair.privateKey);
  const kid = await calculateJwkThumbprint(publicJwk);

  return {
    publicJwk: { ...publicJwk, kid },
    privateJwk: { ...privateJwk, kid },
  };
}

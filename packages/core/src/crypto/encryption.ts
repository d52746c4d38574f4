/**
 * JWE encryption to a key set, and decryption for the User side.
 */

import {
  CompactEncrypt,
  compactDecrypt,
  GeneralEncrypt,
  generalDecrypt,
  type JWEHeaderParameters,
  type JWK,
} from "jose";
import { z } from "zod";
import { FanError, FanErrorCode } from "../types/errors.js";
import {
  CONTENT_ENCRYPTION,
  encryptionAlgorithm,
  importKey,
  isPrivateJwk,
} from "./keys.js";

const headerSchema = z.custom<JWEHeaderParameters>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
);

const generalJweSchema = z.object({
  protected: z.string().optional(),
  unprotected: headerSchema.optional(),
  aad: z.string().optional(),
  iv: z.string(),
  ciphertext: z.string(),
  tag: z.string(),
  recipients: z
    .array(z.object({ header: headerSchema.optional(), encrypted_key: z.string().optional() }))
    .min(1),
});

/**
 * Encrypt `payload` so that any one of `publicJwks` can decrypt it. One key
 * yields compact serialization, several yield general JSON serialization.
 * @throws {FanError} NO_VERIFICATION_METHODS for an empty key set,
 *   UNSUPPORTED_ALGORITHM if a key cannot be encrypted to.
 */
export async function encryptToKeySet(
  payload: Uint8Array,
  publicJwks: readonly JWK[],
): Promise<string> {
  if (publicJwks.length === 0) {
    throw new FanError(FanErrorCode.NO_VERIFICATION_METHODS, "No keys to encrypt to");
  }

  if (publicJwks.length === 1) {
    const [jwk] = publicJwks;
    const alg = encryptionAlgorithm(jwk);
    const key = await importKey(jwk, alg);
    const header = jwk.kid
      ? { alg, enc: CONTENT_ENCRYPTION, kid: jwk.kid }
      : { alg, enc: CONTENT_ENCRYPTION };
    return new CompactEncrypt(payload).setProtectedHeader(header).encrypt(key);
  }

  const encrypter = new GeneralEncrypt(payload).setProtectedHeader({ enc: CONTENT_ENCRYPTION });
  for (const jwk of publicJwks) {
    const alg = encryptionAlgorithm(jwk);
    const key = await importKey(jwk, alg);
    encrypter.addRecipient(key).setUnprotectedHeader(jwk.kid ? { alg, kid: jwk.kid } : { alg });
  }
  return JSON.stringify(await encrypter.encrypt());
}

/**
 * Decrypt a compact or general JSON JWE with a private key.
 * @throws {FanError} DECRYPTION_FAILED if the key is not a recipient or the JWE is damaged.
 */
export async function decrypt(jwe: string, privateJwk: JWK): Promise<Uint8Array> {
  if (!isPrivateJwk(privateJwk)) {
    throw new FanError(FanErrorCode.KEY_NOT_FOUND, "Decryption requires a private key", {
      kid: privateJwk.kid,
    });
  }

  const alg = encryptionAlgorithm(privateJwk);
  const key = await importKey(privateJwk, alg);
  const options = {
    keyManagementAlgorithms: [alg],
    contentEncryptionAlgorithms: [CONTENT_ENCRYPTION],
  };

  try {
    const input = jwe.trim();
    if (input.startsWith("{")) {
      const general = generalJweSchema.parse(JSON.parse(input));
      const { plaintext } = await generalDecrypt(general, key, options);
      return plaintext;
    }
    const { plaintext } = await compactDecrypt(input, key, options);
    return plaintext;
  } catch (err) {
    throw new FanError(
      FanErrorCode.DECRYPTION_FAILED,
      "Unable to decrypt JWE with the supplied key",
      { kid: privateJwk.kid },
      { cause: err },
    );
  }
}

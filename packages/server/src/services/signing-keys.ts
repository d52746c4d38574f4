/**
 * Loading the site's private signing keys.
 *
 * The file is a JWK Set (`{ "keys": [...] }`) or a single JWK, as printed by
 * `fan-agent --generate-signing-jwk`.
 */

import { readFile } from "node:fs/promises";
import type { JWK } from "jose";
import { z } from "zod";
import { FanError, FanErrorCode, isPrivateJwk, signingAlgorithm } from "@fan-auth/core";

const jwkSchema = z.custom<JWK>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "kty" in value &&
    typeof value.kty === "string",
  { message: "not a JWK" },
);

const jwkSetSchema = z.object({ keys: z.array(jwkSchema).min(1) });

/**
 * Read a JWK Set or a single JWK.
 * @throws {FanError} KEY_NOT_FOUND if `value` is neither.
 */
export function parseJwks(value: unknown): JWK[] {
  const set = jwkSetSchema.safeParse(value);
  if (set.success) return set.data.keys;
  const single = jwkSchema.safeParse(value);
  if (single.success) return [single.data];
  throw new FanError(FanErrorCode.KEY_NOT_FOUND, "Key file holds no JWK");
}

/**
 * Validate parsed key material: every key must be private and able to sign.
 * @throws {FanError} KEY_NOT_FOUND or UNSUPPORTED_ALGORITHM.
 */
export function parseSigningKeys(value: unknown): JWK[] {
  const keys = parseJwks(value);
  for (const jwk of keys) {
    if (!isPrivateJwk(jwk)) {
      throw new FanError(FanErrorCode.KEY_NOT_FOUND, "Signing keys must include private members", {
        kid: jwk.kid,
      });
    }
    signingAlgorithm(jwk);
  }
  return keys;
}

/** Read a JSON key file. */
export async function readKeyFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new FanError(
      FanErrorCode.KEY_NOT_FOUND,
      `Cannot read keys from ${path}`,
      { path },
      { cause: err },
    );
  }

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new FanError(FanErrorCode.KEY_NOT_FOUND, `${path} is not JSON`, { path }, { cause: err });
  }
  return value;
}

/** Read and validate a signing key file. */
export async function loadSigningKeys(path: string): Promise<JWK[]> {
  return parseSigningKeys(await readKeyFile(path));
}

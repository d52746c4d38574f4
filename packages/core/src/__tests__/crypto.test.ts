import { describe, it, expect, beforeAll } from "vitest";
import { decrypt, encryptToKeySet } from "../crypto/encryption.js";
import {
  encryptionAlgorithm,
  generateKeyPair,
  isPrivateJwk,
  type JwkPair,
  signingAlgorithm,
  toPublicJwk,
} from "../crypto/keys.js";
import {
  decodeJws,
  joseMediaType,
  signCompactJws,
  signJws,
  signatureHeader,
  signedBy,
  verifyAllSigned,
  verifySignature,
} from "../crypto/signing.js";
import { FanErrorCode } from "../types/errors.js";
import { thrownCode } from "./fixtures.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

let first: JwkPair;
let second: JwkPair;
let stranger: JwkPair;
let x25519: JwkPair;
let ed25519: JwkPair;

beforeAll(async () => {
  first = await generateKeyPair("P-256");
  second = await generateKeyPair("P-384");
  stranger = await generateKeyPair("P-256");
  x25519 = await generateKeyPair("X25519");
  ed25519 = await generateKeyPair("Ed25519");
});

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------
describe("Key handling", () => {
  it("generates JWK pairs with a shared thumbprint kid", () => {
    expect(first.publicJwk.kty).toBe("EC");
    expect(first.publicJwk.crv).toBe("P-256");
    expect(first.publicJwk.d).toBeUndefined();
    expect(first.privateJwk.d).toBeDefined();
    expect(first.publicJwk.kid).toBe(first.privateJwk.kid);
    expect(first.publicJwk.kid).not.toBe(stranger.publicJwk.kid);
  });

  it("picks the signing algorithm from the key", () => {
    expect(signingAlgorithm(first.publicJwk)).toBe("ES256");
    expect(signingAlgorithm(second.publicJwk)).toBe("ES384");
    expect(signingAlgorithm({ kty: "EC", crv: "secp256k1" })).toBe("ES256K");
    expect(signingAlgorithm(ed25519.publicJwk)).toBe("EdDSA");
    expect(signingAlgorithm({ kty: "RSA" })).toBe("RS256");
    expect(signingAlgorithm({ kty: "RSA", alg: "PS256" })).toBe("PS256");
  });

  it("refuses keys that cannot sign", () => {
    expect(thrownCode(() => signingAlgorithm(x25519.publicJwk))).toBe(
      FanErrorCode.UNSUPPORTED_ALGORITHM,
    );
    expect(thrownCode(() => signingAlgorithm({ kty: "oct" }))).toBe(FanErrorCode.UNSUPPORTED_ALGORITHM);
  });

  it("picks the key management algorithm from the key", () => {
    expect(encryptionAlgorithm(first.publicJwk)).toBe("ECDH-ES+A256KW");
    expect(encryptionAlgorithm(x25519.publicJwk)).toBe("ECDH-ES+A256KW");
    expect(encryptionAlgorithm({ kty: "RSA" })).toBe("RSA-OAEP-256");
    expect(thrownCode(() => encryptionAlgorithm(ed25519.publicJwk))).toBe(
      FanErrorCode.UNSUPPORTED_ALGORITHM,
    );
  });

  it("strips private members", () => {
    expect(isPrivateJwk(first.privateJwk)).toBe(true);
    const stripped = toPublicJwk(first.privateJwk);
    expect(isPrivateJwk(stripped)).toBe(false);
    expect(stripped).toEqual(first.publicJwk);
  });
});

// ---------------------------------------------------------------------------
// JWS
// ---------------------------------------------------------------------------
describe("JWS signing and verification", () => {
  const payload = encoder.encode('{"hello":"world"}');

  it("uses compact serialization for one signer", async () => {
    const jws = await signJws(payload, [first.privateJwk]);
    expect(jws.split(".")).toHaveLength(3);
    expect(joseMediaType(jws)).toBe("application/jose");

    const decoded = decodeJws(jws);
    expect(decoded.verified).toBe(false);
    expect(decoded.serialization).toBe("compact");
    expect(decoder.decode(decoded.payload)).toBe('{"hello":"world"}');
    expect(signatureHeader(decoded.signatures[0])).toEqual({ alg: "ES256", kid: first.publicJwk.kid });
  });

  it("uses general JSON serialization for several signers", async () => {
    const jws = await signJws(payload, [first.privateJwk, second.privateJwk]);
    expect(joseMediaType(jws)).toBe("application/jose+json");

    const decoded = decodeJws(jws);
    expect(decoded.serialization).toBe("json");
    expect(decoded.signatures).toHaveLength(2);
    expect(decoder.decode(decoded.payload)).toBe('{"hello":"world"}');
  });

  it("requires every key for the AND-reduction", async () => {
    const both = decodeJws(await signJws(payload, [first.privateJwk, second.privateJwk]));
    expect(await verifyAllSigned(both, [first.publicJwk, second.publicJwk])).toBe(true);
    expect(await verifyAllSigned(both, [first.publicJwk, stranger.publicJwk])).toBe(false);

    const one = decodeJws(await signJws(payload, [first.privateJwk]));
    expect(await verifyAllSigned(one, [first.publicJwk, second.publicJwk])).toBe(false);
  });

  it("never satisfies an empty required set", async () => {
    const jws = decodeJws(await signJws(payload, [first.privateJwk]));
    expect(await verifyAllSigned(jws, [])).toBe(false);
  });

  it("accepts any one key for the OR-reduction", async () => {
    const jws = decodeJws(await signJws(payload, [first.privateJwk]));
    expect(await verifySignature(jws, [stranger.publicJwk, first.publicJwk])).toBe(true);
    expect(await verifySignature(jws, [stranger.publicJwk])).toBe(false);
    expect(await verifySignature(jws, [])).toBe(false);
  });

  it("counts an unusable key as not signed", async () => {
    const jws = decodeJws(await signJws(payload, [first.privateJwk]));
    expect(await signedBy(jws, { kty: "oct", k: "dGVzdC1zZWNyZXQ" })).toBe(false);
    expect(await verifySignature(jws, [{ kty: "oct", k: "dGVzdC1zZWNyZXQ" }, first.publicJwk])).toBe(
      true,
    );
  });

  it("rejects a tampered payload", async () => {
    const [header, , signature] = (await signCompactJws(payload, first.privateJwk)).split(".");
    const forged = `${header}.${Buffer.from('{"hello":"mallory"}').toString("base64url")}.${signature}`;
    expect(await signedBy(decodeJws(forged), first.publicJwk)).toBe(false);
  });

  it("signs with Ed25519", async () => {
    const jws = decodeJws(await signCompactJws(payload, ed25519.privateJwk));
    expect(await signedBy(jws, ed25519.publicJwk)).toBe(true);
  });

  it("refuses to sign with a public key", async () => {
    await expect(signJws(payload, [first.publicJwk])).rejects.toMatchObject({
      code: FanErrorCode.KEY_NOT_FOUND,
    });
    await expect(signJws(payload, [])).rejects.toMatchObject({ code: FanErrorCode.KEY_NOT_FOUND });
  });

  it("rejects input that is not a JWS", () => {
    expect(thrownCode(() => decodeJws("not-a-jws"))).toBe(FanErrorCode.MALFORMED_PAYLOAD);
    expect(thrownCode(() => decodeJws("{"))).toBe(FanErrorCode.MALFORMED_PAYLOAD);
    expect(thrownCode(() => decodeJws('{"payload":"e30"}'))).toBe(FanErrorCode.MALFORMED_PAYLOAD);
  });
});

// ---------------------------------------------------------------------------
// JWE
// ---------------------------------------------------------------------------
describe("JWE encryption", () => {
  const payload = encoder.encode('{"data":"bm9uY2U=","identifier":"attempt-1"}');

  it("uses compact serialization for one recipient", async () => {
    const jwe = await encryptToKeySet(payload, [first.publicJwk]);
    expect(jwe.split(".")).toHaveLength(5);
    expect(decoder.decode(await decrypt(jwe, first.privateJwk))).toBe(decoder.decode(payload));
  });

  it("lets every recipient of a key set decrypt", async () => {
    const jwe = await encryptToKeySet(payload, [first.publicJwk, x25519.publicJwk]);
    expect(joseMediaType(jwe)).toBe("application/jose+json");
    expect(decoder.decode(await decrypt(jwe, first.privateJwk))).toBe(decoder.decode(payload));
    expect(decoder.decode(await decrypt(jwe, x25519.privateJwk))).toBe(decoder.decode(payload));
  });

  it("fails for a key that is not a recipient", async () => {
    const jwe = await encryptToKeySet(payload, [first.publicJwk, x25519.publicJwk]);
    await expect(decrypt(jwe, stranger.privateJwk)).rejects.toMatchObject({
      code: FanErrorCode.DECRYPTION_FAILED,
    });
  });

  it("needs at least one recipient", async () => {
    await expect(encryptToKeySet(payload, [])).rejects.toMatchObject({
      code: FanErrorCode.NO_VERIFICATION_METHODS,
    });
  });

  it("refuses recipients that cannot receive encrypted content", async () => {
    await expect(encryptToKeySet(payload, [ed25519.publicJwk])).rejects.toMatchObject({
      code: FanErrorCode.UNSUPPORTED_ALGORITHM,
    });
  });

  it("needs a private key to decrypt", async () => {
    const jwe = await encryptToKeySet(payload, [first.publicJwk]);
    await expect(decrypt(jwe, first.publicJwk)).rejects.toMatchObject({
      code: FanErrorCode.KEY_NOT_FOUND,
    });
  });
});

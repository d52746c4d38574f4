/**
 * Signed document envelope.
 *
 * A served document is a JWS whose payload is
 * `{ "document": base64url(bytes), "content-type": mime }`.
 */

import { base64url, type JWK } from "jose";
import { z } from "zod";
import { decodeJws, joseMediaType, signJws, type UnverifiedJws } from "../crypto/signing.js";
import { decodeDocument, encodeDocument } from "../did/formats.js";
import type { DIDDocumentWire } from "../types/did.js";
import { FanError, FanErrorCode } from "../types/errors.js";

/** Unpadded base64url; a length of 1 mod 4 encodes no whole byte. */
const BASE64URL = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2,3})?$/;

const envelopePayloadSchema = z.object({
  document: z.string().min(1).regex(BASE64URL),
  "content-type": z.string().min(1),
});

/** A decoded envelope; nothing in it has been verified. */
export interface OpenedEnvelope {
  jws: UnverifiedJws;
  /** Document bytes as embedded. */
  bytes: Uint8Array;
  contentType: string;
  wire: DIDDocumentWire;
}

/** A signed document ready to serve. */
export interface SignedDocument {
  body: string;
  /** `application/jose` or `application/jose+json`. */
  mediaType: string;
}

/**
 * Serialize `document` as `mime` and sign the envelope with every key.
 */
export async function signDocument(
  document: DIDDocumentWire,
  mime: string,
  privateJwks: readonly JWK[],
): Promise<SignedDocument> {
  const bytes = encodeDocument(document, mime);
  const payload = {
    document: base64url.encode(bytes),
    "content-type": mime,
  };
  const body = await signJws(new TextEncoder().encode(JSON.stringify(payload)), privateJwks);
  return { body, mediaType: joseMediaType(body) };
}

/**
 * Decode an envelope and the document inside it, without verifying.
 * @throws {FanError} MALFORMED_PAYLOAD or MALFORMED_DOCUMENT.
 */
export function openDocumentEnvelope(serialized: string): OpenedEnvelope {
  const jws = decodeJws(serialized);

  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(jws.payload));
  } catch (err) {
    throw new FanError(FanErrorCode.MALFORMED_PAYLOAD, "Envelope payload is not JSON", undefined, {
      cause: err,
    });
  }

  const result = envelopePayloadSchema.safeParse(parsed);
  if (!result.success) {
    throw new FanError(
      FanErrorCode.MALFORMED_PAYLOAD,
      'Envelope payload needs base64url "document" and "content-type"',
    );
  }

  const contentType = result.data["content-type"];
  const bytes = base64url.decode(result.data.document);
  const wire = decodeDocument(bytes, contentType);

  return { jws, bytes, contentType, wire };
}

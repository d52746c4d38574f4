/**
 * DID document serializations, one codec per MIME type.
 */

import { decode as cborDecode, encode as cborEncode } from "cborg";
import type { DIDDocumentWire } from "../types/did.js";
import { FanError, FanErrorCode } from "../types/errors.js";
import { parseWireDocument } from "./document.js";

export const DID_JSON_MIME = "application/json+did";
export const DID_JSONLD_MIME = "application/jsonld+did";
export const DID_CBOR_MIME = "application/cbor+did";

export interface DocumentCodec {
  /** MIME type this codec emits. */
  readonly mime: string;
  decode(bytes: Uint8Array): unknown;
  encode(document: DIDDocumentWire): Uint8Array;
}

const jsonCodec = (mime: string): DocumentCodec => ({
  mime,
  decode: (bytes) => JSON.parse(new TextDecoder("utf-8", { fatal: true }).decode(bytes)),
  encode: (document) => new TextEncoder().encode(JSON.stringify(document)),
});

const cborCodec: DocumentCodec = {
  mime: DID_CBOR_MIME,
  decode: (bytes) => cborDecode(bytes),
  encode: (document) => cborEncode(document),
};

const CODECS: ReadonlyMap<string, DocumentCodec> = new Map([
  [DID_JSON_MIME, jsonCodec(DID_JSON_MIME)],
  // JSON-LD is consumed as plain JSON.
  [DID_JSONLD_MIME, jsonCodec(DID_JSONLD_MIME)],
  [DID_CBOR_MIME, cborCodec],
]);

/** Every MIME type a DID document may be served as. */
export const DOCUMENT_MIME_TYPES: readonly string[] = [...CODECS.keys()];

function essence(mime: string): string {
  return mime.split(";")[0].trim().toLowerCase();
}

/**
 * Look up the codec for a MIME type (parameters are ignored).
 * @throws {FanError} MALFORMED_DOCUMENT for unsupported types.
 */
export function codecFor(mime: string): DocumentCodec {
  const codec = CODECS.get(essence(mime));
  if (!codec) {
    throw new FanError(FanErrorCode.MALFORMED_DOCUMENT, `Unsupported DID document type "${mime}"`);
  }
  return codec;
}

/**
 * Decode and validate document bytes.
 * @throws {FanError} MALFORMED_DOCUMENT if the bytes are not a DID document of that type.
 */
export function decodeDocument(bytes: Uint8Array, mime: string): DIDDocumentWire {
  const codec = codecFor(mime);
  let value: unknown;
  try {
    value = codec.decode(bytes);
  } catch (err) {
    throw new FanError(
      FanErrorCode.MALFORMED_DOCUMENT,
      `Document is not valid ${codec.mime}`,
      undefined,
      { cause: err },
    );
  }
  return parseWireDocument(value);
}

/** Serialize a document as `mime`. */
export function encodeDocument(document: DIDDocumentWire, mime: string): Uint8Array {
  return codecFor(mime).encode(document);
}

/**
 * Pick the document type to serve for an `Accept` header: the first listed
 * type we support, else `fallback`.
 */
export function negotiateDocumentType(accept: string | undefined, fallback = DID_JSON_MIME): string {
  if (!accept) return fallback;
  for (const candidate of accept.split(",")) {
    const mime = essence(candidate);
    if (DOCUMENT_MIME_TYPES.includes(mime)) return mime;
  }
  return fallback;
}

/**
 * Serving signed DID documents.
 *
 * Stored documents are unsigned. Every fetch re-signs the envelope with the
 * full signing key set, so the agent's self-signature and its signature over
 * user documents always cover every current key.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import type { JWK } from "jose";
import {
  FanError,
  FanErrorCode,
  addressToDid,
  buildDIDDocument,
  encodeDocument,
  formatDid,
  negotiateDocumentType,
  parseAddress,
  signDocument,
  silentLogger,
  toPublicJwk,
  type Did,
  type DIDDocumentWire,
  type DocumentKeys,
  type Logger,
} from "@fan-auth/core";
import type { StorageDriver, StoredDocument } from "./storage.js";

/** Identifier of the agent's own DID: `did:fan:<domain>:fan-agent`. */
export const AGENT_IDENTIFIER = "fan-agent";

export interface DocumentServiceOptions {
  storage: StorageDriver;
  /** Private keys; their public halves are the agent's authentication set. */
  signingKeys: readonly JWK[];
  /** `domain[:port]` this site answers for. */
  domain: string;
  /** Inner serialization when `Accept` names none. */
  defaultFormat?: string;
  /** Advertised as the root document's `FanAuthService` endpoint. */
  authPath?: string;
  logger?: Logger;
  now?: () => number;
}

/** Conditional request headers, as received. */
export interface DocumentRequest {
  accept?: string;
  ifModifiedSince?: string;
  ifNoneMatch?: string;
}

export type ServedDocument =
  | {
      status: 200;
      body: string;
      mediaType: string;
      lastModified: Date;
      etag: string;
    }
  | {
      status: 304;
      lastModified: Date;
      etag: string;
    };

/** Truncate to the one-second resolution of HTTP dates. */
function toHttpResolution(date: Date): number {
  return Math.floor(date.getTime() / 1000) * 1000;
}

function etagFor(bytes: Uint8Array, mime: string): string {
  const hash = sha256.create();
  hash.update(new TextEncoder().encode(`${mime}\n`));
  hash.update(bytes);
  return `W/"${bytesToHex(hash.digest())}"`;
}

function notModified(request: DocumentRequest, etag: string, modifiedAt: Date): boolean {
  if (request.ifNoneMatch !== undefined) {
    return request.ifNoneMatch
      .split(",")
      .map((tag) => tag.trim())
      .some((tag) => tag === "*" || tag === etag);
  }
  if (request.ifModifiedSince !== undefined) {
    const since = Date.parse(request.ifModifiedSince);
    return !Number.isNaN(since) && toHttpResolution(modifiedAt) <= since;
  }
  return false;
}

export class DocumentService {
  readonly storage: StorageDriver;
  readonly rootDid: Did;
  private readonly signingKeys: readonly JWK[];
  private readonly defaultFormat?: string;
  private readonly authPath?: string;
  private readonly derivedAt: Date;
  private readonly log: Logger;

  constructor(options: DocumentServiceOptions) {
    if (options.signingKeys.length === 0) {
      throw new FanError(FanErrorCode.NO_VERIFICATION_METHODS, "At least one signing key is required");
    }
    this.storage = options.storage;
    this.signingKeys = options.signingKeys;
    this.defaultFormat = options.defaultFormat;
    this.authPath = options.authPath;
    this.rootDid = addressToDid(parseAddress(`${AGENT_IDENTIFIER}@${options.domain}`));
    this.derivedAt = new Date(toHttpResolution(new Date((options.now ?? Date.now)())));
    this.log = options.logger ?? silentLogger;
  }

  /** DID of a user identifier hosted by this agent. */
  userDid(name: string): Did {
    return addressToDid({ identifier: name, domain: this.rootDid.domain, port: this.rootDid.port });
  }

  /**
   * The agent document built from the signing keys, used when storage
   * holds no root document.
   */
  deriveRoot(): DIDDocumentWire {
    const endpoint = this.authPath ? `https://${this.authority()}${this.authPath}` : undefined;
    return buildDIDDocument(
      this.rootDid,
      { authentication: this.signingKeys.map(toPublicJwk) },
      endpoint,
    );
  }

  async root(): Promise<StoredDocument> {
    return (await this.storage.loadRoot()) ?? { document: this.deriveRoot(), modifiedAt: this.derivedAt };
  }

  /** Store a user document publishing `keys`. */
  async publish(name: string, keys: DocumentKeys, modifiedAt?: Date): Promise<StoredDocument> {
    const document = buildDIDDocument(this.userDid(name), keys);
    const stored = await this.storage.save(name, document, modifiedAt);
    this.log.info({ did: document.id }, "user document published");
    return stored;
  }

  async serveRoot(request: DocumentRequest = {}): Promise<ServedDocument> {
    return this.serve(await this.root(), request);
  }

  /**
   * @throws {FanError} DOCUMENT_NOT_FOUND when no document is stored for `name`.
   */
  async serveUser(name: string, request: DocumentRequest = {}): Promise<ServedDocument> {
    const stored = await this.storage.load(name);
    if (!stored) {
      throw new FanError(
        FanErrorCode.DOCUMENT_NOT_FOUND,
        `No document for ${formatDid(this.userDid(name))}`,
        { name },
      );
    }
    return this.serve(stored, request);
  }

  private async serve(stored: StoredDocument, request: DocumentRequest): Promise<ServedDocument> {
    const mime = negotiateDocumentType(request.accept, this.defaultFormat);
    const etag = etagFor(encodeDocument(stored.document, mime), mime);
    const lastModified = stored.modifiedAt;

    if (notModified(request, etag, lastModified)) {
      this.log.debug({ did: stored.document.id }, "document not modified");
      return { status: 304, lastModified, etag };
    }

    const signed = await signDocument(stored.document, mime, this.signingKeys);
    this.log.debug(
      { did: stored.document.id, format: mime, signatures: this.signingKeys.length },
      "document signed",
    );
    return { status: 200, body: signed.body, mediaType: signed.mediaType, lastModified, etag };
  }

  private authority(): string {
    const { domain, port } = this.rootDid;
    return port === undefined ? domain : `${domain}:${port}`;
  }
}

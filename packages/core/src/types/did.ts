/**
 * Address, DID and DID Document types.
 */

import type { JWK } from "jose";

/** The only DID method this network resolves. */
export const FAN_METHOD = "fan";

/** Domain token that marks a self-asserted identity. */
export const SOVEREIGN_DOMAIN = "_sovereign_";

/** A human address: `identifier@domain[:port]`. */
export interface Address {
  /** Unicode identifier, never empty. */
  identifier: string;
  /** IDNA-normalized (ASCII) domain, or `_sovereign_`. */
  domain: string;
  port?: number;
}

/**
 * A `did:fan` identifier. Immutable value object; compare with `didEquals`.
 */
export interface Did {
  readonly methodId: typeof FAN_METHOD;
  /** Domain, or `_sovereign_` when `sovereign` is set. */
  readonly domain: string;
  readonly port?: number;
  /** Percent-encoded ASCII identifier. */
  readonly identifier: string;
  readonly sovereign: boolean;
}

/** Relationships a verification method can be listed under. */
export type VerificationPurpose =
  | "authentication"
  | "capabilityInvocation"
  | "assertionMethod"
  | "keyAgreement";

/** A verification method with its key normalized to a public JWK. */
export interface VerificationMethod {
  /** Absolute id (`did:fan:...#key-1`). */
  id: string;
  type: string;
  controller: string;
  publicKeyJwk: JWK;
  purposes: VerificationPurpose[];
}

/** Verification method as it appears on the wire. */
export interface VerificationMethodWire {
  id: string;
  type: string;
  controller: string;
  publicKeyJwk?: JWK;
  publicKeyMultibase?: string;
}

/** DID document as serialized in JSON / JSON-LD / CBOR. */
export interface DIDDocumentWire {
  "@context"?: string | string[];
  id: string;
  controller?: string | string[];
  alsoKnownAs?: string[];
  verificationMethod?: VerificationMethodWire[];
  authentication?: Array<string | VerificationMethodWire>;
  assertionMethod?: Array<string | VerificationMethodWire>;
  keyAgreement?: Array<string | VerificationMethodWire>;
  capabilityInvocation?: Array<string | VerificationMethodWire>;
  service?: Array<{
    id: string;
    type: string;
    serviceEndpoint: string | string[] | Record<string, unknown>;
  }>;
}

/**
 * A DID document that passed signature verification. Only the trust
 * verifier produces these.
 */
export interface DIDDocument {
  subjectDid: Did;
  verificationMethods: VerificationMethod[];
  /** Verification method ids, in document order. */
  authentication: string[];
  capabilityInvocation: string[];
  /** The wire form the verified bytes decoded to. */
  wire: DIDDocumentWire;
  /** Document bytes exactly as signed. */
  raw: Uint8Array;
  contentType: string;
}

/**
 * @fan-auth/core: Federated Authentication Network engine.
 */

// Types
export * from "./types/did.js";
export * from "./types/errors.js";
export * from "./types/fetch.js";

// Identifier codec
export {
  AGENT_TRUST_PATH,
  USER_PATH_PREFIX,
  addressToDid,
  addressToSovereignDid,
  agentTrustUrl,
  decodeIdentifier,
  didEquals,
  didToLookupUrl,
  encodeIdentifier,
  formatAddress,
  formatDid,
  parseAddress,
  parseDid,
} from "./did/identifier.js";

// Documents
export {
  buildDIDDocument,
  keysFor,
  methodsFor,
  multibaseToJwk,
  parseWireDocument,
  toDIDDocument,
  type DocumentKeys,
} from "./did/document.js";
export {
  DID_CBOR_MIME,
  DID_JSONLD_MIME,
  DID_JSON_MIME,
  DOCUMENT_MIME_TYPES,
  codecFor,
  decodeDocument,
  encodeDocument,
  negotiateDocumentType,
  type DocumentCodec,
} from "./did/formats.js";

// Crypto gateway
export {
  CONTENT_ENCRYPTION,
  encryptionAlgorithm,
  generateKeyPair,
  importKey,
  isPrivateJwk,
  signingAlgorithm,
  toPublicJwk,
  type JwkPair,
  type KeyCurve,
} from "./crypto/keys.js";
export {
  decodeJws,
  joseMediaType,
  signCompactJws,
  signJws,
  signatureHeader,
  signedBy,
  verifyAllSigned,
  verifySignature,
  type JwsSignature,
  type UnverifiedJws,
} from "./crypto/signing.js";
export { decrypt, encryptToKeySet } from "./crypto/encryption.js";

// Trust
export {
  openDocumentEnvelope,
  signDocument,
  type OpenedEnvelope,
  type SignedDocument,
} from "./trust/envelope.js";
export {
  verifyAgentSelfSignature,
  verifySovereign,
  verifySubjectSignature,
} from "./trust/verifier.js";

// Cache + resolution
export {
  DEFAULT_CACHE_TTL_MS,
  DocumentCache,
  agentAuthority,
  shouldRevalidate,
  type AgentEntry,
  type CacheEntry,
  type DocumentCacheOptions,
  type RefreshPolicy,
} from "./did/cache.js";
export {
  Resolver,
  type ResolverOptions,
  type SovereignPolicy,
  type SovereignSource,
} from "./did/resolve.js";

// Authentication
export {
  AttemptStore,
  type AttemptStatus,
  type AuthenticationAttempt,
  type TerminalStatus,
} from "./auth/attempts.js";
export {
  ChallengeAuthenticator,
  DEFAULT_ATTEMPT_TTL_MS,
  DEFAULT_RETAIN_TERMINAL_MS,
  challengePayloadSchema,
  type AuthenticationSuccess,
  type ChallengeAuthenticatorOptions,
  type ChallengePayload,
  type IssuedChallenge,
} from "./auth/challenge.js";

// Utilities
export { KeyedLock } from "./util/keyed-lock.js";
export { type Logger, silentLogger } from "./util/logger.js";

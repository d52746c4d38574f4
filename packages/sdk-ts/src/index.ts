/**
 * @fan-auth/sdk: User-side client for the Federated Authentication Network.
 */

export {
  ADDRESS_PARAM,
  ATTEMPT_HEADER,
  FanUser,
  type AnsweredChallenge,
  type AuthenticationResult,
  type FanUserConfig,
} from "./client.js";

// Re-export what agents need to publish signed user documents.
export {
  FanError,
  FanErrorCode,
  buildDIDDocument,
  generateKeyPair,
  isFanError,
  signDocument,
  toPublicJwk,
  type ChallengePayload,
  type DocumentKeys,
  type JwkPair,
  type SignedDocument,
} from "@fan-auth/core";

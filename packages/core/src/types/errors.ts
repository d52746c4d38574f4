/**
 * Error codes and typed error class.
 */

/** All FAN error codes organized by domain. */
export enum FanErrorCode {
  // Identifiers (1xxx)
  MALFORMED_ADDRESS = "FAN-1001",
  MALFORMED_PORT = "FAN-1002",
  UNSUPPORTED_DID = "FAN-1003",

  // Fetching (2xxx)
  FETCH_FAILED = "FAN-2001",
  AGENT_DOCUMENT_UNREACHABLE = "FAN-2002",
  DOCUMENT_NOT_FOUND = "FAN-2003",

  // Trust (3xxx)
  AGENT_UNTRUSTED = "FAN-3001",
  SUBJECT_UNTRUSTED = "FAN-3002",
  NO_VERIFICATION_METHODS = "FAN-3003",
  MALFORMED_DOCUMENT = "FAN-3004",

  // Crypto (4xxx)
  SIGNATURE_INVALID = "FAN-4001",
  UNSUPPORTED_ALGORITHM = "FAN-4002",
  KEY_NOT_FOUND = "FAN-4003",
  DECRYPTION_FAILED = "FAN-4004",
  MALFORMED_PAYLOAD = "FAN-4005",

  // Authentication (5xxx)
  UNKNOWN_ATTEMPT = "FAN-5001",
  NONCE_MISMATCH = "FAN-5002",
  ATTEMPT_EXPIRED = "FAN-5003",

  // System (9xxx)
  RATE_LIMIT_EXCEEDED = "FAN-9001",
  INTERNAL_ERROR = "FAN-9002",
}

/** HTTP status code mapping for error codes. */
const ERROR_HTTP_STATUS: Record<FanErrorCode, number> = {
  [FanErrorCode.MALFORMED_ADDRESS]: 400,
  [FanErrorCode.MALFORMED_PORT]: 400,
  [FanErrorCode.UNSUPPORTED_DID]: 400,
  [FanErrorCode.FETCH_FAILED]: 502,
  [FanErrorCode.AGENT_DOCUMENT_UNREACHABLE]: 502,
  [FanErrorCode.DOCUMENT_NOT_FOUND]: 404,
  [FanErrorCode.AGENT_UNTRUSTED]: 403,
  [FanErrorCode.SUBJECT_UNTRUSTED]: 403,
  [FanErrorCode.NO_VERIFICATION_METHODS]: 403,
  [FanErrorCode.MALFORMED_DOCUMENT]: 422,
  [FanErrorCode.SIGNATURE_INVALID]: 401,
  [FanErrorCode.UNSUPPORTED_ALGORITHM]: 400,
  [FanErrorCode.KEY_NOT_FOUND]: 400,
  [FanErrorCode.DECRYPTION_FAILED]: 400,
  [FanErrorCode.MALFORMED_PAYLOAD]: 400,
  [FanErrorCode.UNKNOWN_ATTEMPT]: 401,
  [FanErrorCode.NONCE_MISMATCH]: 401,
  [FanErrorCode.ATTEMPT_EXPIRED]: 401,
  [FanErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [FanErrorCode.INTERNAL_ERROR]: 500,
};

/** Typed error for FAN protocol operations. */
export class FanError extends Error {
  /** Machine-readable error code. */
  public readonly code: FanErrorCode;
  /** HTTP status code for API responses. */
  public readonly httpStatus: number;
  /** Additional error context. */
  public readonly details?: Record<string, unknown>;

  constructor(
    code: FanErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FanError";
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code] ?? 500;
    this.details = details;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, FanError.prototype);
  }
}

/** True if `err` is a FanError, optionally with the given code. */
export function isFanError(err: unknown, code?: FanErrorCode): err is FanError {
  return err instanceof FanError && (code === undefined || err.code === code);
}

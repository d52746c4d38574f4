/**
 * Challenge/response authentication.
 *
 * issue:   fresh attempt id + random nonce, encrypted to every key in the
 *          subject's `authentication` set.
 * respond: the user decrypts, then signs `{ data, identifier }` with the key
 *          that could decrypt. The signature is checked against the
 *          subject's authentication keys (one valid signature suffices) and
 *          the nonce compared byte for byte. Each attempt settles once.
 */

import { randomBytes, timingSafeEqual } from "node:crypto";
import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import { encryptToKeySet } from "../crypto/encryption.js";
import { decodeJws, joseMediaType, verifySignature } from "../crypto/signing.js";
import { keysFor } from "../did/document.js";
import { formatDid } from "../did/identifier.js";
import type { Did, DIDDocument } from "../types/did.js";
import { FanError, FanErrorCode } from "../types/errors.js";
import { type Logger, silentLogger } from "../util/logger.js";
import { type AttemptStatus, AttemptStore, type AuthenticationAttempt, type TerminalStatus } from "./attempts.js";

/** Default attempt lifetime (5 minutes). */
export const DEFAULT_ATTEMPT_TTL_MS = 5 * 60 * 1000;
/** Default time settled attempts are remembered (1 minute). */
export const DEFAULT_RETAIN_TERMINAL_MS = 60 * 1000;

const MIN_NONCE_BYTES = 16;

export interface ChallengeAuthenticatorOptions {
  attemptTtlMs?: number;
  retainTerminalMs?: number;
  /** Nonce length; never less than 16. Default 32. */
  nonceBytes?: number;
  store?: AttemptStore;
  logger?: Logger;
  /** Clock, for tests. */
  now?: () => number;
}

/** The wire payload of both the challenge and the response. */
export interface ChallengePayload {
  /** Base64 nonce. */
  data: string;
  /** Attempt id. */
  identifier: string;
}

/** Padded standard base64. */
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const challengePayloadSchema = z.object({
  data: z.string().min(1).regex(BASE64),
  identifier: z.string().min(1),
});

export interface IssuedChallenge {
  attempt: AuthenticationAttempt;
  /** JWE to relay to the user. */
  jwe: string;
  mediaType: string;
}

export interface AuthenticationSuccess {
  attemptId: string;
  subjectDid: Did;
  document: DIDDocument;
}

function snapshot(attempt: AuthenticationAttempt): AuthenticationAttempt {
  return { ...attempt, nonce: new Uint8Array(attempt.nonce) };
}

function unknownAttempt(identifier: string, cause?: FanError): FanError {
  return new FanError(
    FanErrorCode.UNKNOWN_ATTEMPT,
    `No pending authentication attempt ${identifier}`,
    { attempt: identifier },
    { cause },
  );
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && timingSafeEqual(a, b);
}

export class ChallengeAuthenticator {
  private readonly store: AttemptStore;
  private readonly attemptTtlMs: number;
  private readonly retainTerminalMs: number;
  private readonly nonceBytes: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private sweeper: ReturnType<typeof setInterval> | null = null;

  constructor(options: ChallengeAuthenticatorOptions = {}) {
    this.store = options.store ?? new AttemptStore();
    this.attemptTtlMs = options.attemptTtlMs ?? DEFAULT_ATTEMPT_TTL_MS;
    this.retainTerminalMs = options.retainTerminalMs ?? DEFAULT_RETAIN_TERMINAL_MS;
    this.nonceBytes = Math.max(MIN_NONCE_BYTES, options.nonceBytes ?? 32);
    this.log = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Issue a challenge to the subject of a verified document.
   * @throws {FanError} NO_VERIFICATION_METHODS if the subject lists no
   *   authentication keys, UNSUPPORTED_ALGORITHM if one cannot be encrypted to.
   */
  async issue(subjectDocument: DIDDocument): Promise<IssuedChallenge> {
    const keys = keysFor(subjectDocument, "authentication");
    if (keys.length === 0) {
      throw new FanError(
        FanErrorCode.NO_VERIFICATION_METHODS,
        `${formatDid(subjectDocument.subjectDid)} lists no authentication keys`,
      );
    }

    const identifier = uuidv7();
    const nonce = new Uint8Array(randomBytes(this.nonceBytes));
    const payload: ChallengePayload = {
      data: Buffer.from(nonce).toString("base64"),
      identifier,
    };
    const jwe = await encryptToKeySet(new TextEncoder().encode(JSON.stringify(payload)), keys);

    const issuedAt = this.now();
    const attempt: AuthenticationAttempt = {
      identifier,
      nonce,
      subjectDid: subjectDocument.subjectDid,
      document: subjectDocument,
      issuedAt: new Date(issuedAt),
      expiresAt: new Date(issuedAt + this.attemptTtlMs),
      status: "pending",
    };
    this.store.insert(attempt);

    this.log.debug(
      { attempt: identifier, did: formatDid(subjectDocument.subjectDid), recipients: keys.length },
      "challenge issued",
    );
    return { attempt: snapshot(attempt), jwe, mediaType: joseMediaType(jwe) };
  }

  /**
   * Check a signed response. Succeeds at most once per attempt.
   * @throws {FanError} MALFORMED_PAYLOAD, UNKNOWN_ATTEMPT (also for expired
   *   or already settled attempts), SIGNATURE_INVALID or NONCE_MISMATCH.
   */
  async respond(jws: string): Promise<AuthenticationSuccess> {
    const decoded = decodeJws(jws);
    const payload = this.parsePayload(decoded.payload);
    const attempt = this.lookup(payload.identifier);

    const keys = keysFor(attempt.document, "authentication");
    if (!(await verifySignature(decoded, keys))) {
      this.log.info({ attempt: attempt.identifier }, "response signature invalid");
      throw new FanError(
        FanErrorCode.SIGNATURE_INVALID,
        "Response is not signed by any of the subject's authentication keys",
        { attempt: attempt.identifier },
      );
    }

    const data = new Uint8Array(Buffer.from(payload.data, "base64"));
    if (!sameBytes(data, attempt.nonce)) {
      this.settle(attempt, "failed");
      this.log.info({ attempt: attempt.identifier }, "nonce mismatch");
      throw new FanError(FanErrorCode.NONCE_MISMATCH, "Response does not match the challenge", {
        attempt: attempt.identifier,
      });
    }

    this.settle(attempt, "succeeded");
    this.log.info(
      { attempt: attempt.identifier, did: formatDid(attempt.subjectDid) },
      "authentication succeeded",
    );
    return {
      attemptId: attempt.identifier,
      subjectDid: attempt.subjectDid,
      document: attempt.document,
    };
  }

  /** A copy of an attempt, with lazy expiry applied. */
  get(identifier: string): AuthenticationAttempt | undefined {
    const attempt = this.store.get(identifier);
    if (!attempt) return undefined;
    this.expireIfDue(attempt);
    return snapshot(attempt);
  }

  /** Status of an attempt, or undefined once forgotten. */
  status(identifier: string): AttemptStatus | undefined {
    return this.get(identifier)?.status;
  }

  /** Expire overdue attempts and forget settled ones past retention. */
  sweep(): number {
    return this.store.sweep(this.now(), this.retainTerminalMs);
  }

  startSweeper(intervalMs = 60_000): void {
    if (this.sweeper) return;
    this.sweeper = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        this.log.debug({ removed }, "swept authentication attempts");
      }
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private parsePayload(bytes: Uint8Array): ChallengePayload {
    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder().decode(bytes));
    } catch (err) {
      throw new FanError(FanErrorCode.MALFORMED_PAYLOAD, "Response payload is not JSON", undefined, {
        cause: err,
      });
    }
    const result = challengePayloadSchema.safeParse(parsed);
    if (!result.success) {
      throw new FanError(
        FanErrorCode.MALFORMED_PAYLOAD,
        'Response payload needs base64 "data" and string "identifier"',
      );
    }
    return result.data;
  }

  private expireIfDue(attempt: AuthenticationAttempt): boolean {
    const now = this.now();
    if (attempt.status === "pending" && now > attempt.expiresAt.getTime()) {
      this.store.compareAndSet(attempt.identifier, "pending", "expired", new Date(now));
      return true;
    }
    return attempt.status === "expired";
  }

  private expiredError(identifier: string): FanError {
    return new FanError(FanErrorCode.ATTEMPT_EXPIRED, `Attempt ${identifier} has expired`, {
      attempt: identifier,
    });
  }

  private lookup(identifier: string): AuthenticationAttempt {
    const attempt = this.store.get(identifier);
    if (!attempt) {
      throw unknownAttempt(identifier);
    }
    if (this.expireIfDue(attempt)) {
      throw unknownAttempt(identifier, this.expiredError(identifier));
    }
    if (attempt.status !== "pending") {
      throw unknownAttempt(identifier);
    }
    return attempt;
  }

  /**
   * Settle a pending attempt. Losing the compare-and-set (another response
   * settled it first, or it expired meanwhile) is reported as UNKNOWN_ATTEMPT.
   */
  private settle(attempt: AuthenticationAttempt, next: TerminalStatus): void {
    if (this.expireIfDue(attempt)) {
      throw unknownAttempt(attempt.identifier, this.expiredError(attempt.identifier));
    }
    if (!this.store.compareAndSet(attempt.identifier, "pending", next, new Date(this.now()))) {
      throw unknownAttempt(attempt.identifier);
    }
  }
}

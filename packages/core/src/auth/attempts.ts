/**
 * Pending authentication attempts.
 *
 * The store is the single source of truth for attempt status. Status moves
 * only through `compareAndSet`, from `pending` to exactly one terminal
 * state.
 */

import type { Did, DIDDocument } from "../types/did.js";
import { FanError, FanErrorCode } from "../types/errors.js";

export type AttemptStatus = "pending" | "succeeded" | "failed" | "expired";

export type TerminalStatus = Exclude<AttemptStatus, "pending">;

export interface AuthenticationAttempt {
  /** Attempt id chosen by the Web Site. */
  identifier: string;
  /** Random challenge, at least 16 bytes. */
  nonce: Uint8Array;
  subjectDid: Did;
  /** Subject document as resolved at issuance. */
  document: DIDDocument;
  issuedAt: Date;
  expiresAt: Date;
  status: AttemptStatus;
  /** When the attempt left `pending`. */
  settledAt?: Date;
}

export class AttemptStore {
  private attempts = new Map<string, AuthenticationAttempt>();

  /**
   * Add a new pending attempt.
   * @throws {FanError} INTERNAL_ERROR if the id was ever issued and is still held.
   */
  insert(attempt: AuthenticationAttempt): void {
    if (this.attempts.has(attempt.identifier)) {
      throw new FanError(FanErrorCode.INTERNAL_ERROR, `Attempt id ${attempt.identifier} reused`);
    }
    this.attempts.set(attempt.identifier, attempt);
  }

  get(identifier: string): AuthenticationAttempt | undefined {
    return this.attempts.get(identifier);
  }

  /**
   * Move `identifier` from `expected` to `next`. Returns false, changing
   * nothing, if the attempt is missing or not in `expected`.
   */
  compareAndSet(
    identifier: string,
    expected: "pending",
    next: TerminalStatus,
    at: Date = new Date(),
  ): boolean {
    const attempt = this.attempts.get(identifier);
    if (!attempt || attempt.status !== expected) return false;
    attempt.status = next;
    attempt.settledAt = at;
    return true;
  }

  delete(identifier: string): boolean {
    return this.attempts.delete(identifier);
  }

  /**
   * Expire overdue pending attempts and forget terminal ones settled more
   * than `retainTerminalMs` ago.
   * @returns Number of attempts removed.
   */
  sweep(now: number, retainTerminalMs: number): number {
    let removed = 0;
    for (const [identifier, attempt] of this.attempts) {
      if (attempt.status === "pending" && now > attempt.expiresAt.getTime()) {
        this.compareAndSet(identifier, "pending", "expired", new Date(now));
      }
      if (
        attempt.status !== "pending" &&
        now - (attempt.settledAt?.getTime() ?? 0) >= retainTerminalMs
      ) {
        this.attempts.delete(identifier);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.attempts.size;
  }
}

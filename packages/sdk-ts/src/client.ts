/**
 * User SDK client.
 *
 * Answers authentication challenges issued by a Web Site on behalf of a
 * user whose DID document is published by a FAN agent.
 */

import type { JWK } from "jose";
import {
  FanError,
  FanErrorCode,
  JOSE_MIME,
  addressToDid,
  challengePayloadSchema,
  decrypt,
  formatDid,
  isFanError,
  isPrivateJwk,
  parseAddress,
  signCompactJws,
  type ChallengePayload,
  type Did,
} from "@fan-auth/core";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface FanUserConfig {
  /** The user's address, `name@domain[:port]`. */
  address: string;
  /** Private halves of the user's authentication keys. */
  keys: readonly JWK[];
  /** Fetch implementation; defaults to the global one. */
  fetch?: typeof fetch;
}

/** Query parameter and header used by the authentication endpoint. */
export const ADDRESS_PARAM = "address";
export const ATTEMPT_HEADER = "x-fan-attempt";

export interface AuthenticationResult {
  status: "authenticated";
  did: string;
  attempt: string;
}

export interface AnsweredChallenge {
  payload: ChallengePayload;
  /** Compact JWS to POST back to the site. */
  jws: string;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const decoder = new TextDecoder();
const encoder = new TextEncoder();

function parsePayload(plaintext: Uint8Array): ChallengePayload {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(plaintext));
  } catch (err) {
    throw new FanError(FanErrorCode.MALFORMED_PAYLOAD, "Challenge payload is not JSON", undefined, {
      cause: err,
    });
  }
  const parsed = challengePayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new FanError(FanErrorCode.MALFORMED_PAYLOAD, "Challenge payload lacks data or identifier", {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

function knownCode(code: unknown): FanErrorCode | undefined {
  return Object.values(FanErrorCode).find((c) => c === code);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Rebuild a FanError from a `{error:{code,message,details}}` body. */
function errorFromBody(status: number, body: unknown): FanError {
  const error = isRecord(body) && isRecord(body.error) ? body.error : undefined;
  const code = knownCode(error?.code) ?? FanErrorCode.INTERNAL_ERROR;
  const message = typeof error?.message === "string" ? error.message : `HTTP ${status}`;
  const details = isRecord(error?.details) ? error.details : undefined;
  return new FanError(code, message, details);
}

// ---------------------------------------------------------------------------
// FanUser
// ---------------------------------------------------------------------------

export class FanUser {
  private readonly _address: string;
  private readonly _did: Did;
  private readonly _keys: readonly JWK[];
  private readonly _fetch: typeof fetch;

  constructor(config: FanUserConfig) {
    this._did = addressToDid(parseAddress(config.address));
    this._address = config.address;

    if (config.keys.length === 0) {
      throw new FanError(FanErrorCode.KEY_NOT_FOUND, "A user needs at least one private key");
    }
    for (const key of config.keys) {
      if (!isPrivateJwk(key)) {
        throw new FanError(FanErrorCode.KEY_NOT_FOUND, "User keys must include private members", {
          kid: key.kid,
        });
      }
    }
    this._keys = config.keys;
    this._fetch = config.fetch ?? ((input, init) => fetch(input, init));
  }

  get address(): string {
    return this._address;
  }

  get did(): string {
    return formatDid(this._did);
  }

  // -------------------------------------------------------------------------
  // Challenge handling
  // -------------------------------------------------------------------------

  /**
   * Decrypt a challenge with whichever of the user's keys it was sealed to.
   * @throws {FanError} DECRYPTION_FAILED when none of the keys can open it.
   */
  async decryptChallenge(jwe: string): Promise<ChallengePayload> {
    const { payload } = await this.open(jwe);
    return payload;
  }

  /** Decrypt a challenge and sign its payload with the key that opened it. */
  async answerChallenge(jwe: string): Promise<AnsweredChallenge> {
    const { payload, key } = await this.open(jwe);
    const body = { data: payload.data, identifier: payload.identifier };
    const jws = await signCompactJws(encoder.encode(JSON.stringify(body)), key);
    return { payload, jws };
  }

  /**
   * Run the full challenge/response against a site's authentication endpoint.
   * @param siteUrl - The endpoint URL, e.g. `https://site.example/fan/auth`.
   */
  async authenticate(siteUrl: string | URL): Promise<AuthenticationResult> {
    const url = new URL(siteUrl);
    url.searchParams.set(ADDRESS_PARAM, this._address);

    const challenge = await this.send(url, { method: "GET" });
    const attempt = challenge.headers.get(ATTEMPT_HEADER);
    const { payload, jws } = await this.answerChallenge(await challenge.text());
    if (attempt !== null && attempt !== payload.identifier) {
      throw new FanError(
        FanErrorCode.MALFORMED_PAYLOAD,
        `Challenge identifier does not match the ${ATTEMPT_HEADER} header`,
        { attempt, identifier: payload.identifier },
      );
    }

    const response = await this.send(new URL(siteUrl), {
      method: "POST",
      headers: { "Content-Type": JOSE_MIME },
      body: jws,
    });
    const result: unknown = await response.json();
    if (!isRecord(result) || result.status !== "authenticated" || typeof result.did !== "string") {
      throw new FanError(FanErrorCode.MALFORMED_PAYLOAD, "Site returned an unexpected result", {
        url: url.origin,
      });
    }
    return {
      status: "authenticated",
      did: result.did,
      attempt: typeof result.attempt === "string" ? result.attempt : payload.identifier,
    };
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private async open(jwe: string): Promise<{ payload: ChallengePayload; key: JWK }> {
    let lastError: unknown;
    for (const key of this._keys) {
      let plaintext: Uint8Array;
      try {
        plaintext = await decrypt(jwe, key);
      } catch (err) {
        if (!isFanError(err)) throw err;
        lastError = err;
        continue;
      }
      return { payload: parsePayload(plaintext), key };
    }
    throw new FanError(
      FanErrorCode.DECRYPTION_FAILED,
      `None of ${this._address}'s keys can open the challenge`,
      undefined,
      { cause: lastError },
    );
  }

  /**
   * Fetch wrapper that throws FanError on non-2xx responses.
   */
  private async send(url: URL, init: RequestInit): Promise<Response> {
    let response: Response;
    try {
      response = await this._fetch(url, init);
    } catch (err) {
      throw new FanError(
        FanErrorCode.FETCH_FAILED,
        `Network error reaching ${url.origin}: ${err instanceof Error ? err.message : String(err)}`,
        { url: url.href, transport: true },
        { cause: err },
      );
    }

    if (!response.ok) {
      let body: unknown;
      try {
        body = await response.json();
      } catch {
        // Error bodies are not always JSON.
        body = undefined;
      }
      throw errorFromBody(response.status, body);
    }
    return response;
  }
}

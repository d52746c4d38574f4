/**
 * DID resolution: address → verified DID document.
 *
 * Standard path: fetch and verify the agent's `/fan.did`, then fetch the
 * user document and verify it against the agent's authentication keys.
 * Sovereign path: the site supplies the document out of band and it is
 * verified against its own capabilityInvocation keys.
 *
 * The resolver never retries a failure. A 304 whose cached bytes no longer
 * verify (the agent rotated its keys) is followed by one unconditional fetch.
 */

import { calculateJwkThumbprint } from "jose";
import { JOSE_JSON_MIME, JOSE_MIME, type Fetcher, type FetchResponse, httpFetcher } from "../types/fetch.js";
import type { Address, Did, DIDDocument } from "../types/did.js";
import { FanError, FanErrorCode, isFanError } from "../types/errors.js";
import {
  verifyAgentSelfSignature,
  verifySovereign,
  verifySubjectSignature,
} from "../trust/verifier.js";
import { type Logger, silentLogger } from "../util/logger.js";
import {
  type AgentEntry,
  agentAuthority,
  type CacheEntry,
  DocumentCache,
  type RefreshPolicy,
} from "./cache.js";
import { keysFor } from "./document.js";
import {
  addressToDid,
  agentTrustUrl,
  didEquals,
  didToLookupUrl,
  formatDid,
  parseAddress,
} from "./identifier.js";

/** Looks up the signed document for a sovereign DID. Site-specific. */
export type SovereignSource = (did: Did) => Promise<string>;

/** Site allow/deny gate for sovereign identities. */
export type SovereignPolicy = (document: DIDDocument) => boolean | Promise<boolean>;

export interface ResolverOptions {
  fetcher?: Fetcher;
  cache?: DocumentCache;
  /** Default `always`, as required of authenticating Web Sites. */
  refresh?: RefreshPolicy;
  /**
   * Serve the last verified document when a refresh fails at the transport
   * level (network error or 5xx). Off unless explicitly enabled.
   */
  fallbackToCache?: boolean;
  sovereignSource?: SovereignSource;
  /** Defaults to accepting every sovereign document that verifies. */
  sovereignPolicy?: SovereignPolicy;
  logger?: Logger;
}

const ACCEPT_JOSE = `${JOSE_MIME}, ${JOSE_JSON_MIME}`;

/** Outcome of one fetch: a response, or a failure to get one. */
type FetchOutcome =
  | { ok: true; response: FetchResponse }
  | { ok: false; error: FanError };

function isTransportFailure(outcome: FetchOutcome): boolean {
  return !outcome.ok || outcome.response.status >= 500;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function bodyText(response: FetchResponse): string {
  return new TextDecoder().decode(response.body);
}

export class Resolver {
  private readonly fetcher: Fetcher;
  private readonly refresh: RefreshPolicy;
  private readonly fallbackToCache: boolean;
  private readonly sovereignSource?: SovereignSource;
  private readonly sovereignPolicy: SovereignPolicy;
  private readonly log: Logger;
  readonly cache: DocumentCache;

  constructor(options: ResolverOptions = {}) {
    this.fetcher = options.fetcher ?? httpFetcher;
    this.cache = options.cache ?? new DocumentCache();
    this.refresh = options.refresh ?? "always";
    this.fallbackToCache = options.fallbackToCache ?? false;
    this.sovereignSource = options.sovereignSource;
    this.sovereignPolicy = options.sovereignPolicy ?? (() => true);
    this.log = options.logger ?? silentLogger;
  }

  /**
   * Resolve an address (parsed or raw) to a verified DID document.
   * @throws {FanError} with the specific failure kind; never retried.
   */
  async resolve(address: Address | string): Promise<DIDDocument> {
    const parsed = typeof address === "string" ? parseAddress(address) : address;
    return this.resolveDid(addressToDid(parsed));
  }

  /** Resolve a DID directly. */
  async resolveDid(did: Did): Promise<DIDDocument> {
    if (did.sovereign) {
      return this.resolveSovereign(did);
    }

    const agent = await this.resolveAgent(did.domain, did.port);
    return this.cache.withLock(did, () => this.resolveSubject(did, agent));
  }

  // -----------------------------------------------------------------------
  // Sovereign path
  // -----------------------------------------------------------------------

  private async resolveSovereign(did: Did): Promise<DIDDocument> {
    const id = formatDid(did);
    if (!this.sovereignSource) {
      throw new FanError(
        FanErrorCode.UNSUPPORTED_DID,
        `No sovereign document source configured for ${id}`,
      );
    }

    const document = await verifySovereign(await this.sovereignSource(did));
    if (!didEquals(document.subjectDid, did)) {
      throw new FanError(
        FanErrorCode.SUBJECT_UNTRUSTED,
        `Sovereign document names ${formatDid(document.subjectDid)}, expected ${id}`,
      );
    }
    if (!(await this.sovereignPolicy(document))) {
      throw new FanError(FanErrorCode.SUBJECT_UNTRUSTED, `Sovereign DID ${id} rejected by site policy`);
    }

    this.log.debug({ did: id }, "sovereign document verified");
    return document;
  }

  // -----------------------------------------------------------------------
  // Standard path
  // -----------------------------------------------------------------------

  private async fetch(url: URL, ifModifiedSince?: Date): Promise<FetchOutcome> {
    try {
      const response = await this.fetcher(url, { ifModifiedSince, accept: ACCEPT_JOSE });
      return { ok: true, response };
    } catch (err) {
      return {
        ok: false,
        error: new FanError(
          FanErrorCode.FETCH_FAILED,
          `Failed to fetch ${url.href}: ${err instanceof Error ? err.message : String(err)}`,
          { url: url.href, transport: true },
          { cause: err },
        ),
      };
    }
  }

  private async resolveAgent(domain: string, port?: number): Promise<AgentEntry> {
    const authority = agentAuthority(domain, port);
    const url = agentTrustUrl(domain, port);
    const cached = this.cache.getAgent(authority);
    const outcome = await this.fetch(url, cached?.lastModified);

    if (cached && outcome.ok && outcome.response.status === 304) {
      this.cache.touchAgent(authority);
      return cached;
    }

    if (cached && this.fallbackToCache && isTransportFailure(outcome)) {
      this.log.warn({ agent: authority }, "agent refresh failed; using cached agent document");
      return cached;
    }

    if (!outcome.ok) {
      throw new FanError(
        FanErrorCode.AGENT_DOCUMENT_UNREACHABLE,
        `Agent document for ${authority} is unreachable`,
        { url: url.href },
        { cause: outcome.error },
      );
    }

    let document: DIDDocument;
    try {
      document = await verifyAgentSelfSignature(domain, outcome.response, port);
    } catch (err) {
      if (isFanError(err) && err.code !== FanErrorCode.AGENT_DOCUMENT_UNREACHABLE) {
        const dropped = this.cache.invalidateAgent(authority);
        this.log.warn(
          { agent: authority, code: err.code, dropped },
          "agent document failed verification; dependent entries dropped",
        );
      }
      throw err;
    }

    if (cached && !(await sameKeySet(cached.document, document))) {
      const dropped = this.cache.invalidateAgent(authority);
      this.log.info({ agent: authority, dropped }, "agent keys changed; dependent entries dropped");
    }

    this.log.debug({ agent: authority }, "agent document verified");
    return this.cache.putAgent({
      authority,
      document,
      wrappedJws: bodyText(outcome.response),
      lastModified: outcome.response.lastModified ?? new Date(),
    });
  }

  private async resolveSubject(did: Did, agent: AgentEntry): Promise<DIDDocument> {
    const id = formatDid(did);
    let entry = this.cache.get(did);

    if (entry && !this.cache.shouldRevalidate(entry, agent.lastModified, this.refresh)) {
      this.log.debug({ did: id }, "serving cached document");
      return entry.document;
    }

    const url = didToLookupUrl(did);
    let outcome = await this.fetch(url, entry?.lastModified);

    if (entry && outcome.ok && outcome.response.status === 304) {
      const confirmed = await this.confirmCached(did, entry, agent);
      if (confirmed) {
        return confirmed;
      }
      // The cached bytes no longer verify; fetch the current ones.
      entry = undefined;
      outcome = await this.fetch(url);
    }

    if (entry && this.fallbackToCache && isTransportFailure(outcome)) {
      this.log.warn({ did: id }, "document refresh failed; using cached document");
      return entry.document;
    }

    if (!outcome.ok) {
      throw outcome.error;
    }
    const { response } = outcome;
    if (!isSuccess(response.status)) {
      throw new FanError(
        FanErrorCode.FETCH_FAILED,
        `Fetching ${url.href} returned HTTP ${response.status}`,
        { url: url.href, status: response.status, transport: false },
      );
    }

    const wrappedJws = bodyText(response);
    const document = await verifySubjectSignature(agent.document, wrappedJws);
    if (!didEquals(document.subjectDid, did)) {
      throw new FanError(
        FanErrorCode.SUBJECT_UNTRUSTED,
        `Document served for ${id} names ${formatDid(document.subjectDid)}`,
      );
    }

    this.cache.put(did, {
      document,
      wrappedJws,
      lastModified: response.lastModified ?? new Date(),
      agent: agent.authority,
    });
    this.log.debug({ did: id }, "document fetched and verified");
    return document;
  }

  /**
   * A 304 keeps the cached bytes, but they are checked again against the
   * agent's current keys before being trusted.
   * @returns undefined when they no longer verify; the entry is dropped.
   */
  private async confirmCached(
    did: Did,
    entry: CacheEntry,
    agent: AgentEntry,
  ): Promise<DIDDocument | undefined> {
    let document: DIDDocument;
    try {
      document = await verifySubjectSignature(agent.document, entry.wrappedJws);
    } catch (err) {
      if (!isFanError(err)) throw err;
      this.cache.invalidate(did);
      this.log.info({ did: formatDid(did), code: err.code }, "cached document no longer verifies");
      return undefined;
    }
    this.cache.touch(did);
    this.log.debug({ did: formatDid(did) }, "document not modified");
    return document;
  }
}

async function thumbprints(document: DIDDocument): Promise<Set<string>> {
  const keys = keysFor(document, "authentication");
  return new Set(await Promise.all(keys.map((key) => calculateJwkThumbprint(key))));
}

async function sameKeySet(a: DIDDocument, b: DIDDocument): Promise<boolean> {
  const [left, right] = await Promise.all([thumbprints(a), thumbprints(b)]);
  return left.size === right.size && [...left].every((print) => right.has(print));
}

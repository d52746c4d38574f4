/**
 * Cache of verified DID documents.
 *
 * Entries only ever hold documents that passed the trust verifier. Each
 * entry remembers which agent vouched for it so that an agent failing
 * verification drops everything it vouched for.
 */

import type { Did, DIDDocument } from "../types/did.js";
import { KeyedLock } from "../util/keyed-lock.js";
import { formatDid } from "./identifier.js";

/** Default time-to-live for cached documents (1 hour). */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

/**
 * When to re-fetch a cached subject document:
 * - `always`: on every resolution (authenticating Web Sites must use this);
 * - `on-agent-change`: only when the agent's document is newer than the entry.
 */
export type RefreshPolicy = "always" | "on-agent-change";

export interface CacheEntry {
  key: Did;
  document: DIDDocument;
  /** The signed envelope the document was verified from. */
  wrappedJws: string;
  lastModified: Date;
  fetchedAt: Date;
  /** Authority (`domain[:port]`) of the agent that vouched for it. */
  agent?: string;
}

export interface AgentEntry {
  authority: string;
  document: DIDDocument;
  wrappedJws: string;
  lastModified: Date;
  fetchedAt: Date;
}

export interface DocumentCacheOptions {
  /** Entries older than this are dropped on access. */
  ttlMs?: number;
  /** Clock, for tests. */
  now?: () => number;
}

/** `domain[:port]` key for agent entries. */
export function agentAuthority(domain: string, port?: number): string {
  return port !== undefined ? `${domain}:${port}` : domain;
}

/**
 * True if a cached entry must be re-fetched before use.
 * @param agentLastModified - Last-Modified of the vouching agent's current document.
 */
export function shouldRevalidate(
  entry: Pick<CacheEntry, "lastModified">,
  agentLastModified: Date | undefined,
  policy: RefreshPolicy = "on-agent-change",
): boolean {
  if (policy === "always") return true;
  return (
    agentLastModified !== undefined &&
    agentLastModified.getTime() > entry.lastModified.getTime()
  );
}

export class DocumentCache {
  private entries = new Map<string, CacheEntry>();
  private agents = new Map<string, AgentEntry>();
  private locks = new KeyedLock();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: DocumentCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  private expired(fetchedAt: Date): boolean {
    return this.now() - fetchedAt.getTime() > this.ttlMs;
  }

  // -----------------------------------------------------------------------
  // Subject documents
  // -----------------------------------------------------------------------

  /** The cached entry for `did`, if present and within TTL. No I/O. */
  get(did: Did): CacheEntry | undefined {
    const key = formatDid(did);
    const entry = this.entries.get(key);
    if (entry && this.expired(entry.fetchedAt)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  /** Store a verified document, replacing any previous entry. */
  put(did: Did, entry: Omit<CacheEntry, "key" | "fetchedAt">): CacheEntry {
    const stored: CacheEntry = { ...entry, key: did, fetchedAt: new Date(this.now()) };
    this.entries.set(formatDid(did), stored);
    return stored;
  }

  /** Record a successful revalidation that returned "not modified". */
  touch(did: Did): void {
    const entry = this.entries.get(formatDid(did));
    if (entry) {
      entry.fetchedAt = new Date(this.now());
    }
  }

  invalidate(did: Did): boolean {
    return this.entries.delete(formatDid(did));
  }

  shouldRevalidate(
    entry: CacheEntry,
    agentLastModified: Date | undefined,
    policy?: RefreshPolicy,
  ): boolean {
    return shouldRevalidate(entry, agentLastModified, policy);
  }

  /** Serialize work on one DID; unrelated DIDs proceed in parallel. */
  withLock<T>(did: Did, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(formatDid(did), fn);
  }

  // -----------------------------------------------------------------------
  // Agent documents
  // -----------------------------------------------------------------------

  getAgent(authority: string): AgentEntry | undefined {
    const entry = this.agents.get(authority);
    if (entry && this.expired(entry.fetchedAt)) {
      this.agents.delete(authority);
      return undefined;
    }
    return entry;
  }

  putAgent(entry: Omit<AgentEntry, "fetchedAt">): AgentEntry {
    const stored: AgentEntry = { ...entry, fetchedAt: new Date(this.now()) };
    this.agents.set(entry.authority, stored);
    return stored;
  }

  touchAgent(authority: string): void {
    const entry = this.agents.get(authority);
    if (entry) {
      entry.fetchedAt = new Date(this.now());
    }
  }

  /**
   * Drop an agent and every document it vouched for.
   * @returns Number of subject entries removed.
   */
  invalidateAgent(authority: string): number {
    this.agents.delete(authority);
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.agent === authority) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  // -----------------------------------------------------------------------
  // Housekeeping
  // -----------------------------------------------------------------------

  /** Remove every expired entry. Returns how many were removed. */
  sweep(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.expired(entry.fetchedAt)) {
        this.entries.delete(key);
        removed++;
      }
    }
    for (const [authority, entry] of this.agents) {
      if (this.expired(entry.fetchedAt)) {
        this.agents.delete(authority);
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }
}

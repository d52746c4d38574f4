/**
 * The fetch capability the engine consumes.
 *
 * Transport and TLS are owned by the host; the engine only asks for bytes.
 */

/** MIME type of compact JWS / JWE bodies. */
export const JOSE_MIME = "application/jose";
/** MIME type of JSON-serialized JWS / JWE bodies. */
export const JOSE_JSON_MIME = "application/jose+json";

export interface FetchRequest {
  /** Sent as `If-Modified-Since` when present. */
  ifModifiedSince?: Date;
  /** Sent as `Accept` when present. */
  accept?: string;
}

export interface FetchResponse {
  status: number;
  body: Uint8Array;
  contentType?: string;
  lastModified?: Date;
}

/**
 * Fetch a URL. Implementations resolve with whatever status the server
 * returned and reject only when no response was received at all.
 */
export type Fetcher = (url: URL, request?: FetchRequest) => Promise<FetchResponse>;

/** A `Fetcher` backed by the global WHATWG `fetch`. */
export const httpFetcher: Fetcher = async (url, request = {}) => {
  const headers: Record<string, string> = {};
  if (request.ifModifiedSince) {
    headers["If-Modified-Since"] = request.ifModifiedSince.toUTCString();
  }
  if (request.accept) {
    headers.Accept = request.accept;
  }

  const response = await fetch(url, { headers, redirect: "error" });
  const body = new Uint8Array(await response.arrayBuffer());
  const lastModifiedHeader = response.headers.get("last-modified");
  const lastModified = lastModifiedHeader ? new Date(lastModifiedHeader) : undefined;

  return {
    status: response.status,
    body,
    contentType: response.headers.get("content-type") ?? undefined,
    lastModified:
      lastModified && !Number.isNaN(lastModified.getTime()) ? lastModified : undefined,
  };
};

/**
 * Identifier codec.
 *
 * Translates between human addresses (`identifier@domain[:port]`), `did:fan`
 * strings and the HTTPS locations their documents are served from.
 */

import { domainToASCII } from "node:url";
import {
  type Address,
  type Did,
  FAN_METHOD,
  SOVEREIGN_DOMAIN,
} from "../types/did.js";
import { FanError, FanErrorCode } from "../types/errors.js";

const DID_PREFIX = `did:${FAN_METHOD}:`;

/** Separator between domain and port inside the DID's domain component. */
const PORT_SEPARATOR = "%3F";

const PORT_PATTERN = /^(0|[1-9][0-9]*)$/;
const ENCODED_IDENTIFIER = /^(?:[A-Za-z0-9._-]|%[0-9A-Fa-f]{2})+$/;
const UNRESERVED = /^[A-Za-z0-9._-]$/;

/** Path prefix user documents are served under. */
export const USER_PATH_PREFIX = "/did-fan/user/";
/** Path of an agent's self-signed trust document. */
export const AGENT_TRUST_PATH = "/fan.did";

// ---------------------------------------------------------------------------
// Addresses
// ---------------------------------------------------------------------------

function parsePort(raw: string, address: string): number {
  if (!PORT_PATTERN.test(raw)) {
    throw new FanError(FanErrorCode.MALFORMED_PORT, `Invalid port "${raw}" in "${address}"`);
  }
  const port = Number(raw);
  if (port > 65535) {
    throw new FanError(FanErrorCode.MALFORMED_PORT, `Port ${port} out of range in "${address}"`);
  }
  return port;
}

function normalizeDomain(raw: string, address: string): string {
  const ascii = raw === "" ? "" : domainToASCII(raw);
  if (ascii === "" || ascii === SOVEREIGN_DOMAIN) {
    throw new FanError(FanErrorCode.MALFORMED_ADDRESS, `Invalid domain "${raw}" in "${address}"`);
  }
  return ascii;
}

/**
 * Parse `identifier@domain[:port]`. The last `@` separates identifier from
 * domain, so identifiers may themselves contain `@`.
 */
export function parseAddress(raw: string): Address {
  const at = raw.lastIndexOf("@");
  if (at === -1) {
    throw new FanError(FanErrorCode.MALFORMED_ADDRESS, `Address "${raw}" has no "@"`);
  }

  const identifier = raw.slice(0, at);
  if (identifier.length === 0) {
    throw new FanError(FanErrorCode.MALFORMED_ADDRESS, `Address "${raw}" has an empty identifier`);
  }

  const host = raw.slice(at + 1);
  if (host === SOVEREIGN_DOMAIN) {
    return { identifier, domain: SOVEREIGN_DOMAIN };
  }

  const colon = host.lastIndexOf(":");
  if (colon === -1) {
    return { identifier, domain: normalizeDomain(host, raw) };
  }

  const domain = normalizeDomain(host.slice(0, colon), raw);
  return { identifier, domain, port: parsePort(host.slice(colon + 1), raw) };
}

/** Render an address back to its `identifier@domain[:port]` form. */
export function formatAddress(address: Address): string {
  const port = address.port !== undefined ? `:${address.port}` : "";
  return `${address.identifier}@${address.domain}${port}`;
}

// ---------------------------------------------------------------------------
// Identifier encoding
// ---------------------------------------------------------------------------

/** Percent-encode an identifier to DID idchars, lowercase hex. */
export function encodeIdentifier(identifier: string): string {
  let out = "";
  for (const char of identifier) {
    if (UNRESERVED.test(char)) {
      out += char;
      continue;
    }
    for (const byte of new TextEncoder().encode(char)) {
      out += `%${byte.toString(16).padStart(2, "0")}`;
    }
  }
  return out;
}

/** Decode a DID's identifier back to Unicode. */
export function decodeIdentifier(did: Did): string {
  try {
    return decodeURIComponent(did.identifier);
  } catch (err) {
    throw new FanError(
      FanErrorCode.UNSUPPORTED_DID,
      `Identifier "${did.identifier}" is not valid UTF-8`,
      undefined,
      { cause: err },
    );
  }
}

// ---------------------------------------------------------------------------
// DIDs
// ---------------------------------------------------------------------------

function makeDid(domain: string, identifier: string, port?: number): Did {
  const did: Did = {
    methodId: FAN_METHOD,
    domain,
    ...(port !== undefined ? { port } : {}),
    identifier,
    sovereign: domain === SOVEREIGN_DOMAIN,
  };
  return Object.freeze(did);
}

/** Translate an address to its `did:fan`. Sovereign addresses map to sovereign DIDs. */
export function addressToDid(address: Address): Did {
  if (address.domain === SOVEREIGN_DOMAIN) {
    return addressToSovereignDid(address);
  }
  return makeDid(address.domain, encodeIdentifier(address.identifier), address.port);
}

/** Translate an address to a sovereign DID, discarding its domain. */
export function addressToSovereignDid(address: Address): Did {
  return makeDid(SOVEREIGN_DOMAIN, encodeIdentifier(address.identifier));
}

/** Render a DID as `did:fan:<domain>[%3F<port>]:<identifier>`. */
export function formatDid(did: Did): string {
  const port = did.port !== undefined ? `${PORT_SEPARATOR}${did.port}` : "";
  return `${DID_PREFIX}${did.domain}${port}:${did.identifier}`;
}

/** Parse a `did:fan` string. Percent-hex in the identifier is lowercased. */
export function parseDid(raw: string): Did {
  if (!raw.startsWith(DID_PREFIX)) {
    throw new FanError(FanErrorCode.UNSUPPORTED_DID, `Not a did:${FAN_METHOD} DID: "${raw}"`);
  }

  const rest = raw.slice(DID_PREFIX.length);
  const colon = rest.indexOf(":");
  if (colon === -1) {
    throw new FanError(FanErrorCode.UNSUPPORTED_DID, `DID "${raw}" has no identifier`);
  }

  const domainPart = rest.slice(0, colon);
  const identifier = rest.slice(colon + 1);
  if (!ENCODED_IDENTIFIER.test(identifier)) {
    throw new FanError(FanErrorCode.UNSUPPORTED_DID, `DID "${raw}" has an invalid identifier`);
  }
  const normalized = identifier.replace(/%[0-9A-F]{2}/gi, (hex) => hex.toLowerCase());

  if (domainPart === SOVEREIGN_DOMAIN) {
    return makeDid(SOVEREIGN_DOMAIN, normalized);
  }

  const [host, portRaw, ...extra] = domainPart.split(/%3f/i);
  const domain = host ? domainToASCII(host) : "";
  if (domain === "" || extra.length > 0) {
    throw new FanError(FanErrorCode.UNSUPPORTED_DID, `DID "${raw}" has an invalid domain`);
  }

  let port: number | undefined;
  if (portRaw !== undefined) {
    try {
      port = parsePort(portRaw, raw);
    } catch (err) {
      throw new FanError(FanErrorCode.UNSUPPORTED_DID, `DID "${raw}" has an invalid port`, undefined, {
        cause: err,
      });
    }
  }

  return makeDid(domain, normalized, port);
}

/** Structural DID equality. */
export function didEquals(a: Did, b: Did): boolean {
  return (
    a.sovereign === b.sovereign &&
    a.domain === b.domain &&
    a.port === b.port &&
    a.identifier === b.identifier
  );
}

// ---------------------------------------------------------------------------
// Lookup URLs
// ---------------------------------------------------------------------------

function origin(domain: string, port?: number): string {
  return `https://${domain}${port !== undefined ? `:${port}` : ""}`;
}

/**
 * Where a DID's signed document is served.
 * @throws {FanError} UNSUPPORTED_DID for sovereign DIDs, which are never fetched.
 */
export function didToLookupUrl(did: Did): URL {
  if (did.sovereign) {
    throw new FanError(
      FanErrorCode.UNSUPPORTED_DID,
      `Sovereign DID ${formatDid(did)} has no lookup URL`,
    );
  }
  return new URL(`${origin(did.domain, did.port)}${USER_PATH_PREFIX}${did.identifier}.did`);
}

/** Where a domain's agent serves its self-signed trust document. */
export function agentTrustUrl(domain: string, port?: number): URL {
  return new URL(`${origin(domain, port)}${AGENT_TRUST_PATH}`);
}

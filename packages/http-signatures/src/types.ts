/**
 * @omp/http-signatures - request signature verification
 *
 * Runtime-neutral types. No framework types (express.Request etc.)
 * in public API surface.
 */

import type { Ed25519PublicKey } from './keys.js';

/**
 * Enforcement level for inbound request signatures.
 */
export type SignatureMode = 'off' | 'permissive' | 'strict';

/**
 * Key resolver contract.
 * Given a key ID, returns the pinned public key or undefined if unknown.
 */
export interface KeyResolver {
  resolve(keyid: string): Ed25519PublicKey | undefined;
}

/**
 * One member of the Signature-Input header.
 */
export interface SignatureInputEntry {
  /** Label correlating this entry with a Signature member */
  label: string;
  /** Key identifier (required for verification, optional for parsing) */
  keyid?: string;
  /** Unix timestamp the client claims to have signed at (not enforced) */
  created?: number;
  /** All parameters as raw strings, quotes stripped */
  params: Record<string, string>;
}

/**
 * One member of the Signature header.
 */
export interface SignatureEntry {
  label: string;
  /** base64url signature text, colons removed */
  value: string;
}

export type FailureKind = 'none' | 'malformed' | 'unknown_key' | 'bad_signature';

/**
 * Result of evaluating the signatures attached to a request.
 */
export interface VerificationOutcome {
  accepted: boolean;
  /** Label of the signature that verified (if any) */
  matchedLabel?: string;
  failureKind: FailureKind;
}

/**
 * Listener address the request arrived on.
 */
export interface ServerAddress {
  host: string;
  port?: number;
}

/**
 * Request-like object for signature verification.
 *
 * Carries every rendering of the request URL a client may have signed
 * over; adapters fill it from their framework's request object.
 */
export interface SignatureRequest {
  /** HTTP method */
  method: string;
  /** Routed path, without query string */
  path: string;
  /** Mount prefix stripped by a reverse proxy (e.g. "/api") */
  rootPath?: string;
  /** "http" or "https" */
  scheme: string;
  /** Host header value, port included when the client sent one */
  host?: string;
  /** Local listener tuple */
  server?: ServerAddress;
  /** Framework rendering of the absolute URL (query included) */
  url: string;
  /** Origin the client addressed, ending with "/"; the mount prefix is not part of it */
  baseUrl: string;
  /** Request headers, lower-case names */
  headers: Record<string, string | string[] | undefined>;
}

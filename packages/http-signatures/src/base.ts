/**
 * Canonical signing base construction.
 *
 * Clients sign "{METHOD} {absolute URL}". The URL a client signed can
 * differ textually from how the receiving side renders the same request
 * (default port, trailing slash, a doubled slash from base-URL
 * concatenation, Host header vs listener address), so verification
 * works from an ordered list of candidate renderings.
 */

import type { SignatureRequest } from './types.js';

const DEFAULT_PORTS: Record<string, number> = {
  http: 80,
  https: 443,
};

/**
 * Fast-path base: "{METHOD} {baseUrl without trailing slash}{fullPath}".
 *
 * Always a member of buildCandidateBases(); trying it first is only a
 * shortcut for the common deployment.
 */
export function buildSigningBase(request: SignatureRequest): string {
  return `${request.method.toUpperCase()} ${stripTrailingSlashes(request.baseUrl)}${fullPath(request)}`;
}

/**
 * Build every candidate base for a request, most authoritative first.
 *
 * Order:
 * 1. listener tuple (scheme://host[:port]), default port elided
 * 2. framework absolute URL
 * 3. base URL (trailing slash removed) + path
 * 4. raw base URL + path (covers "//")
 * 5. Host header, plus default-port normalized and explicit-port variants
 * 6. trailing-slash-toggled twin of each distinct entry above
 *
 * Pure function of the request; the result holds no duplicates.
 */
export function buildCandidateBases(request: SignatureRequest): string[] {
  const method = request.method.toUpperCase();
  const path = fullPath(request);
  const scheme = request.scheme || 'http';
  const defaultPort = DEFAULT_PORTS[scheme];

  const urls: string[] = [];

  if (request.server?.host) {
    const { host, port } = request.server;
    const isDefault =
      (scheme === 'http' && (port === undefined || port === 80)) ||
      (scheme === 'https' && port === 443);
    urls.push(isDefault ? `${scheme}://${host}${path}` : `${scheme}://${host}:${port}${path}`);
  }

  urls.push(request.url);
  urls.push(`${stripTrailingSlashes(request.baseUrl)}${path}`);
  urls.push(`${request.baseUrl}${path}`);

  const host = request.host;
  if (host) {
    urls.push(`${scheme}://${host}${path}`);
    if (defaultPort !== undefined && host.endsWith(`:${defaultPort}`)) {
      urls.push(`${scheme}://${host.slice(0, host.lastIndexOf(':'))}${path}`);
    }
    if (defaultPort !== undefined && !host.includes(':')) {
      urls.push(`${scheme}://${host}:${defaultPort}${path}`);
    }
  }

  const primaries = unique(urls.map((url) => `${method} ${url}`));
  const seen = new Set(primaries);
  const bases = [...primaries];

  for (const base of primaries) {
    const twin = toggleTrailingSlash(base);
    if (!seen.has(twin)) {
      seen.add(twin);
      bases.push(twin);
    }
  }

  return bases;
}

/**
 * Candidates in the order verification tries them: fast path, then the rest.
 */
export function orderedCandidateBases(request: SignatureRequest): string[] {
  return unique([buildSigningBase(request), ...buildCandidateBases(request)]);
}

/**
 * Convert signature base string to bytes for cryptographic verification.
 */
export function signatureBaseToBytes(signatureBase: string): Uint8Array {
  return new TextEncoder().encode(signatureBase);
}

function fullPath(request: SignatureRequest): string {
  return `${request.rootPath ?? ''}${request.path}`;
}

function stripTrailingSlashes(value: string): string {
  return value.replace(/\/+$/, '');
}

function toggleTrailingSlash(base: string): string {
  return base.endsWith('/') ? stripTrailingSlashes(base) : `${base}/`;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/**
 * Express.js Middleware for Request Signature Enforcement
 *
 * Maps Express requests onto the runtime-neutral SignatureRequest and
 * applies the off / permissive / strict policy.
 *
 * @packageDocumentation
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import pino, { type Logger } from 'pino';
import {
  evaluateSignaturePolicy,
  type KeyResolver,
  type PolicyDecision,
  type SignatureRequest,
  type SignatureSettings,
  type VerificationOutcome,
} from '@omp/http-signatures';

export type RejectDecision = Extract<PolicyDecision, { action: 'reject' }>;

/**
 * How the service is reached from outside, when it differs from what
 * the listener sees (reverse proxies, path prefixes).
 */
export interface RequestUrlOptions {
  /** External base URL, e.g. "https://api.example.com/" */
  publicBaseUrl?: string;
  /** Mount prefix a proxy strips before forwarding, e.g. "/v1" */
  rootPath?: string;
}

/**
 * Express-specific middleware configuration
 */
export interface SignatureMiddlewareConfig extends RequestUrlOptions {
  /** Mode holder; read on every request */
  settings: SignatureSettings;

  /** Key lookup for strict mode */
  keyResolver: KeyResolver;

  /** Defaults to a pino logger named "omp-signatures" */
  logger?: Logger;

  /** Skip enforcement for certain requests */
  skip?: (req: Request) => boolean;

  /** Custom rejection writer (default: JSON error envelope) */
  onReject?: (decision: RejectDecision, req: Request, res: Response) => void;
}

const outcomes = new WeakMap<Request, VerificationOutcome>();

/**
 * Get the verification outcome recorded for a request (strict mode only).
 */
export function getSignatureOutcome(req: Request): VerificationOutcome | undefined {
  return outcomes.get(req);
}

/**
 * Render a listener address as a URL host: IPv4-mapped IPv6 addresses
 * lose their prefix, other IPv6 addresses are bracketed.
 */
export function normalizeAddress(address: string): string {
  if (address.startsWith('::ffff:') && address.includes('.')) {
    return address.slice('::ffff:'.length);
  }
  return address.includes(':') ? `[${address}]` : address;
}

/**
 * Convert Express request to SignatureRequest
 */
export function toSignatureRequest(req: Request, options: RequestUrlOptions = {}): SignatureRequest {
  const scheme = req.protocol;
  const host = req.headers.host || undefined;

  const { localAddress, localPort } = req.socket;
  const server = localAddress
    ? { host: normalizeAddress(localAddress), port: localPort }
    : undefined;

  const authority = host ?? (server ? `${server.host}:${server.port}` : 'localhost');
  const queryIndex = req.originalUrl.indexOf('?');
  const path = queryIndex === -1 ? req.originalUrl : req.originalUrl.slice(0, queryIndex);

  let baseUrl = options.publicBaseUrl ?? `${scheme}://${authority}/`;
  if (!baseUrl.endsWith('/')) {
    baseUrl += '/';
  }

  return {
    method: req.method,
    path,
    rootPath: options.rootPath || undefined,
    scheme,
    host,
    server,
    url: `${scheme}://${authority}${req.originalUrl}`,
    baseUrl,
    headers: req.headers,
  };
}

function defaultReject(decision: RejectDecision, _req: Request, res: Response): void {
  res.status(decision.status).json({
    error: {
      code: decision.code,
      message: decision.message,
      status: decision.status,
    },
  });
}

/**
 * Express middleware enforcing request signatures.
 *
 * @param config - Middleware configuration
 * @returns Express request handler
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { KeyRegistry, SignatureSettings } from '@omp/http-signatures';
 * import { signatureMiddleware } from '@omp/middleware-express';
 *
 * const settings = new SignatureSettings('strict');
 * const keyResolver = new KeyRegistry({ keys: { sig1: '<base64url public key>' } });
 *
 * const app = express();
 * app.post('/objects', signatureMiddleware({ settings, keyResolver }), (req, res) => {
 *   res.status(201).json({ ok: true });
 * });
 * ```
 */
export function signatureMiddleware(config: SignatureMiddlewareConfig): RequestHandler {
  const logger = config.logger ?? pino({ name: 'omp-signatures' });
  const onReject = config.onReject ?? defaultReject;

  return function signatureVerification(req: Request, res: Response, next: NextFunction): void {
    const mode = config.settings.mode;
    if (mode === 'off' || config.skip?.(req)) {
      next();
      return;
    }

    const request = toSignatureRequest(req, config);

    evaluateSignaturePolicy(request, { mode, keyResolver: config.keyResolver })
      .then((decision) => {
        if (decision.action === 'reject') {
          logger.warn(
            { mode, status: decision.status, reason: decision.reason, method: req.method, path: request.path },
            `Signature rejected: ${decision.message}`
          );
          onReject(decision, req, res);
          return;
        }

        if (decision.outcome) {
          outcomes.set(req, decision.outcome);
          logger.debug({ label: decision.outcome.matchedLabel }, 'Signature verified');
        }
        if (decision.warning) {
          logger.warn({ mode, method: req.method, path: request.path }, decision.warning);
        }
        next();
      })
      .catch(next);
  };
}

/**
 * Signature Middleware for Express.js
 *
 * Enforces Signature-Input / Signature request signatures according to
 * the configured mode (off / permissive / strict).
 *
 * @example
 * ```typescript
 * import express from 'express';
 * import { KeyRegistry, SignatureSettings } from '@omp/http-signatures';
 * import { signatureMiddleware } from '@omp/middleware-express';
 *
 * const app = express();
 *
 * app.use('/objects', signatureMiddleware({
 *   settings: new SignatureSettings('permissive'),
 *   keyResolver: new KeyRegistry(),
 * }));
 * ```
 *
 * @packageDocumentation
 */

// Middleware
export {
  signatureMiddleware,
  toSignatureRequest,
  normalizeAddress,
  getSignatureOutcome,
} from './middleware.js';

// Types
export type {
  SignatureMiddlewareConfig,
  RequestUrlOptions,
  RejectDecision,
} from './middleware.js';

// Re-export core types for convenience
export type {
  SignatureMode,
  SignatureRequest,
  VerificationOutcome,
  PolicyDecision,
} from '@omp/http-signatures';

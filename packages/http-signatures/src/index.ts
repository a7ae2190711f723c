/**
 * @omp/http-signatures
 *
 * Ed25519 request signatures carried in Signature-Input / Signature
 * headers: parsing, canonical base candidates, verification and the
 * off / permissive / strict enforcement policy.
 * Runtime-neutral - no framework types in public API.
 */

// Types
export type {
  SignatureMode,
  KeyResolver,
  SignatureInputEntry,
  SignatureEntry,
  FailureKind,
  VerificationOutcome,
  ServerAddress,
  SignatureRequest,
} from './types.js';

// Keys
export { Ed25519PublicKey, KeyRegistry } from './keys.js';
export type { KeyMaterial, KeyEncoding, KeyRegistryOptions } from './keys.js';

// Parser
export { parseSignatureInput, parseSignature, parseSignatureEntries } from './parser.js';

// Signature base
export {
  buildSigningBase,
  buildCandidateBases,
  orderedCandidateBases,
  signatureBaseToBytes,
} from './base.js';

// Verification
export {
  matchLabels,
  validateSignatureSyntax,
  verifyOne,
  verifyAll,
  verifyRequest,
  failureKindFor,
  getHeader,
} from './verify.js';
export type { PresentSignature, VerifyOptions, VerificationResult } from './verify.js';

// Policy
export {
  SIGNATURE_MODES,
  parseSignatureMode,
  SignatureSettings,
  evaluateSignaturePolicy,
} from './policy.js';
export type { PolicyDecision, PolicyOptions, RejectCode } from './policy.js';

// Signing
export { signRequest, generateSigningKey, publicKeyFor } from './sign.js';
export type { SignRequestInput, SignatureHeaders } from './sign.js';

// Encoding
export { base64urlEncode, base64urlDecode, base64Decode, hexDecode, hexEncode } from './base64url.js';

// Errors
export { ErrorCodes, ErrorHttpStatus, HttpSignatureError, KeyMaterialError } from './errors.js';
export type { ErrorCode } from './errors.js';

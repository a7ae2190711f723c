/**
 * Request signature verification.
 *
 * Multi-signature semantics are OR: a request is authentic when any one
 * attached, correctly keyed signature verifies against any candidate
 * base. Syntax checks for every label complete before the first
 * cryptographic attempt, so one malformed label always yields 400.
 */

import type {
  FailureKind,
  KeyResolver,
  SignatureInputEntry,
  SignatureRequest,
  VerificationOutcome,
} from './types.js';
import type { ErrorCode } from './errors.js';
import { parseSignature, parseSignatureInput } from './parser.js';
import { orderedCandidateBases, signatureBaseToBytes } from './base.js';
import { base64urlDecode } from './base64url.js';
import { verify } from './ed25519.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';

/**
 * A label present in both headers, with its keyid checked.
 */
export interface PresentSignature {
  label: string;
  keyid: string;
  /** base64url signature text */
  value: string;
}

/**
 * Options for signature verification.
 */
export interface VerifyOptions {
  /** Key resolver */
  keyResolver: KeyResolver;
}

/**
 * Verification outcome with error detail when not accepted.
 */
export interface VerificationResult extends VerificationOutcome {
  errorCode?: ErrorCode;
  errorMessage?: string;
}

type LabelCheck = Exclude<FailureKind, 'malformed'>;

/**
 * Match parsed headers by label and require a keyid on every match.
 *
 * @throws HttpSignatureError (malformed) on label mismatch or missing keyid
 */
export function matchLabels(
  signatureInputs: Map<string, SignatureInputEntry>,
  signatures: Map<string, string>
): PresentSignature[] {
  const common = [...signatureInputs.keys()].filter((label) => signatures.has(label));
  if (common.length === 0) {
    throw new HttpSignatureError(ErrorCodes.SIGNATURE_LABEL_MISMATCH, 'signature label mismatch');
  }

  const present: PresentSignature[] = [];
  for (const label of common) {
    const keyid = signatureInputs.get(label)?.keyid;
    const value = signatures.get(label) ?? '';
    if (!keyid) {
      throw new HttpSignatureError(
        ErrorCodes.SIGNATURE_PARAM_MISSING,
        `missing keyid for label ${label}`
      );
    }
    present.push({ label, keyid, value });
  }
  return present;
}

/**
 * Syntax-only validation of a header pair: parse both, match labels,
 * require keyids. No cryptography.
 *
 * @throws HttpSignatureError (malformed)
 */
export function validateSignatureSyntax(
  signatureInput: string,
  signature: string
): PresentSignature[] {
  return matchLabels(parseSignatureInput(signatureInput), parseSignature(signature));
}

/**
 * Verify one labelled signature against every candidate base.
 *
 * @returns true on the first candidate that verifies
 */
export async function verifyOne(
  request: SignatureRequest,
  keyid: string,
  signatureB64u: string,
  keyResolver: KeyResolver
): Promise<boolean> {
  return (await checkLabel(request, keyid, signatureB64u, keyResolver)) === 'none';
}

/**
 * Verify parsed headers. Accepts on the first label that verifies.
 *
 * @throws HttpSignatureError - malformed (400) before any crypto, or
 *   KEY_NOT_FOUND / SIGNATURE_INVALID (401) when nothing verifies
 */
export async function verifyAll(
  request: SignatureRequest,
  signatureInputs: Map<string, SignatureInputEntry>,
  signatures: Map<string, string>,
  keyResolver: KeyResolver
): Promise<VerificationOutcome> {
  const present = matchLabels(signatureInputs, signatures);

  let unknownKeysOnly = true;
  for (const { label, keyid, value } of present) {
    const result = await checkLabel(request, keyid, value, keyResolver);
    if (result === 'none') {
      return { accepted: true, matchedLabel: label, failureKind: 'none' };
    }
    if (result !== 'unknown_key') {
      unknownKeysOnly = false;
    }
  }

  throw new HttpSignatureError(
    unknownKeysOnly ? ErrorCodes.KEY_NOT_FOUND : ErrorCodes.SIGNATURE_INVALID,
    'no valid signature'
  );
}

/**
 * Verify the signature headers carried by a request.
 *
 * Never throws for signature problems; the result describes the failure.
 */
export async function verifyRequest(
  request: SignatureRequest,
  options: VerifyOptions
): Promise<VerificationResult> {
  try {
    const signatureInput = getHeader(request.headers, 'signature-input');
    const signature = getHeader(request.headers, 'signature');
    if (!signatureInput || !signature) {
      throw new HttpSignatureError(ErrorCodes.SIGNATURE_MISSING, 'Missing required signature');
    }

    return await verifyAll(
      request,
      parseSignatureInput(signatureInput),
      parseSignature(signature),
      options.keyResolver
    );
  } catch (error) {
    if (error instanceof HttpSignatureError) {
      return {
        accepted: false,
        failureKind: failureKindFor(error),
        errorCode: error.code,
        errorMessage: error.message,
      };
    }
    throw error;
  }
}

/**
 * Map a signature error to the failure kind it represents.
 */
export function failureKindFor(error: HttpSignatureError): FailureKind {
  if (error.code === ErrorCodes.KEY_NOT_FOUND) {
    return 'unknown_key';
  }
  if (error.code === ErrorCodes.SIGNATURE_INVALID) {
    return 'bad_signature';
  }
  return 'malformed';
}

/**
 * Get header value by name (case-insensitive). Repeated header lines
 * are joined with ", " as HTTP list semantics require.
 */
export function getHeader(
  headers: Record<string, string | string[] | undefined>,
  name: string
): string {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lowerName && value !== undefined) {
      return Array.isArray(value) ? value.join(', ') : value;
    }
  }
  return '';
}

async function checkLabel(
  request: SignatureRequest,
  keyid: string,
  signatureB64u: string,
  keyResolver: KeyResolver
): Promise<LabelCheck> {
  const signatureBytes = base64urlDecode(signatureB64u);
  if (!signatureBytes) {
    return 'bad_signature';
  }

  const key = keyResolver.resolve(keyid);
  if (!key) {
    return 'unknown_key';
  }

  const publicKey = key.bytes;
  for (const base of orderedCandidateBases(request)) {
    if (await verify(signatureBytes, signatureBaseToBytes(base), publicKey)) {
      return 'none';
    }
  }
  return 'bad_signature';
}

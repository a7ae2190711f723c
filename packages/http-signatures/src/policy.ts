/**
 * Signature enforcement policy.
 *
 * | mode       | no headers | one header | syntax error | nothing verifies |
 * |------------|------------|------------|--------------|------------------|
 * | off        | proceed    | proceed    | proceed      | proceed          |
 * | permissive | proceed    | 400        | 400          | proceed (warn)   |
 * | strict     | 401        | 401        | 400          | 401              |
 *
 * Permissive mode checks syntax only and never runs cryptography: it
 * lets clients rehearse header construction without being blocked.
 */

import type { KeyResolver, SignatureMode, SignatureRequest, VerificationOutcome } from './types.js';
import { ErrorCodes, HttpSignatureError } from './errors.js';
import { parseSignature, parseSignatureInput } from './parser.js';
import { getHeader, validateSignatureSyntax, verifyAll } from './verify.js';

export const SIGNATURE_MODES: readonly SignatureMode[] = ['off', 'permissive', 'strict'];

/**
 * Parse a mode string (case-insensitive, surrounding whitespace ignored).
 *
 * @throws Error on unknown mode
 */
export function parseSignatureMode(value: string): SignatureMode {
  const normalized = value.trim().toLowerCase();
  const mode = SIGNATURE_MODES.find((m) => m === normalized);
  if (!mode) {
    throw new Error(
      `Invalid signature mode "${value}" (expected one of: ${SIGNATURE_MODES.join(', ')})`
    );
  }
  return mode;
}

/**
 * Owned, runtime-adjustable signature configuration.
 *
 * Every request reads the current mode, so a change applies to the next
 * request without a restart.
 */
export class SignatureSettings {
  private current: SignatureMode;

  constructor(mode: SignatureMode = 'off') {
    this.current = mode;
  }

  get mode(): SignatureMode {
    return this.current;
  }

  set mode(mode: SignatureMode) {
    this.current = parseSignatureMode(mode);
  }
}

export type RejectCode = 'bad_request' | 'unauthorized';

export type PolicyDecision =
  | {
      action: 'proceed';
      /** Set when signatures were cryptographically verified */
      outcome?: VerificationOutcome;
      /** Set when signatures were accepted without verification */
      warning?: string;
    }
  | {
      action: 'reject';
      status: 400 | 401;
      code: RejectCode;
      message: string;
      /** Underlying signature error code, for logs */
      reason: string;
    };

export interface PolicyOptions {
  mode: SignatureMode;
  keyResolver: KeyResolver;
}

/**
 * Decide whether a request may proceed under the given mode.
 */
export async function evaluateSignaturePolicy(
  request: SignatureRequest,
  options: PolicyOptions
): Promise<PolicyDecision> {
  const { mode, keyResolver } = options;
  if (mode === 'off') {
    return { action: 'proceed' };
  }

  const signatureInput = getHeader(request.headers, 'signature-input');
  const signature = getHeader(request.headers, 'signature');

  if (mode === 'permissive') {
    if (!signatureInput && !signature) {
      return { action: 'proceed' };
    }
    if (!signatureInput || !signature) {
      return reject(
        new HttpSignatureError(
          ErrorCodes.SIGNATURE_HEADERS_INCOMPLETE,
          'Signature headers required together'
        )
      );
    }
    try {
      const present = validateSignatureSyntax(signatureInput, signature);
      return {
        action: 'proceed',
        warning: `signature not verified in permissive mode (labels: ${present
          .map((p) => p.label)
          .join(', ')})`,
      };
    } catch (error) {
      return rejectUnexpected(error, 400, 'Malformed signature');
    }
  }

  if (!signatureInput || !signature) {
    return reject(
      new HttpSignatureError(ErrorCodes.SIGNATURE_MISSING, 'Missing required signature')
    );
  }

  try {
    const outcome = await verifyAll(
      request,
      parseSignatureInput(signatureInput),
      parseSignature(signature),
      keyResolver
    );
    return { action: 'proceed', outcome };
  } catch (error) {
    return rejectUnexpected(error, 401, 'invalid signature');
  }
}

function reject(error: HttpSignatureError): PolicyDecision {
  return {
    action: 'reject',
    status: error.httpStatus,
    code: error.httpStatus === 400 ? 'bad_request' : 'unauthorized',
    message: error.message,
    reason: error.code,
  };
}

// Unexpected faults never fail open: they take the phase's status.
function rejectUnexpected(error: unknown, status: 400 | 401, message: string): PolicyDecision {
  if (error instanceof HttpSignatureError) {
    return reject(error);
  }
  return {
    action: 'reject',
    status,
    code: status === 400 ? 'bad_request' : 'unauthorized',
    message,
    reason: error instanceof Error ? error.name : 'UnknownError',
  };
}

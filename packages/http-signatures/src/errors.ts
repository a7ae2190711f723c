/**
 * HTTP signature error codes.
 *
 * Codes mapping to 400 are header syntax/structure problems
 * (MalformedSignature); codes mapping to 401 are authentication
 * failures on well-formed headers (PermissionError).
 */

export const ErrorCodes = {
  /** Signature-Input or Signature header failed to parse */
  SIGNATURE_MALFORMED: 'E_SIGNATURE_MALFORMED',
  /** No label appears in both headers */
  SIGNATURE_LABEL_MISMATCH: 'E_SIGNATURE_LABEL_MISMATCH',
  /** A present label has no keyid */
  SIGNATURE_PARAM_MISSING: 'E_SIGNATURE_PARAM_MISSING',
  /** Only one of Signature-Input / Signature was sent */
  SIGNATURE_HEADERS_INCOMPLETE: 'E_SIGNATURE_HEADERS_INCOMPLETE',
  /** Signature headers required but absent */
  SIGNATURE_MISSING: 'E_SIGNATURE_MISSING',
  /** No attached signature verified */
  SIGNATURE_INVALID: 'E_SIGNATURE_INVALID',
  /** No attached signature named a known key */
  KEY_NOT_FOUND: 'E_KEY_NOT_FOUND',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * HTTP status codes for each error.
 */
export const ErrorHttpStatus: Record<ErrorCode, 400 | 401> = {
  [ErrorCodes.SIGNATURE_MALFORMED]: 400,
  [ErrorCodes.SIGNATURE_LABEL_MISMATCH]: 400,
  [ErrorCodes.SIGNATURE_PARAM_MISSING]: 400,
  [ErrorCodes.SIGNATURE_HEADERS_INCOMPLETE]: 400,
  [ErrorCodes.SIGNATURE_MISSING]: 401,
  [ErrorCodes.SIGNATURE_INVALID]: 401,
  [ErrorCodes.KEY_NOT_FOUND]: 401,
};

/**
 * HTTP signature error with code and HTTP status.
 */
export class HttpSignatureError extends Error {
  readonly code: ErrorCode;
  readonly httpStatus: 400 | 401;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'HttpSignatureError';
    this.code = code;
    this.httpStatus = ErrorHttpStatus[code];
    Object.setPrototypeOf(this, HttpSignatureError.prototype);
  }

  /** Header syntax/structure violation (400) */
  get isMalformed(): boolean {
    return this.httpStatus === 400;
  }
}

/**
 * Key material that does not decode to a 32-byte Ed25519 public key.
 */
export class KeyMaterialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KeyMaterialError';
    Object.setPrototypeOf(this, KeyMaterialError.prototype);
  }
}

/** Build a MalformedSignature error (400). */
export function malformed(message: string): HttpSignatureError {
  return new HttpSignatureError(ErrorCodes.SIGNATURE_MALFORMED, message);
}

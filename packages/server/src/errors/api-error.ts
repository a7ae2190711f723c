/**
 * API error envelope
 *
 * Every error response has the shape
 * `{"error": {"code", "message", "status", "details?"}}`.
 */

export interface ErrorBody {
  code: string;
  message: string;
  status: number;
  details?: Record<string, unknown>;
}

const STATUS_CODES: Record<number, string> = {
  400: 'bad_request',
  401: 'unauthorized',
  403: 'forbidden',
  404: 'not_found',
  409: 'conflict',
  422: 'unprocessable_entity',
  429: 'rate_limited',
  500: 'internal_error',
  503: 'unavailable',
};

export function codeForStatus(status: number): string {
  return STATUS_CODES[status] ?? 'error';
}

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
    Object.setPrototypeOf(this, ApiError.prototype);
  }

  get code(): string {
    return codeForStatus(this.status);
  }

  toBody(): { error: ErrorBody } {
    const error: ErrorBody = { code: this.code, message: this.message, status: this.status };
    if (this.details) {
      error.details = this.details;
    }
    return { error };
  }
}

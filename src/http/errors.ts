// ---------------------------------------------------------------------------
// Error responses: `{ error: { code, message, details? } }`
// ---------------------------------------------------------------------------

import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { FailureCode } from '../errors.js';
import type { Result } from '../result.js';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

const STATUS_BY_CODE: Record<FailureCode, ContentfulStatusCode> = {
  EMPTY_CART: 400,
  VALIDATION_FAILED: 422,
  INSUFFICIENT_STOCK: 409,
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  INVALID_TRANSITION: 409,
  BUSY: 409,
  TIMEOUT: 408,
  ABORTED: 408,
  STORE_FAILURE: 503,
  INTERNAL: 500,
};

export function httpStatusFor(code: FailureCode): ContentfulStatusCode {
  return STATUS_BY_CODE[code];
}

export function errorBody(code: string, message: string, details?: Record<string, unknown>): ErrorBody {
  return details && Object.keys(details).length > 0
    ? { error: { code, message, details } }
    : { error: { code, message } };
}

/**
 * Status and body for a failed task result. Internal failures keep their
 * reason out of the response.
 */
export function failureResponse<T extends Record<string, unknown>>(result: Result<T>): {
  status: ContentfulStatusCode;
  body: ErrorBody;
} {
  const code = result.code ?? 'INTERNAL';
  const message = code === 'INTERNAL' ? 'Internal server error' : result.reason ?? 'Request failed';
  return {
    status: httpStatusFor(code),
    body: errorBody(code, message, code === 'INTERNAL' ? undefined : result.metadata.details),
  };
}

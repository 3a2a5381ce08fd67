/**
 * Interpretation of raw transport responses
 */

import { errorFromResponse, type DamError } from '../utils/errors.js';
import { parseRetryAfter } from '../utils/retry.js';
import { isRecord } from './models.js';
import { bodyJson, bodyText, type TransportResponse } from './transport.js';

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  408: 'Request Timeout',
  409: 'Conflict',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
  504: 'Gateway Timeout',
};

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Error for a non-2xx response, message taken from the JSON body when present
 */
export function responseError(response: TransportResponse): DamError {
  const body = bodyJson(response);
  let message: string | undefined;
  let details: unknown;

  if (isRecord(body)) {
    if (typeof body.message === 'string' && body.message.length > 0) {
      message = body.message;
    } else if (typeof body.error === 'string' && body.error.length > 0) {
      message = body.error;
    }
    details = body.details;
  } else if (body === undefined) {
    const text = bodyText(response).trim();
    if (text.length > 0 && text.length <= 200) {
      message = text;
    }
  }

  return errorFromResponse(
    response.statusCode,
    message ?? STATUS_TEXT[response.statusCode] ?? 'Request failed',
    details,
    parseRetryAfter(response.headers['retry-after'])
  );
}

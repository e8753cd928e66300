/**
 * Maps pipeline errors onto HTTP responses.
 */

import { InputDefectError, type ErrorEnvelope } from '@riskline/shared';

export interface ErrorResponse {
  status: number;
  body: ErrorEnvelope;
}

export function invalidRequest(errors: string[], correlationId: string): ErrorResponse {
  return {
    status: 400,
    body: {
      error: {
        code: 'invalid_request',
        message: `Request body failed validation: ${errors.join('; ')}`,
        correlation_id: correlationId,
      },
    },
  };
}

export function toErrorResponse(error: unknown, correlationId: string): ErrorResponse {
  if (error instanceof InputDefectError) {
    return {
      status: 422,
      body: {
        error: { code: error.code, message: error.message, correlation_id: correlationId },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: 'internal_error',
        message: 'Failed to assess application',
        correlation_id: correlationId,
      },
    },
  };
}

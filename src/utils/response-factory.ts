import { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';

/**
 * Wrap a payload as { data, message? }
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message ? { data, message } : { data };
}

/**
 * Wrap an error as { error: { code, message, details? } }
 */
export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

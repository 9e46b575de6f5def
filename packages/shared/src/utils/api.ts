import type { ApiErrorCode, ApiResponse } from "../types/api.js";

export function createApiResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data };
}

/** `details` is omitted from the envelope when not given. */
export function createApiError(
  code: ApiErrorCode,
  message: string,
  details?: unknown,
): ApiResponse<never> {
  return {
    success: false,
    error: details === undefined ? { code, message } : { code, message, details },
  };
}

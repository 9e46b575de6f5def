/** Error codes the HTTP and MCP surfaces report. */
export type ApiErrorCode = "INVALID_INPUT" | "INTERNAL_ERROR";

export interface ApiError {
  code: ApiErrorCode;
  message: string;
  details?: unknown;
}

export type ApiResponse<T> =
  | { success: true; data: T }
  | { success: false; error: ApiError };

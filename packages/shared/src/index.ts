// ─── Shared Types ────────────────────────────────────────────
export type { ApiResponse, ApiError, ApiErrorCode } from "./types/api.js";

// ─── Constants ───────────────────────────────────────────────
export { DEFAULT_HURWICZ_COEFFICIENT } from "./constants.js";

// ─── Schemas ─────────────────────────────────────────────────
export {
  profitMatrixSchema,
  coefficientSchema,
  evaluateRequestSchema,
  formatIssues,
} from "./schemas/criteria.js";
export type { EvaluateRequest } from "./schemas/criteria.js";

// ─── Utilities ───────────────────────────────────────────────
export { createApiResponse, createApiError } from "./utils/api.js";

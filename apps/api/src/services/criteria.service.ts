import { evaluateCriteria, type CriteriaReport } from "@payoff/criteria-core";
import { evaluateRequestSchema, formatIssues, type ApiErrorCode } from "@payoff/shared";

export type EvaluateOutcome =
  | { ok: true; report: CriteriaReport }
  | { ok: false; code: ApiErrorCode; message: string; details?: unknown };

/**
 * Validate an untrusted payload and evaluate every criterion over it.
 * Schema failures and core validation errors both come back as INVALID_INPUT.
 */
export function evaluatePayload(payload: unknown): EvaluateOutcome {
  const parsed = evaluateRequestSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      code: "INVALID_INPUT",
      message: formatIssues(parsed.error),
      details: parsed.error.issues,
    };
  }

  const report = evaluateCriteria(parsed.data.matrix, parsed.data.coefficient);
  if (report.error) {
    return {
      ok: false,
      code: "INVALID_INPUT",
      message: report.error_detail ? `${report.error}: ${report.error_detail}` : report.error,
    };
  }

  return { ok: true, report };
}

import { z } from "zod";
import { DEFAULT_HURWICZ_COEFFICIENT } from "../constants.js";

const rowSchema = z
  .array(z.number().finite(), { invalid_type_error: "row must be an array of numbers" })
  .min(1, "row must have at least one column");

/** Rectangular numeric matrix, at least 1×1. */
export const profitMatrixSchema = z
  .array(rowSchema, { invalid_type_error: "matrix must be an array of rows" })
  .min(1, "matrix must have at least one row")
  .superRefine((rows, ctx) => {
    const columns = rows[0]?.length ?? 0;
    rows.forEach((row, i) => {
      if (row.length !== columns) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `row has ${row.length} columns, expected ${columns}`,
          path: [i],
        });
      }
    });
  });

/** Pessimism weight. The surfaces hold callers to [0, 1]. */
export const coefficientSchema = z
  .number()
  .finite()
  .min(0, "coefficient must be within [0, 1]")
  .max(1, "coefficient must be within [0, 1]");

export const evaluateRequestSchema = z.object({
  matrix: profitMatrixSchema,
  coefficient: coefficientSchema.default(DEFAULT_HURWICZ_COEFFICIENT),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;

/** One line per issue: "<path>: <message>", joined with "; ". */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

import type { FastifyInstance } from "fastify";
import { createApiError, createApiResponse } from "@payoff/shared";
import { evaluatePayload } from "../services/criteria.service.js";

export function registerCriteriaRoutes(app: FastifyInstance) {
  // ─── POST /criteria/evaluate ─────────────────────────────
  app.post("/criteria/evaluate", async (request, reply) => {
    const outcome = evaluatePayload(request.body);

    if (!outcome.ok) {
      request.log.warn({ code: outcome.code, reason: outcome.message }, "rejected criteria request");
      return reply.status(400).send(createApiError(outcome.code, outcome.message, outcome.details));
    }

    request.log.debug(
      { rows: outcome.report.rows, columns: outcome.report.columns },
      "criteria evaluated",
    );
    return reply.status(200).send(createApiResponse(outcome.report));
  });
}

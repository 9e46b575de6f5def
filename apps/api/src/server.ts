import Fastify from "fastify";
import cors from "@fastify/cors";
import { createApiError } from "@payoff/shared";
import { loadConfig, type ApiConfig } from "./config/index.js";
import { registerCriteriaRoutes } from "./routes/criteria.js";
import { registerMcpRoutes } from "./mcp/router.js";

function statusCodeOf(error: unknown): number {
  if (typeof error === "object" && error !== null && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

export async function createServer(config: ApiConfig = loadConfig()) {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "mcp-session-id"],
    credentials: true,
  });

  // ─── Errors ──────────────────────────────────────────────
  // Framework errors (malformed JSON, oversized body) use the same envelope as route errors.
  app.setErrorHandler((error, request, reply) => {
    const statusCode = statusCodeOf(error);
    if (statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
      return reply.status(500).send(createApiError("INTERNAL_ERROR", "Internal server error"));
    }
    const message = error instanceof Error ? error.message : "Bad request";
    return reply.status(statusCode).send(createApiError("INVALID_INPUT", message));
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Criteria Routes ─────────────────────────────────────
  registerCriteriaRoutes(app);

  // ─── MCP Routes ──────────────────────────────────────────
  registerMcpRoutes(app);

  return app;
}

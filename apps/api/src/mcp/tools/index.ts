import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DEFAULT_HURWICZ_COEFFICIENT } from "@payoff/shared";
import { evaluatePayload } from "../../services/criteria.service.js";
import { MCP_SERVER_VERSION } from "../meta.js";

/**
 * Register all MCP tools with the server.
 * Input shapes stay loose here; evaluatePayload applies the full request schema
 * so shape errors come back as tool errors rather than protocol errors.
 */
export function registerTools(server: McpServer) {
  // ─── criteria_ping ───────────────────────────────────────
  server.tool(
    "criteria_ping",
    "Health check tool. Returns server status and timestamp. Use this to verify the payoff criteria MCP server is connected and responding.",
    {},
    async () => ({
      content: [
        {
          type: "text" as const,
          text: JSON.stringify({
            status: "ok",
            message: "Payoff criteria MCP server is connected!",
            timestamp: new Date().toISOString(),
            version: MCP_SERVER_VERSION,
          }),
        },
      ],
    }),
  );

  // ─── criteria_evaluate ───────────────────────────────────
  server.tool(
    "criteria_evaluate",
    `Evaluate Minimax, Maximax, Savage and Hurwicz criteria over a profit matrix. Rows are strategies, columns are states of nature. The Hurwicz coefficient is the weight given to each strategy's worst outcome, within [0, 1] (default ${DEFAULT_HURWICZ_COEFFICIENT}).`,
    {
      matrix: z.array(z.array(z.number())),
      coefficient: z.number().optional(),
    },
    async ({ matrix, coefficient }) => {
      const outcome = evaluatePayload({ matrix, coefficient });
      if (!outcome.ok) {
        return {
          isError: true,
          content: [
            {
              type: "text" as const,
              text: JSON.stringify({ error: outcome.code, message: outcome.message }),
            },
          ],
        };
      }
      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(outcome.report),
          },
        ],
      };
    },
  );
}

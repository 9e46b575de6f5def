export const MCP_SERVER_NAME = "payoff-criteria";
export const MCP_SERVER_VERSION = "0.1.0";

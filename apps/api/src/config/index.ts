export interface ApiConfig {
  port: number;
  host: string;
  logLevel: string;
  corsOrigins: (string | RegExp)[];
}

const LOCALHOST_ORIGIN = /^http:\/\/localhost:\d+$/;

/**
 * Read server settings from the environment.
 * CORS_ORIGINS is a comma-separated list; any localhost port is allowed when unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const origins = (env.CORS_ORIGINS || "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  return {
    port: parseInt(env.PORT || "3001", 10),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
    corsOrigins: origins.length > 0 ? origins : [LOCALHOST_ORIGIN],
  };
}

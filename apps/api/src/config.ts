/**
 * Server configuration from environment variables.
 *
 *   PORT=<1-65535>       (default 3001)
 *   HOST=<address>       (default 0.0.0.0)
 *   LOG_LEVEL=<level>    (default info)
 */

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
}

export function loadServerConfig(env: Record<string, string | undefined>): ServerConfig {
  const port = env.PORT ? Number(env.PORT) : 3001;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`PORT: expected an integer between 0 and 65535, got '${env.PORT}'`);
  }

  return {
    port,
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
  };
}

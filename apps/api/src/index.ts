/**
 * Fastify API Server — Entry Point
 *
 * Serves a dweet-compatible bulletin board that a messenger session can
 * point its DWEET_BASE_URL at.
 */

import "dotenv/config";
import { buildApp } from "./app.js";
import { loadServerConfig } from "./config.js";

const config = loadServerConfig(process.env);

const app = await buildApp({ logger: { level: config.logLevel } });

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}

/**
 * Fastify app factory: CORS, dweet routes and a health check.
 */

import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { dweetRoutes } from "./routes/dweets.js";
import type { DweetStore } from "./store.js";

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
  store?: DweetStore;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const app = Fastify({
    logger: options.logger ?? true,
  });

  // Browsers dweet too
  await app.register(cors, {
    origin: true,
    methods: ["GET", "POST"],
  });

  await app.register(dweetRoutes, { store: options.store });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}

/**
 * Dweet routes for the Fastify API.
 *
 * POST /dweet/for/:thing              — Store a JSON object as the latest dweet for a thing
 * GET  /dweet/for/:thing              — Same, with the query string as content
 * GET  /get/latest/dweet/for/:thing   — Read the latest dweet for a thing
 *
 * Responses use the dweet envelope:
 *   { this: "succeeded", by, the, with }  or  { this: "failed", with: <status>, because }
 *
 * Content is stored as received; the server never decrypts anything.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "node:crypto";
import { DweetStore, type StoredDweet } from "../store.js";

// ----- Request schemas -----

interface ThingParam {
  thing: string;
}

export type DweetRoutesOptions = {
  store?: DweetStore;
};

// ----- Helpers -----

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function failed(reply: FastifyReply, status: number, because: string) {
  return reply.status(status).send({ this: "failed", with: status, because });
}

// ----- Route registration -----

export async function dweetRoutes(app: FastifyInstance, opts: DweetRoutesOptions): Promise<void> {
  const store = opts.store ?? new DweetStore();

  /** Record a dweet and answer with the publish envelope */
  function publish(reply: FastifyReply, thing: string, content: Record<string, unknown>) {
    const dweet: StoredDweet = { thing, created: new Date().toISOString(), content };
    store.put(dweet);

    return reply.send({
      this: "succeeded",
      by: "dweeting",
      the: "dweet",
      with: { ...dweet, transaction: randomUUID() },
    });
  }

  /**
   * POST /dweet/for/:thing
   *
   * The JSON body becomes the dweet content, replacing any earlier dweet.
   */
  app.post<{ Params: ThingParam; Body: unknown }>(
    "/dweet/for/:thing",
    async (request: FastifyRequest<{ Params: ThingParam; Body: unknown }>, reply: FastifyReply) => {
      const { thing } = request.params;

      if (!isPlainObject(request.body)) {
        request.log.warn({ event: "dweet_rejected", thing }, "Dweet body is not a JSON object");
        return failed(reply, 400, "the dweet content must be a JSON object");
      }

      return publish(reply, thing, request.body);
    }
  );

  /**
   * GET /dweet/for/:thing?key=value
   *
   * Query parameters become the dweet content.
   */
  app.get<{ Params: ThingParam; Querystring: Record<string, string> }>(
    "/dweet/for/:thing",
    async (
      request: FastifyRequest<{ Params: ThingParam; Querystring: Record<string, string> }>,
      reply: FastifyReply
    ) => {
      return publish(reply, request.params.thing, { ...request.query });
    }
  );

  /**
   * GET /get/latest/dweet/for/:thing
   *
   * Returns a one-element array, or 404 when nothing was ever dweeted.
   */
  app.get<{ Params: ThingParam }>(
    "/get/latest/dweet/for/:thing",
    async (request: FastifyRequest<{ Params: ThingParam }>, reply: FastifyReply) => {
      const dweet = store.get(request.params.thing);
      if (!dweet) {
        return failed(reply, 404, "we couldn't find this");
      }

      return reply.send({ this: "succeeded", by: "getting", the: "dweets", with: [dweet] });
    }
  );
}

// packages/server/src/routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { randomUUID } from "node:crypto";
import { makeSnapshot } from "ttt-rules";
import type { z } from "zod";
import type { SessionRegistry } from "./registry";
import { SessionParamsSchema } from "./schemas";
import { logSession } from "./sessionLogger";

function sendValidationError(reply: FastifyReply, error: z.ZodError) {
  reply.code(400).send({ error: "Invalid request", details: error.flatten() });
}

export async function registerRoutes(
  server: FastifyInstance,
  deps: { registry: SessionRegistry }
) {
  const { registry } = deps;

  server.get("/", async () => ({
    name: "ttt-server",
    version: process.env.npm_package_version ?? "unknown",
  }));

  server.get("/health", async () => ({ ok: true }));

  server.get("/sessions", async () => registry.summaries());

  server.post("/sessions", async () => {
    const sessionId = randomUUID();
    registry.getOrCreate(sessionId);
    logSession(server.log, { tag: "ttt:session:create", sessionId, via: "http" });
    return { sessionId };
  });

  server.get(
    "/sessions/:id",
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = SessionParamsSchema.safeParse(request.params);
      if (!parsed.success) {
        return sendValidationError(reply, parsed.error);
      }

      const handle = registry.get(parsed.data.id);
      if (!handle) {
        reply.code(404).send({ error: "Session not found" });
        return;
      }

      const snapshot = await handle.withExclusive((record) =>
        makeSnapshot(record.state, { revision: record.revision })
      );
      reply.send(snapshot);
    }
  );
}

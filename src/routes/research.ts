import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { ResearchRequest } from "../contracts/research";
import type { ResearchRunner } from "../orchestrator/research_runner";
import type { SessionStore } from "../store/session_store";

const SessionParams = z.object({
  id: z.string().min(1),
});

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

export async function researchRoutes(
  app: FastifyInstance,
  opts: { store: SessionStore; runner: ResearchRunner }
) {
  const { store, runner } = opts;

  app.post("/research", async (req, reply) => {
    const parsed = ResearchRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    const session = await runner.submit(parsed.data.query);
    return reply.code(202).send({
      sessionId: session.id,
      status: session.status,
    });
  });

  app.get("/research", async (req, reply) => {
    const parsed = ListQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "limit must be an integer between 1 and 200",
      });
    }
    const sessions = await store.listSessions({ limit: parsed.data.limit });
    return reply.code(200).send({ sessions });
  });

  app.get("/research/:id", async (req, reply) => {
    const params = SessionParams.parse(req.params);
    const session = await store.getSession(params.id);
    if (!session) {
      return reply.code(404).send({ error: "not_found" });
    }
    return reply.code(200).send(session);
  });

  app.delete("/research/:id", async (req, reply) => {
    const params = SessionParams.parse(req.params);
    if (runner.isActive(params.id)) {
      return reply.code(409).send({
        error: "session_active",
        message: "Session is still running",
      });
    }
    const deleted = await store.deleteSession(params.id);
    if (!deleted) {
      return reply.code(404).send({ error: "not_found" });
    }
    return reply.code(204).send();
  });
}

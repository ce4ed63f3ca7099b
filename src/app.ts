import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import type { ResearchRunner } from "./orchestrator/research_runner";
import { healthRoutes } from "./routes/healthz";
import { researchRoutes } from "./routes/research";
import type { SessionStore } from "./store/session_store";

export function buildApp(deps: {
  store: SessionStore;
  runner: ResearchRunner;
  logger?: boolean;
}): FastifyInstance {
  const app = Fastify({ logger: deps.logger ?? false });

  // CORS: permissive for local clients.
  app.register(cors, {
    origin: true,
  });

  app.register(healthRoutes);
  app.register(researchRoutes, { prefix: "/v1", store: deps.store, runner: deps.runner });

  return app;
}

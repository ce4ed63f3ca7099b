import { buildApp } from "./app";
import { loadResearchConfig } from "./config/research_config";
import { createLogger } from "./logging/logger";
import { buildResearchService } from "./service";

const log = createLogger("research");

async function main() {
  const config = loadResearchConfig();
  const service = buildResearchService(config, log);

  // Sessions left mid-pipeline by a previous process cannot resume.
  await service.store.failInterruptedSessions();

  const app = buildApp({ store: service.store, runner: service.runner, logger: true });
  log.info({ mode: config.mode, port: config.port, dbPath: config.dbPath }, "server.starting");
  await app.listen({ port: config.port, host: "0.0.0.0" });
}

main().catch((err) => {
  log.error({ error: err instanceof Error ? err.message : String(err) }, "server.failed");
  process.exit(1);
});

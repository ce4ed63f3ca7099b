import pLimit from "p-limit";

import type { ResearchSession } from "../contracts/research";
import type { Logger } from "../logging/logger";
import type { SessionStore } from "../store/session_store";
import type { ResearchPipeline } from "./research_pipeline";

/**
 * Accepts submissions and runs their pipelines in the background, at most
 * `maxConcurrentSessions` at a time. Sessions share nothing but the store.
 */
export class ResearchRunner {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly active = new Set<string>();
  private readonly tasks = new Set<Promise<void>>();

  constructor(
    private readonly options: {
      store: SessionStore;
      pipeline: ResearchPipeline;
      maxConcurrentSessions: number;
      log: Logger;
    }
  ) {
    this.limit = pLimit(options.maxConcurrentSessions);
  }

  async submit(query: string): Promise<ResearchSession> {
    const { store, pipeline, log } = this.options;
    const session = await store.createSession({ query });
    this.active.add(session.id);
    log.info({ sessionId: session.id }, "runner.session_submitted");

    const task: Promise<void> = this.limit(() => pipeline.run(session))
      .then(
        () => undefined,
        (error: unknown) => {
          log.warn(
            { sessionId: session.id, error: error instanceof Error ? error.message : String(error) },
            "runner.session_failed"
          );
        }
      )
      .finally(() => {
        this.active.delete(session.id);
        this.tasks.delete(task);
      });
    this.tasks.add(task);

    return session;
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  async drain(): Promise<void> {
    await Promise.all([...this.tasks]);
  }
}

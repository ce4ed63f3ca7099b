import { ParallelAnalyzer } from "./analysis/parallel_analyzer";
import type { ResearchConfig } from "./config/research_config";
import { CitationConsistencyGate } from "./gates/citation_consistency_gate";
import { ClaimVerificationGate } from "./gates/claim_verification_gate";
import type { DraftGate } from "./gates/gate_interfaces";
import { QualityScoreGate } from "./gates/quality_score_gate";
import type { Logger } from "./logging/logger";
import { ResearchPipeline } from "./orchestrator/research_pipeline";
import { ResearchRunner } from "./orchestrator/research_runner";
import { FakeReasoningClient } from "./providers/fake_model";
import { laneOverridesFromEnv, selectModel } from "./providers/provider_config";
import { OpenAIReasoningClient, type ReasoningClient } from "./providers/reasoning_client";
import { ScholarSourceProvider } from "./sources/scholar_provider";
import { SourceFetcher } from "./sources/source_fetcher";
import { StubSourceProvider, type SourceProvider } from "./sources/source_provider";
import { WebSearchSourceProvider } from "./sources/web_search_provider";
import { MemorySessionStore, type SessionStore } from "./store/session_store";
import { SqliteSessionStore } from "./store/sqlite_session_store";
import { Synthesizer } from "./synthesis/synthesizer";

export type ResearchService = {
  store: SessionStore;
  pipeline: ResearchPipeline;
  runner: ResearchRunner;
};

/**
 * Ordered provider strategies: primary first, secondary as fallback.
 */
export function selectSourceProviders(config: ResearchConfig): SourceProvider[] {
  if (config.mode === "fake") {
    return [new StubSourceProvider("stub_scholar", "primary")];
  }
  return [
    new ScholarSourceProvider({
      apiKey: config.providers.scholarApiKey,
      baseUrl: config.providers.scholarBaseUrl,
    }),
    new WebSearchSourceProvider({
      apiKey: config.providers.webSearchApiKey,
      baseUrl: config.providers.webSearchBaseUrl,
    }),
  ];
}

export function selectReasoningClient(config: ResearchConfig, log: Logger): ReasoningClient {
  if (config.mode === "fake") {
    return new FakeReasoningClient();
  }
  const selection = selectModel({
    researchEnv: config.researchEnv,
    nodeEnv: config.nodeEnv,
    envModel: config.providers.openaiModel,
    laneOverrides: laneOverridesFromEnv(),
  });
  log.info({ model: selection.model, source: selection.source, lane: selection.lane }, "reasoning.model_selected");
  return new OpenAIReasoningClient({
    apiKey: config.providers.openaiApiKey,
    baseUrl: config.providers.openaiBaseUrl,
    model: selection.model,
    log,
  });
}

export function buildGates(config: ResearchConfig, client: ReasoningClient): DraftGate[] {
  return [
    new QualityScoreGate({ minScore: config.synthesis.minQualityScore }),
    new CitationConsistencyGate(),
    new ClaimVerificationGate({
      client,
      minSupportedFraction: config.synthesis.minSupportedFraction,
      claimsToVerify: config.synthesis.claimsToVerify,
      policy: {
        timeoutMs: config.synthesis.callTimeoutMs,
        maxAttempts: config.synthesis.maxAttempts,
        baseDelayMs: config.synthesis.baseDelayMs,
      },
    }),
  ];
}

export function openSessionStore(config: ResearchConfig, log: Logger): SessionStore {
  if (config.dbPath === ":memory:") {
    return new MemorySessionStore();
  }
  return new SqliteSessionStore(config.dbPath, log);
}

export function buildResearchService(
  config: ResearchConfig,
  log: Logger,
  overrides: {
    store?: SessionStore;
    providers?: SourceProvider[];
    client?: ReasoningClient;
    currentYear?: () => number;
  } = {}
): ResearchService {
  const store = overrides.store ?? openSessionStore(config, log);
  const client = overrides.client ?? selectReasoningClient(config, log);

  const fetcher = new SourceFetcher({
    providers: overrides.providers ?? selectSourceProviders(config),
    sufficiency: config.sufficiency,
    providerTimeoutMs: config.providers.providerTimeoutMs,
    maxResults: config.providers.maxResults,
    currentYear: overrides.currentYear,
    log,
  });
  const analyzer = new ParallelAnalyzer({ client, config: config.analyzer, log });
  const synthesizer = new Synthesizer({
    client,
    gates: buildGates(config, client),
    config: config.synthesis,
    log,
  });

  const pipeline = new ResearchPipeline({
    fetcher,
    analyzer,
    synthesizer,
    store,
    budget: config.budget,
    log,
  });
  const runner = new ResearchRunner({
    store,
    pipeline,
    maxConcurrentSessions: config.maxConcurrentSessions,
    log,
  });

  return { store, pipeline, runner };
}

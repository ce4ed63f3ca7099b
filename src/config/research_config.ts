import { config as loadEnv } from "dotenv";
import { z } from "zod";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const ms = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const count = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

export const PipelineMode = z.enum(["live", "fake"]);
export type PipelineMode = z.infer<typeof PipelineMode>;

const ResearchEnv = z
  .object({
    RESEARCH_TOTAL_BUDGET_MS: ms(600_000),
    RESEARCH_SAFETY_MARGIN_MS: count(10_000),
    RESEARCH_DEGRADATION_THRESHOLD_MS: ms(90_000),
    RESEARCH_STAGE_FLOOR_MS: ms(5_000),
    RESEARCH_FETCH_TIMEOUT_MS: ms(60_000),
    RESEARCH_ANALYSIS_TIMEOUT_MS: ms(240_000),
    RESEARCH_SYNTHESIS_TIMEOUT_MS: ms(240_000),
    RESEARCH_CALL_TIMEOUT_MS: ms(60_000),
    RESEARCH_PROVIDER_TIMEOUT_MS: ms(20_000),
    RESEARCH_MAX_RESULTS: z.coerce.number().int().min(1).max(100).default(20),

    RESEARCH_MIN_SOURCES: count(5),
    RESEARCH_MIN_VENUES: count(3),
    RESEARCH_MIN_RECENT_SOURCES: count(2),
    RESEARCH_MIN_EFFECTIVE_COUNT: z.coerce.number().min(0).default(4.0),

    RESEARCH_BATCH_SIZE: z.coerce.number().int().min(1).default(10),
    RESEARCH_MAX_WORKERS: z.coerce.number().int().min(1).default(5),
    RESEARCH_MAX_CALL_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RESEARCH_RETRY_BASE_DELAY_MS: count(1_000),

    RESEARCH_MAX_REGENERATIONS: count(2),
    RESEARCH_MIN_QUALITY_SCORE: z.coerce.number().min(0).max(10).default(4.0),
    RESEARCH_MIN_SUPPORTED_FRACTION: z.coerce.number().min(0).max(1).default(0.75),
    RESEARCH_CLAIMS_TO_VERIFY: z.coerce.number().int().min(1).default(5),
    RESEARCH_TARGET_WORDS: z.coerce.number().int().min(200).default(1200),

    RESEARCH_MAX_CONCURRENT_SESSIONS: z.coerce.number().int().min(1).default(2),
    RESEARCH_PIPELINE_MODE: PipelineMode.default("live"),
    RESEARCH_DB_PATH: z.string().default("./data/research_sessions.db"),

    SCHOLAR_API_KEY: optionalString,
    SCHOLAR_BASE_URL: z.string().url().default("https://google.serper.dev"),
    WEB_SEARCH_API_KEY: optionalString,
    WEB_SEARCH_BASE_URL: z.string().url().default("https://api.tavily.com"),
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
    OPENAI_MODEL: optionalString,
    RESEARCH_ENV: optionalString,
    NODE_ENV: optionalString,
    PORT: z.coerce.number().int().min(0).max(65535).default(3333),
  })
  .refine((env) => env.RESEARCH_DEGRADATION_THRESHOLD_MS < env.RESEARCH_TOTAL_BUDGET_MS, {
    message: "RESEARCH_DEGRADATION_THRESHOLD_MS must be below RESEARCH_TOTAL_BUDGET_MS",
    path: ["RESEARCH_DEGRADATION_THRESHOLD_MS"],
  })
  .refine(
    (env) =>
      env.RESEARCH_STAGE_FLOOR_MS <=
      Math.min(
        env.RESEARCH_FETCH_TIMEOUT_MS,
        env.RESEARCH_ANALYSIS_TIMEOUT_MS,
        env.RESEARCH_SYNTHESIS_TIMEOUT_MS
      ),
    {
      message: "RESEARCH_STAGE_FLOOR_MS must not exceed any stage timeout",
      path: ["RESEARCH_STAGE_FLOOR_MS"],
    }
  );

export type StageName = "fetch" | "analysis" | "synthesis";

export type BudgetConfig = {
  totalBudgetMs: number;
  safetyMarginMs: number;
  degradationThresholdMs: number;
  stageFloorMs: number;
  stageTimeoutsMs: Record<StageName, number>;
};

export type SufficiencyConfig = {
  minSources: number;
  minVenues: number;
  minRecentSources: number;
  minEffectiveCount: number;
};

export type AnalyzerConfig = {
  batchSize: number;
  maxWorkers: number;
  maxAttempts: number;
  baseDelayMs: number;
  callTimeoutMs: number;
};

export type SynthesisConfig = {
  maxRegenerations: number;
  minQualityScore: number;
  minSupportedFraction: number;
  claimsToVerify: number;
  targetWords: number;
  maxAttempts: number;
  baseDelayMs: number;
  callTimeoutMs: number;
};

export type ProviderCredentials = {
  scholarApiKey?: string;
  scholarBaseUrl: string;
  webSearchApiKey?: string;
  webSearchBaseUrl: string;
  openaiApiKey?: string;
  openaiBaseUrl: string;
  openaiModel?: string;
  providerTimeoutMs: number;
  maxResults: number;
};

export type ResearchConfig = {
  mode: PipelineMode;
  researchEnv?: string;
  nodeEnv?: string;
  port: number;
  dbPath: string;
  maxConcurrentSessions: number;
  budget: BudgetConfig;
  sufficiency: SufficiencyConfig;
  analyzer: AnalyzerConfig;
  synthesis: SynthesisConfig;
  providers: ProviderCredentials;
};

export function loadResearchConfig(env: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const parsed = ResearchEnv.parse(env);

  return {
    mode: parsed.RESEARCH_PIPELINE_MODE,
    researchEnv: parsed.RESEARCH_ENV,
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    dbPath: parsed.RESEARCH_DB_PATH,
    maxConcurrentSessions: parsed.RESEARCH_MAX_CONCURRENT_SESSIONS,
    budget: {
      totalBudgetMs: parsed.RESEARCH_TOTAL_BUDGET_MS,
      safetyMarginMs: parsed.RESEARCH_SAFETY_MARGIN_MS,
      degradationThresholdMs: parsed.RESEARCH_DEGRADATION_THRESHOLD_MS,
      stageFloorMs: parsed.RESEARCH_STAGE_FLOOR_MS,
      stageTimeoutsMs: {
        fetch: parsed.RESEARCH_FETCH_TIMEOUT_MS,
        analysis: parsed.RESEARCH_ANALYSIS_TIMEOUT_MS,
        synthesis: parsed.RESEARCH_SYNTHESIS_TIMEOUT_MS,
      },
    },
    sufficiency: {
      minSources: parsed.RESEARCH_MIN_SOURCES,
      minVenues: parsed.RESEARCH_MIN_VENUES,
      minRecentSources: parsed.RESEARCH_MIN_RECENT_SOURCES,
      minEffectiveCount: parsed.RESEARCH_MIN_EFFECTIVE_COUNT,
    },
    analyzer: {
      batchSize: parsed.RESEARCH_BATCH_SIZE,
      maxWorkers: parsed.RESEARCH_MAX_WORKERS,
      maxAttempts: parsed.RESEARCH_MAX_CALL_ATTEMPTS,
      baseDelayMs: parsed.RESEARCH_RETRY_BASE_DELAY_MS,
      callTimeoutMs: parsed.RESEARCH_CALL_TIMEOUT_MS,
    },
    synthesis: {
      maxRegenerations: parsed.RESEARCH_MAX_REGENERATIONS,
      minQualityScore: parsed.RESEARCH_MIN_QUALITY_SCORE,
      minSupportedFraction: parsed.RESEARCH_MIN_SUPPORTED_FRACTION,
      claimsToVerify: parsed.RESEARCH_CLAIMS_TO_VERIFY,
      targetWords: parsed.RESEARCH_TARGET_WORDS,
      maxAttempts: parsed.RESEARCH_MAX_CALL_ATTEMPTS,
      baseDelayMs: parsed.RESEARCH_RETRY_BASE_DELAY_MS,
      callTimeoutMs: parsed.RESEARCH_CALL_TIMEOUT_MS,
    },
    providers: {
      scholarApiKey: parsed.SCHOLAR_API_KEY,
      scholarBaseUrl: parsed.SCHOLAR_BASE_URL,
      webSearchApiKey: parsed.WEB_SEARCH_API_KEY,
      webSearchBaseUrl: parsed.WEB_SEARCH_BASE_URL,
      openaiApiKey: parsed.OPENAI_API_KEY,
      openaiBaseUrl: parsed.OPENAI_BASE_URL,
      openaiModel: parsed.OPENAI_MODEL,
      providerTimeoutMs: parsed.RESEARCH_PROVIDER_TIMEOUT_MS,
      maxResults: parsed.RESEARCH_MAX_RESULTS,
    },
  };
}

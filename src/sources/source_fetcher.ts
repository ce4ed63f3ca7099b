import { withCallTimeout } from "../budget/call_timeout";
import type { SufficiencyConfig } from "../config/research_config";
import type { Provenance, SourceRecord, SufficiencyReport } from "../contracts/research";
import {
  InsufficientSourcesError,
  ProviderUnavailableError,
  type ProviderFailure,
} from "../errors/pipeline_errors";
import type { Logger } from "../logging/logger";
import { assessSufficiency } from "./source_sufficiency";
import type { RawSourceHit, SourceProvider } from "./source_provider";
import { validateHits, type RejectedHit } from "./source_validation";

export type FetchOutcome = {
  sources: SourceRecord[];
  provenance: Provenance;
  provider: string;
  fetchedCount: number;
  rejected: RejectedHit[];
  sufficiency: SufficiencyReport;
  failures: ProviderFailure[];
};

export type SourceFetcherOptions = {
  providers: SourceProvider[];
  sufficiency: SufficiencyConfig;
  providerTimeoutMs: number;
  maxResults: number;
  contentDomains?: readonly string[];
  currentYear?: () => number;
  log: Logger;
};

/**
 * Tries each provider strategy in order until one returns results. The first
 * provider that answers decides the outcome: its results are validated and
 * checked for sufficiency, and later strategies are not consulted.
 */
export class SourceFetcher {
  private readonly currentYear: () => number;

  constructor(private readonly options: SourceFetcherOptions) {
    this.currentYear = options.currentYear ?? (() => new Date().getFullYear());
  }

  get providerNames(): string[] {
    return this.options.providers.map((provider) => provider.name);
  }

  async fetch(query: string, signal?: AbortSignal): Promise<FetchOutcome> {
    const { log } = this.options;
    const failures: ProviderFailure[] = [];

    for (const provider of this.options.providers) {
      let hits: RawSourceHit[];
      try {
        hits = await withCallTimeout(
          `${provider.name} search`,
          this.options.providerTimeoutMs,
          (callSignal) => provider.search(query, { maxResults: this.options.maxResults, signal: callSignal }),
          signal
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failures.push({ provider: provider.name, message });
        log.warn({ provider: provider.name, error: message }, "fetch.provider_failed");
        continue;
      }

      if (hits.length === 0) {
        failures.push({ provider: provider.name, message: "returned no results" });
        log.warn({ provider: provider.name }, "fetch.provider_empty");
        continue;
      }

      const currentYear = this.currentYear();
      const { records, rejected } = validateHits(hits, provider, {
        currentYear,
        contentDomains: this.options.contentDomains,
      });
      const sufficiency = assessSufficiency(records, this.options.sufficiency, {
        provenance: provider.provenance,
        currentYear,
      });

      log.info(
        {
          provider: provider.name,
          fetched: hits.length,
          valid: records.length,
          rejected: rejected.length,
          venues: sufficiency.uniqueVenues,
          effectiveCount: sufficiency.effectiveCount,
        },
        "fetch.provider_succeeded"
      );

      if (!sufficiency.sufficient) {
        throw new InsufficientSourcesError(sufficiency, provider.name);
      }

      return {
        sources: records,
        provenance: provider.provenance,
        provider: provider.name,
        fetchedCount: hits.length,
        rejected,
        sufficiency,
        failures,
      };
    }

    throw new ProviderUnavailableError(failures);
  }
}

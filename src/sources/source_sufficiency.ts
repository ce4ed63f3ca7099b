import type { SufficiencyConfig } from "../config/research_config";
import type { Provenance, SourceRecord, SufficiencyReport, ValidationLevel } from "../contracts/research";

export const VALIDATION_WEIGHTS: Record<ValidationLevel, number> = {
  full: 1.0,
  partial: 0.85,
  domain: 0.7,
};

export const RECENT_WINDOW_YEARS = 5;

export function citationBoost(citationProxy: number): number {
  if (citationProxy > 500) return 1.5;
  if (citationProxy > 50) return 1.2;
  return 1.0;
}

export function effectiveCount(records: SourceRecord[]): number {
  const total = records.reduce(
    (sum, record) => sum + VALIDATION_WEIGHTS[record.validationLevel] * citationBoost(record.citationProxy),
    0
  );
  return Math.round(total * 100) / 100;
}

/**
 * Decides whether a validated set is large and diverse enough to analyze.
 * Recency only counts for primary provenance, since secondary records carry
 * no publication year.
 */
export function assessSufficiency(
  records: SourceRecord[],
  config: SufficiencyConfig,
  context: { provenance: Provenance; currentYear: number }
): SufficiencyReport {
  const venueDistribution: Record<string, number> = {};
  for (const record of records) {
    venueDistribution[record.venue] = (venueDistribution[record.venue] ?? 0) + 1;
  }
  const uniqueVenues = Object.keys(venueDistribution).length;
  const recentCount = records.filter(
    (record) =>
      record.publishedYear !== null && record.publishedYear >= context.currentYear - RECENT_WINDOW_YEARS
  ).length;
  const effective = effectiveCount(records);

  const issues: string[] = [];
  const recommendations: string[] = [];

  if (records.length < config.minSources) {
    issues.push(`only ${records.length} valid sources (minimum ${config.minSources})`);
    recommendations.push("Broaden the query or add synonyms for the core concept.");
  }
  if (uniqueVenues < config.minVenues) {
    issues.push(`only ${uniqueVenues} distinct venues (minimum ${config.minVenues})`);
    recommendations.push("Include adjacent fields so results span more venues.");
  }
  if (effective < config.minEffectiveCount) {
    issues.push(`effective count ${effective.toFixed(2)} below ${config.minEffectiveCount.toFixed(2)}`);
    recommendations.push("Prefer peer-reviewed or frequently cited sources.");
  }
  if (context.provenance === "primary" && recentCount < config.minRecentSources) {
    issues.push(
      `only ${recentCount} sources from the last ${RECENT_WINDOW_YEARS} years (minimum ${config.minRecentSources})`
    );
    recommendations.push("Add recent terminology or relax the time frame.");
  }

  return {
    sufficient: issues.length === 0,
    validCount: records.length,
    uniqueVenues,
    recentCount,
    effectiveCount: effective,
    venueDistribution,
    issues,
    recommendations,
  };
}

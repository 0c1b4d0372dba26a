import {
  KeywordTierTable,
  RunConfigSnapshot,
  RunRecord,
  ScoredArticle,
  ScoredOpportunity,
} from '../models';
import { tierTableToRecord } from '../scoring/keywordTiers';

export interface RunLedgerConfig {
  model: string;
  relevanceThreshold: number;
  entriesPerFeed: number;
  titleMultiplier: number;
  normalizationDivisor: number;
  keywordTiers: KeywordTierTable;
}

/**
 * Builds the audit record of one run: every scored item, hit or miss, plus
 * the settings that produced the scores. Hits are only counted here; they
 * are already part of the full lists.
 */
export function buildRunRecord(
  allArticles: readonly ScoredArticle[],
  allOpportunities: readonly ScoredOpportunity[],
  hitArticles: readonly ScoredArticle[],
  hitOpportunities: readonly ScoredOpportunity[],
  config: RunLedgerConfig,
  now: Date = new Date(),
): RunRecord {
  const snapshot: RunConfigSnapshot = {
    model: config.model,
    relevanceThreshold: config.relevanceThreshold,
    entriesPerFeed: config.entriesPerFeed,
    titleMultiplier: config.titleMultiplier,
    normalizationDivisor: config.normalizationDivisor,
    keywordTiers: tierTableToRecord(config.keywordTiers),
  };

  return Object.freeze({
    runTimestamp: now.toISOString(),
    config: snapshot,
    summary: {
      articlesScored: allArticles.length,
      articlesHits: hitArticles.length,
      opportunitiesScored: allOpportunities.length,
      opportunitiesHits: hitOpportunities.length,
    },
    articles: [...allArticles],
    opportunities: [...allOpportunities],
  });
}

/**
 * Run record - the audit trail of one pipeline execution
 */

import { ScoredArticle, ScoredOpportunity } from './Item';

export interface RunConfigSnapshot {
  model: string;
  relevanceThreshold: number;
  entriesPerFeed: number;
  titleMultiplier: number;
  normalizationDivisor: number;
  keywordTiers: Record<string, number>;
}

export interface RunSummary {
  articlesScored: number;
  articlesHits: number;
  opportunitiesScored: number;
  opportunitiesHits: number;
}

export interface RunRecord {
  runTimestamp: string;
  config: RunConfigSnapshot;
  summary: RunSummary;
  articles: readonly ScoredArticle[];
  opportunities: readonly ScoredOpportunity[];
}

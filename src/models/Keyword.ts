/**
 * Keyword tier models
 */

export type TierWeight = 1 | 2 | 3;

/**
 * Keyword -> weight. Built once at startup and never mutated.
 */
export type KeywordTierTable = ReadonlyMap<string, TierWeight>;

export type MatchLocation = 'title' | 'body';

export interface MatchRecord {
  readonly keyword: string;
  readonly weight: TierWeight;
  readonly location: MatchLocation;
}

export interface KeywordScanResult {
  readonly keywordScore: number; // 0-10, one decimal
  readonly matches: readonly MatchRecord[];
}

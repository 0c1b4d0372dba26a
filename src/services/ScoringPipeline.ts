/**
 * ScoringPipeline - analyze, scan, combine and classify items one at a time
 */

import { Logger } from 'winston';
import { Analysis, AnalysisOutcome, ItemAnalyzer } from '../ai/types';
import {
  ArticleItem,
  KeywordTierTable,
  OpportunityItem,
  PipelineItem,
  ScoredArticle,
  ScoredItem,
  ScoredOpportunity,
  ScoreFields,
} from '../models';
import {
  DEFAULT_NORMALIZATION_DIVISOR,
  DEFAULT_TITLE_MULTIPLIER,
  scanKeywords,
} from '../scoring/KeywordScanner';
import { combineScores } from '../scoring/ScoreCombiner';
import { createLogger } from '../utils/logger';

export const DEFAULT_RELEVANCE_THRESHOLD = 4;

export interface ScoringOptions {
  relevanceThreshold: number;
  titleMultiplier: number;
  normalizationDivisor: number;
}

/**
 * Progress callbacks. Every hook is optional.
 */
export interface ScoringObserver {
  onItemStart?(item: PipelineItem): void;
  onAnalyzerFailure?(item: PipelineItem, reason: string): void;
  onClassified?(item: ScoredItem, isHit: boolean): void;
}

export interface ScoringOutcome<T extends ScoredItem> {
  scored: T[]; // hits and misses, in input order
  hits: T[];
}

const withDefaults = (options: Partial<ScoringOptions>): ScoringOptions => ({
  relevanceThreshold: DEFAULT_RELEVANCE_THRESHOLD,
  titleMultiplier: DEFAULT_TITLE_MULTIPLIER,
  normalizationDivisor: DEFAULT_NORMALIZATION_DIVISOR,
  ...options,
});

export function isHit(
  item: ScoredItem,
  relevanceThreshold: number = DEFAULT_RELEVANCE_THRESHOLD,
): boolean {
  return item.compositeScore >= relevanceThreshold;
}

/**
 * Applies keyword scan and score combination to an analyzed item.
 */
export function buildScoredItem(
  item: ArticleItem,
  analysis: Analysis,
  tiers: KeywordTierTable,
  options?: Partial<ScoringOptions>,
): ScoredArticle;
export function buildScoredItem(
  item: OpportunityItem,
  analysis: Analysis,
  tiers: KeywordTierTable,
  options?: Partial<ScoringOptions>,
): ScoredOpportunity;
export function buildScoredItem(
  item: PipelineItem,
  analysis: Analysis,
  tiers: KeywordTierTable,
  options?: Partial<ScoringOptions>,
): ScoredItem;
export function buildScoredItem(
  item: PipelineItem,
  analysis: Analysis,
  tiers: KeywordTierTable,
  options: Partial<ScoringOptions> = {},
): ScoredItem {
  const { titleMultiplier, normalizationDivisor } = withDefaults(options);

  // Opportunities carry no free text, so only their title is scanned
  const body = item.kind === 'article' ? item.text : '';
  const scan = scanKeywords(item.title, body, tiers, {
    titleMultiplier,
    normalizationDivisor,
  });

  const scores: ScoreFields = {
    llmScore: analysis.score,
    keywordScore: scan.keywordScore,
    compositeScore: combineScores(analysis.score, scan.keywordScore),
    matches: scan.matches,
    summary: analysis.summary,
    category: analysis.category,
  };

  if (item.kind === 'article') {
    const { text: _text, ...fields } = item;
    const scored: ScoredArticle = { ...fields, ...scores };
    return Object.freeze(scored);
  }

  const scored: ScoredOpportunity = { ...item, ...scores };
  return Object.freeze(scored);
}

export const analyzeItem = (
  item: PipelineItem,
  analyzer: ItemAnalyzer,
): Promise<AnalysisOutcome> =>
  item.kind === 'article'
    ? analyzer.analyzeArticle(item.title, item.text)
    : analyzer.analyzeOpportunity(item);

/**
 * Scores a single item. Returns null when the analyzer fails: an item that
 * could not be analyzed is dropped, not recorded as a miss.
 */
export async function scoreItem(
  item: ArticleItem,
  analyzer: ItemAnalyzer,
  tiers: KeywordTierTable,
  options?: Partial<ScoringOptions>,
): Promise<ScoredArticle | null>;
export async function scoreItem(
  item: OpportunityItem,
  analyzer: ItemAnalyzer,
  tiers: KeywordTierTable,
  options?: Partial<ScoringOptions>,
): Promise<ScoredOpportunity | null>;
export async function scoreItem(
  item: PipelineItem,
  analyzer: ItemAnalyzer,
  tiers: KeywordTierTable,
  options?: Partial<ScoringOptions>,
): Promise<ScoredItem | null>;
export async function scoreItem(
  item: PipelineItem,
  analyzer: ItemAnalyzer,
  tiers: KeywordTierTable,
  options: Partial<ScoringOptions> = {},
): Promise<ScoredItem | null> {
  const outcome = await analyzeItem(item, analyzer);
  if (!outcome.ok) return null;
  return buildScoredItem(item, outcome.value, tiers, options);
}

/**
 * Runs items through the analyzer and scorer strictly in order, one at a
 * time, and splits the results into everything scored and hits.
 */
export class ScoringPipeline {
  private logger: Logger;
  private options: ScoringOptions;
  private observer: ScoringObserver;

  constructor(
    private analyzer: ItemAnalyzer,
    private tiers: KeywordTierTable,
    options: Partial<ScoringOptions> = {},
    observer?: ScoringObserver,
  ) {
    this.logger = createLogger('ScoringPipeline');
    this.options = withDefaults(options);
    this.observer = observer ?? this.createLoggingObserver();
  }

  async scoreArticles(
    items: readonly ArticleItem[],
  ): Promise<ScoringOutcome<ScoredArticle>> {
    return this.scoreAll(items, (item, analysis) =>
      buildScoredItem(item, analysis, this.tiers, this.options),
    );
  }

  async scoreOpportunities(
    items: readonly OpportunityItem[],
  ): Promise<ScoringOutcome<ScoredOpportunity>> {
    return this.scoreAll(items, (item, analysis) =>
      buildScoredItem(item, analysis, this.tiers, this.options),
    );
  }

  getOptions(): ScoringOptions {
    return { ...this.options };
  }

  private async scoreAll<I extends PipelineItem, S extends ScoredItem>(
    items: readonly I[],
    build: (item: I, analysis: Analysis) => S,
  ): Promise<ScoringOutcome<S>> {
    const outcome: ScoringOutcome<S> = { scored: [], hits: [] };

    for (const item of items) {
      this.observer.onItemStart?.(item);

      const analysis = await analyzeItem(item, this.analyzer);
      if (!analysis.ok) {
        this.observer.onAnalyzerFailure?.(item, analysis.reason);
        continue;
      }

      const scored = build(item, analysis.value);

      const hit = isHit(scored, this.options.relevanceThreshold);
      outcome.scored.push(scored);
      if (hit) outcome.hits.push(scored);

      this.observer.onClassified?.(scored, hit);
    }

    return outcome;
  }

  private createLoggingObserver(): ScoringObserver {
    return {
      onItemStart: (item) => {
        this.logger.debug(`Analyzing: ${item.title.slice(0, 50)}`);
      },
      onAnalyzerFailure: (item, reason) => {
        this.logger.warn('Item dropped', { title: item.title, reason });
      },
      onClassified: (item, hit) => {
        const detail = `Score ${item.compositeScore}/10 (LLM=${item.llmScore}, KW=${item.keywordScore})`;
        if (hit) {
          this.logger.info(`HIT ${detail}: ${item.title}`);
        } else {
          this.logger.info(`Skipping ${detail}: ${item.title}`);
        }
      },
    };
  }
}

/**
 * Item models - articles and contract opportunities before and after scoring
 */

import { MatchRecord } from './Keyword';

export const ANALYSIS_CATEGORIES = [
  'Maritime',
  'AI/Tech',
  'Geopolitics',
  'Contracting',
  'Other',
] as const;

export type AnalysisCategory = (typeof ANALYSIS_CATEGORIES)[number];

export interface ArticleItem {
  kind: 'article';
  title: string;
  text: string;
  link: string;
  source: string; // feed name
  feedCategory: string;
}

export interface OpportunityItem {
  kind: 'opportunity';
  noticeId: string;
  title: string;
  link: string;
  solicitationNumber: string;
  naicsCode: string;
  type: string;
  responseDeadline: string;
}

export type PipelineItem = ArticleItem | OpportunityItem;

export interface ScoreFields {
  llmScore: number; // 0-10
  keywordScore: number; // 0-10
  compositeScore: number; // 0-10
  matches: readonly MatchRecord[];
  summary: string;
  category: AnalysisCategory;
}

export type ScoredArticle = Readonly<Omit<ArticleItem, 'text'> & ScoreFields>;

export type ScoredOpportunity = Readonly<OpportunityItem & ScoreFields>;

export type ScoredItem = ScoredArticle | ScoredOpportunity;


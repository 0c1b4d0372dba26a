import { AnalysisCategory, OpportunityItem, Outcome } from '../models';

/**
 * Qualitative assessment of one item
 */
export interface Analysis {
  score: number; // integer 0-10
  summary: string;
  category: AnalysisCategory;
}

export type AnalysisOutcome = Outcome<Analysis>;

/**
 * Produces a qualitative assessment of an article or an opportunity.
 * Failures are returned, not thrown.
 */
export interface ItemAnalyzer {
  analyzeArticle(title: string, text: string): Promise<AnalysisOutcome>;
  analyzeOpportunity(opportunity: OpportunityItem): Promise<AnalysisOutcome>;
}

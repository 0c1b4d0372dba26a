import { OpenAI } from 'openai';
import { Logger } from 'winston';
import { z } from 'zod';
import {
  ANALYSIS_CATEGORIES,
  AnalysisCategory,
  KeywordTierTable,
  OpportunityItem,
} from '../models';
import { createLogger } from '../utils/logger';
import { AnalyzerError, errorMessage } from '../utils/errors';
import { Analysis, AnalysisOutcome, ItemAnalyzer } from './types';

/**
 * Configuration for RelevanceAnalyzer
 */
export interface RelevanceAnalyzerConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

export const DEFAULT_SUMMARY = 'No summary available.';

// `{}` is how small models in JSON mode say they have no answer
const emptyResponseSchema = z.object({}).strict();

const responseSchema = z.object({
  score: z.union([z.number(), z.string()]).optional(),
  summary: z.string().optional(),
  category: z.string().optional(),
});

/**
 * Scores articles and contract opportunities with a chat model in JSON mode.
 * Works against any OpenAI-compatible endpoint, including a local Ollama
 * server. One attempt per item: the SDK's own retries are disabled.
 */
export class RelevanceAnalyzer implements ItemAnalyzer {
  private client: OpenAI;
  private logger: Logger;
  private config: Required<Omit<RelevanceAnalyzerConfig, 'baseUrl'>> & {
    baseUrl?: string;
  };
  private keywordList: string;

  constructor(config: RelevanceAnalyzerConfig, tiers: KeywordTierTable) {
    this.config = {
      model: 'llama3.2',
      temperature: 0.2,
      maxTokens: 400,
      timeoutMs: 120000,
      ...config,
    };

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
      timeout: this.config.timeoutMs,
      maxRetries: 0,
    });

    this.keywordList = Array.from(tiers.keys()).join(', ');
    this.logger = createLogger('RelevanceAnalyzer');
  }

  async analyzeArticle(title: string, text: string): Promise<AnalysisOutcome> {
    return this.analyze(this.createArticlePrompt(title, text), title);
  }

  async analyzeOpportunity(
    opportunity: OpportunityItem,
  ): Promise<AnalysisOutcome> {
    return this.analyze(
      this.createOpportunityPrompt(opportunity),
      opportunity.title,
    );
  }

  private async analyze(
    prompt: string,
    title: string,
  ): Promise<AnalysisOutcome> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: this.getSystemPrompt() },
          { role: 'user', content: prompt },
        ],
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        response_format: { type: 'json_object' },
      });

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new AnalyzerError('Empty response from model');
      }

      const analysis = this.parseResponse(content);

      this.logger.debug('Analysis completed', {
        title,
        score: analysis.score,
        category: analysis.category,
      });

      return { ok: true, value: analysis };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn('Analysis failed', { title, reason });
      return { ok: false, reason };
    }
  }

  /**
   * Validates the model's JSON and normalizes it to the Analysis shape
   */
  parseResponse(content: string): Analysis {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      throw new AnalyzerError('Model response is not valid JSON');
    }

    const result = responseSchema.safeParse(data);
    if (!result.success) {
      throw new AnalyzerError('Model response has an unexpected shape');
    }
    if (emptyResponseSchema.safeParse(data).success) {
      throw new AnalyzerError('Model returned an empty object');
    }

    return {
      score: this.normalizeScore(result.data.score),
      summary: result.data.summary?.trim() || DEFAULT_SUMMARY,
      category: this.normalizeCategory(result.data.category),
    };
  }

  private normalizeScore(raw: number | string | undefined): number {
    if (raw === undefined) return 0;

    const score = typeof raw === 'number' ? raw : parseFloat(raw);
    if (!Number.isFinite(score)) {
      throw new AnalyzerError(`Model returned a non-numeric score: ${raw}`);
    }
    return Math.max(0, Math.min(10, Math.round(score)));
  }

  private normalizeCategory(raw: string | undefined): AnalysisCategory {
    const wanted = raw?.trim().toLowerCase();
    return (
      ANALYSIS_CATEGORIES.find((category) => category.toLowerCase() === wanted) ??
      'Other'
    );
  }

  private getSystemPrompt(): string {
    return `You are a defense-tech analyst screening material for a daily digest.
Always answer with a single valid JSON object and nothing else.`;
  }

  private createArticlePrompt(title: string, text: string): string {
    return `Score the article below on a 0-10 scale using this rubric:

  8-10: Directly mentions a priority keyword OR covers a specific contract
        award, weapon-system milestone, or policy change in maritime defense,
        autonomous systems or defense AI.
        Examples: "Navy awards $400M sealift contract", "Anduril unveils
        autonomous patrol boat".
  5-7:  General defense-industry or military news that is useful background
        but does not mention priority keywords or a specific program.
  1-4:  Tangentially related: mentions the military but focuses on politics,
        lifestyle, or broad geopolitics with no defense-tech angle.
  0:    Completely irrelevant (sports, entertainment, etc.).

Priority keywords (boost score when present): ${this.keywordList}

Return ONLY a JSON object with these fields:
- "score": integer 0-10 per the rubric above
- "summary": 2-sentence executive summary
- "category": one of ${this.categoryList()}

Article title: ${title}
Snippet: ${text}`;
  }

  private createOpportunityPrompt(opportunity: OpportunityItem): string {
    return `Score this government contract opportunity on a 0-10 scale using this rubric:

  8-10: Directly related to priority keywords OR involves shipbuilding,
        autonomous systems, defense AI, or maritime logistics.
  5-7:  General defense/government contract that may be tangentially relevant.
  1-4:  Government contract with little defense-tech relevance.
  0:    Completely irrelevant.

Priority keywords (boost score when present): ${this.keywordList}

Return ONLY a JSON object with these fields:
- "score": integer 0-10 per the rubric above
- "summary": 2-sentence description of what this contract covers and why it matters
- "category": one of ${this.categoryList()}

Contract title: ${opportunity.title}
Solicitation number: ${opportunity.solicitationNumber}
NAICS code: ${opportunity.naicsCode}
Type: ${opportunity.type}
Response deadline: ${opportunity.responseDeadline}`;
  }

  private categoryList(): string {
    return ANALYSIS_CATEGORIES.map((category) => `"${category}"`).join(', ');
  }

  getModel(): string {
    return this.config.model;
  }
}

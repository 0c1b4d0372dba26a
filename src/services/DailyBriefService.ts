/**
 * DailyBriefService - runs the whole brief: feeds, opportunities, run log,
 * delivery. Also owns the cron schedule.
 */

import cron, { ScheduledTask } from 'node-cron';
import { Logger } from 'winston';
import { DigestSender, SendResult } from '../bot/TelegramDigestSender';
import { FeedCategory } from '../config';
import {
  RunRecord,
  ScoredArticle,
  ScoredOpportunity,
} from '../models';
import { ArticleSource, OpportunitySource } from '../sources/types';
import { ConfigError, isOperationalError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { formatDigest } from './DigestFormatter';
import { buildRunRecord, RunLedgerConfig } from './RunLedger';
import { RunLogWriter } from './RunLogWriter';
import { ScoringPipeline } from './ScoringPipeline';

export interface DailyBriefDependencies {
  articleSource: ArticleSource;
  feedCategories: FeedCategory[];
  // Absent when no SAM.gov key is configured
  opportunitySource?: OpportunitySource;
  pipeline: ScoringPipeline;
  runLogWriter: Pick<RunLogWriter, 'write'>;
  // Absent when delivery is not configured
  sender?: DigestSender;
  ledgerConfig: RunLedgerConfig;
}

export interface RunResult {
  record: RunRecord;
  logPath: string;
  delivery: SendResult | null;
}

export class DailyBriefService {
  private logger: Logger;
  private isRunning: boolean = false;

  constructor(private deps: DailyBriefDependencies) {
    this.logger = createLogger('DailyBriefService');
  }

  async runOnce(now: Date = new Date()): Promise<RunResult> {
    this.logger.info('Starting daily brief');

    const { scored: allArticles, hits: hitArticles } =
      await this.collectArticles();
    const { scored: allOpportunities, hits: hitOpportunities } =
      await this.collectOpportunities(now);

    const record = buildRunRecord(
      allArticles,
      allOpportunities,
      hitArticles,
      hitOpportunities,
      this.deps.ledgerConfig,
      now,
    );
    const logPath = await this.deps.runLogWriter.write(record, now);

    const delivery = await this.deliver(hitArticles, hitOpportunities);

    this.logger.info('Daily brief finished', {
      ...record.summary,
      delivered: delivery?.success ?? false,
    });

    return { record, logPath, delivery };
  }

  /**
   * Runs the brief on a cron schedule. A tick that fires while a run is
   * still in progress is skipped.
   */
  schedule(expression: string): ScheduledTask {
    if (!cron.validate(expression)) {
      throw new ConfigError(`Invalid cron expression: ${expression}`);
    }

    this.logger.info(`Daily brief scheduled: ${expression}`);
    return cron.schedule(expression, () => {
      this.runScheduled().catch((error: unknown) => {
        if (isOperationalError(error)) {
          this.logger.error(`Scheduled run failed: ${error.message}`, {
            code: error.code,
          });
        } else {
          this.logger.error('Scheduled run failed', { error });
        }
      });
    });
  }

  async runScheduled(): Promise<RunResult | null> {
    if (this.isRunning) {
      this.logger.warn('Previous run still in progress, skipping this tick');
      return null;
    }

    this.isRunning = true;
    try {
      return await this.runOnce();
    } finally {
      this.isRunning = false;
    }
  }

  isCurrentlyRunning(): boolean {
    return this.isRunning;
  }

  private async collectArticles(): Promise<{
    scored: ScoredArticle[];
    hits: ScoredArticle[];
  }> {
    const scored: ScoredArticle[] = [];
    const hits: ScoredArticle[] = [];

    for (const { category, feeds } of this.deps.feedCategories) {
      this.logger.info(`--- ${category} ---`);

      for (const feed of feeds) {
        const articles = await this.deps.articleSource.readFeed(feed, category);
        if (!articles.ok) continue;

        const outcome = await this.deps.pipeline.scoreArticles(articles.value);
        scored.push(...outcome.scored);
        hits.push(...outcome.hits);
      }
    }

    return { scored, hits };
  }

  private async collectOpportunities(now: Date): Promise<{
    scored: ScoredOpportunity[];
    hits: ScoredOpportunity[];
  }> {
    if (!this.deps.opportunitySource) {
      this.logger.info('SAM_GOV_API_KEY not set, skipping contract opportunities');
      return { scored: [], hits: [] };
    }

    this.logger.info('--- SAM.gov Contracts ---');
    const opportunities =
      await this.deps.opportunitySource.fetchOpportunities(now);
    return this.deps.pipeline.scoreOpportunities(opportunities);
  }

  private async deliver(
    articles: ScoredArticle[],
    opportunities: ScoredOpportunity[],
  ): Promise<SendResult | null> {
    if (!this.deps.sender) {
      this.logger.info('Digest delivery not configured, skipping');
      return null;
    }

    return this.deps.sender.send(formatDigest(articles, opportunities));
  }
}

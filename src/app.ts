/**
 * Wires collaborators from the application config
 */

import { RelevanceAnalyzer } from './ai/RelevanceAnalyzer';
import { TelegramDigestSender } from './bot/TelegramDigestSender';
import { AppConfig } from './config';
import { loadKeywordTiers } from './scoring/keywordTiers';
import { DailyBriefService } from './services/DailyBriefService';
import { RunLogWriter } from './services/RunLogWriter';
import { ScoringPipeline } from './services/ScoringPipeline';
import { FeedReader } from './sources/FeedReader';
import { SamGovSource } from './sources/SamGovSource';

export async function createDailyBriefService(
  config: AppConfig,
): Promise<DailyBriefService> {
  const tiers = await loadKeywordTiers(config.keywordTiersPath);

  const analyzer = new RelevanceAnalyzer(
    {
      apiKey: config.ai.apiKey,
      baseUrl: config.ai.baseUrl,
      model: config.ai.model,
      temperature: config.ai.temperature,
      timeoutMs: config.ai.timeoutMs,
    },
    tiers,
  );

  const pipeline = new ScoringPipeline(analyzer, tiers, config.scoring);

  return new DailyBriefService({
    articleSource: new FeedReader(config.feeds),
    feedCategories: config.feeds.categories,
    opportunitySource: config.sam.apiKey
      ? new SamGovSource({
          apiKey: config.sam.apiKey,
          timeoutMs: config.sam.timeoutMs,
          limit: config.sam.limit,
          windowDays: config.sam.windowDays,
        })
      : undefined,
    pipeline,
    runLogWriter: new RunLogWriter(config.outputDir),
    sender: config.telegram
      ? new TelegramDigestSender({
          token: config.telegram.botToken,
          chatId: config.telegram.chatId,
        })
      : undefined,
    ledgerConfig: {
      model: analyzer.getModel(),
      relevanceThreshold: config.scoring.relevanceThreshold,
      entriesPerFeed: config.feeds.entriesPerFeed,
      titleMultiplier: config.scoring.titleMultiplier,
      normalizationDivisor: config.scoring.normalizationDivisor,
      keywordTiers: tiers,
    },
  });
}

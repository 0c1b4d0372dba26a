/**
 * FeedReader - turns RSS/Atom feeds into article items
 */

import Parser from 'rss-parser';
import { Logger } from 'winston';
import { FeedSource } from '../config';
import { ArticleItem, Outcome } from '../models';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const MAX_SNIPPET_LENGTH = 1000;

export interface FeedReaderConfig {
  entriesPerFeed: number;
  timeoutMs: number;
}

type CustomItem = {
  contentEncoded?: string;
  description?: string;
};

export type FeedEntry = Parser.Item & CustomItem;

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&#039;': "'",
  '&nbsp;': ' ',
};

export function stripHtml(html: string): string {
  return html
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, '')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, '')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&(amp|lt|gt|quot|nbsp|#39|#039);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Feeds keep article text in different fields; take the first non-empty one.
 */
export function extractSnippet(entry: FeedEntry): string {
  const raw =
    entry.contentEncoded ||
    entry.content ||
    entry.summary ||
    entry.description ||
    entry.contentSnippet ||
    '';
  return stripHtml(raw).slice(0, MAX_SNIPPET_LENGTH);
}

export class FeedReader {
  private logger: Logger;
  private parser: Parser<Record<string, unknown>, CustomItem>;
  private config: FeedReaderConfig;

  constructor(config: FeedReaderConfig) {
    this.config = config;
    this.logger = createLogger('FeedReader');
    this.parser = new Parser<Record<string, unknown>, CustomItem>({
      timeout: config.timeoutMs,
      headers: {
        'User-Agent': 'defense-brief/1.0',
        Accept:
          'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      },
      customFields: {
        item: [
          ['content:encoded', 'contentEncoded'],
          ['description', 'description'],
        ],
      },
    });
  }

  /**
   * Reads the first `entriesPerFeed` entries of one feed.
   * A feed that cannot be loaded yields a failed outcome, never a throw.
   */
  async readFeed(
    feed: FeedSource,
    feedCategory: string,
  ): Promise<Outcome<ArticleItem[]>> {
    try {
      const output = await this.parser.parseURL(feed.url);
      const entries = output.items.slice(0, this.config.entriesPerFeed);

      this.logger.info(`Scanning ${entries.length} articles from ${feed.name}`);

      const articles = entries.map(
        (entry): ArticleItem => ({
          kind: 'article',
          title: entry.title?.trim() || 'Untitled',
          text: extractSnippet(entry),
          link: entry.link ?? '',
          source: feed.name,
          feedCategory,
        }),
      );

      return { ok: true, value: articles };
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.warn('Feed could not be read', { feed: feed.name, reason });
      return { ok: false, reason };
    }
  }
}

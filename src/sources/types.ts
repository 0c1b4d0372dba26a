import { FeedSource } from '../config';
import { ArticleItem, OpportunityItem, Outcome } from '../models';

export interface ArticleSource {
  readFeed(feed: FeedSource, feedCategory: string): Promise<Outcome<ArticleItem[]>>;
}

export interface OpportunitySource {
  fetchOpportunities(now?: Date): Promise<OpportunityItem[]>;
}

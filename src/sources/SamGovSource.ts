/**
 * SamGovSource - fetches contract opportunities from the SAM.gov search API
 */

import { Logger } from 'winston';
import { z } from 'zod';
import {
  OpportunityItem,
  OpportunitySearch,
  Outcome,
  RawOpportunity,
} from '../models';
import { createLogger } from '../utils/logger';
import { SourceFetchError, errorMessage, formatZodError } from '../utils/errors';
import { dedupeOpportunities } from './OpportunityDeduplicator';

export const SAM_SEARCH_URL = 'https://api.sam.gov/opportunities/v2/search';

export const DEFAULT_SEARCHES: OpportunitySearch[] = [
  {
    description: 'Shipbuilding & Repair (NAICS 336611)',
    params: { ncode: '336611' },
  },
  {
    description: 'Defense Tech Keywords',
    params: { q: 'autonomous unmanned AI robotics' },
  },
];

export interface SamGovSourceConfig {
  apiKey: string;
  timeoutMs?: number;
  limit?: number;
  windowDays?: number;
  searches?: OpportunitySearch[];
}

export type FetchFn = (
  input: string,
  init?: { signal?: AbortSignal },
) => Promise<Response>;

const text = z.string().nullish();

const listingSchema = z.object({
  noticeId: text,
  title: text,
  solicitationNumber: text,
  naicsCode: text,
  type: text,
  responseDeadLine: text,
});

const searchResponseSchema = z.object({
  opportunitiesData: z.array(listingSchema).nullish(),
});

/**
 * MM/DD/YYYY, the date format the search API expects
 */
export function formatSamDate(date: Date): string {
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${mm}/${dd}/${date.getFullYear()}`;
}

export function toOpportunityItem(raw: RawOpportunity): OpportunityItem {
  return {
    kind: 'opportunity',
    noticeId: raw.noticeId,
    title: raw.title,
    link: `https://sam.gov/opp/${raw.noticeId}/view`,
    solicitationNumber: raw.solicitationNumber,
    naicsCode: raw.naicsCode,
    type: raw.type,
    responseDeadline: raw.responseDeadLine,
  };
}

export class SamGovSource {
  private logger: Logger;
  private config: Required<SamGovSourceConfig>;
  private fetchFn: FetchFn;

  constructor(config: SamGovSourceConfig, fetchFn: FetchFn = fetch) {
    this.logger = createLogger('SamGovSource');
    this.config = {
      timeoutMs: 30000,
      limit: 10,
      windowDays: 7,
      searches: DEFAULT_SEARCHES,
      ...config,
    };
    this.fetchFn = fetchFn;
  }

  /**
   * Runs every search in order and returns the deduplicated listings.
   * A failed search contributes nothing; the others still run.
   */
  async fetchOpportunities(now: Date = new Date()): Promise<OpportunityItem[]> {
    const resultSets: RawOpportunity[][] = [];

    for (const search of this.config.searches) {
      this.logger.info(`Searching ${search.description}`);
      const outcome = await this.search(search, now);

      if (outcome.ok) {
        resultSets.push(outcome.value);
      } else {
        this.logger.warn('Opportunity search failed', {
          search: search.description,
          reason: outcome.reason,
        });
        resultSets.push([]);
      }
    }

    const unique = dedupeOpportunities(resultSets);
    this.logger.info(`Found ${unique.length} unique opportunities`);

    return unique.map(toOpportunityItem);
  }

  async search(
    search: OpportunitySearch,
    now: Date = new Date(),
  ): Promise<Outcome<RawOpportunity[]>> {
    try {
      const response = await this.fetchFn(this.buildUrl(search, now), {
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        throw new SourceFetchError(
          search.description,
          `HTTP ${response.status} ${response.statusText}`.trim(),
        );
      }

      const parsed = searchResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SourceFetchError(
          search.description,
          `unexpected response: ${formatZodError(parsed.error)}`,
        );
      }

      const listings = (parsed.data.opportunitiesData ?? []).map((listing) => ({
        // Trimmed once here; dedup keys and links both use this value
        noticeId: listing.noticeId?.trim() ?? '',
        title: listing.title || 'Untitled',
        solicitationNumber: listing.solicitationNumber || 'N/A',
        naicsCode: listing.naicsCode || 'N/A',
        type: listing.type || 'N/A',
        responseDeadLine: listing.responseDeadLine || 'N/A',
      }));

      return { ok: true, value: listings };
    } catch (error) {
      return { ok: false, reason: errorMessage(error) };
    }
  }

  buildUrl(search: OpportunitySearch, now: Date): string {
    const from = new Date(now);
    from.setDate(from.getDate() - this.config.windowDays);

    const params = new URLSearchParams({
      api_key: this.config.apiKey,
      postedFrom: formatSamDate(from),
      postedTo: formatSamDate(now),
      limit: String(this.config.limit),
      ...search.params,
    });

    return `${SAM_SEARCH_URL}?${params.toString()}`;
  }
}

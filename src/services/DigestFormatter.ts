/**
 * DigestFormatter - renders hits as Telegram HTML messages
 */

import { ScoredArticle, ScoredOpportunity } from '../models';

// Telegram rejects messages longer than this
export const TELEGRAM_MESSAGE_LIMIT = 4096;

export interface Digest {
  title: string;
  messages: string[];
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

const ELLIPSIS = '…';

// Per-field caps on escaped length; a full opportunity block stays under
// TELEGRAM_MESSAGE_LIMIT
const MAX_TITLE_LENGTH = 400;
const MAX_FIELD_LENGTH = 200;
const MAX_LINK_LENGTH = 1000;
const MAX_SUMMARY_LENGTH = 1500;

/**
 * Escapes `text` and shortens it so the escaped result is at most
 * `maxLength` characters. Cuts between source characters, so an entity is
 * never split.
 */
export function escapeHtmlWithin(text: string, maxLength: number): string {
  const escaped = escapeHtml(text);
  if (escaped.length <= maxLength) return escaped;

  let result = '';
  for (const char of text) {
    const next = escapeHtml(char);
    if (result.length + next.length + ELLIPSIS.length > maxLength) break;
    result += next;
  }
  return result + ELLIPSIS;
}

// Title as a link, or plain when the link is missing or too long to embed
const formatHeading = (score: number, title: string, link: string): string => {
  const label = escapeHtmlWithin(title, MAX_TITLE_LENGTH);
  const href = escapeHtml(link);
  const heading =
    href && href.length <= MAX_LINK_LENGTH ? `<a href="${href}">${label}</a>` : label;
  return `<b>[${score}/10]</b> ${heading}`;
};

const field = (text: string): string => escapeHtmlWithin(text, MAX_FIELD_LENGTH);

export function formatDigestTitle(
  articles: readonly ScoredArticle[],
  opportunities: readonly ScoredOpportunity[],
): string {
  return `Defense Brief: ${articles.length} Articles, ${opportunities.length} Contracts`;
}

export function formatArticle(article: ScoredArticle): string {
  return [
    formatHeading(article.compositeScore, article.title, article.link),
    `<i>${field(article.category)}</i> | Source: ${field(article.source)}`,
    escapeHtmlWithin(article.summary, MAX_SUMMARY_LENGTH),
  ].join('\n');
}

export function formatOpportunity(opportunity: ScoredOpportunity): string {
  return [
    formatHeading(opportunity.compositeScore, opportunity.title, opportunity.link),
    `<b>Solicitation:</b> ${field(opportunity.solicitationNumber)} | <b>NAICS:</b> ${field(opportunity.naicsCode)} | <b>Type:</b> ${field(opportunity.type)}`,
    `<b>Response Deadline:</b> ${field(opportunity.responseDeadline)}`,
    escapeHtmlWithin(opportunity.summary, MAX_SUMMARY_LENGTH),
  ].join('\n');
}

/**
 * Packs blocks into messages of at most `limit` characters, breaking only
 * between blocks. Blocks are never cut: one longer than the limit goes out
 * as a message of its own.
 */
export function chunkBlocks(
  blocks: readonly string[],
  limit: number = TELEGRAM_MESSAGE_LIMIT,
): string[] {
  const separator = '\n\n';
  const messages: string[] = [];
  let current = '';

  for (const block of blocks) {
    const candidate = current ? `${current}${separator}${block}` : block;

    if (candidate.length <= limit || !current) {
      current = candidate;
    } else {
      messages.push(current);
      current = block;
    }
  }

  if (current) messages.push(current);
  return messages;
}

/**
 * Articles first, then opportunities; an empty section is left out.
 * Returns no messages when there are no hits.
 */
export function formatDigest(
  articles: readonly ScoredArticle[],
  opportunities: readonly ScoredOpportunity[],
): Digest {
  const title = formatDigestTitle(articles, opportunities);
  if (articles.length === 0 && opportunities.length === 0) {
    return { title, messages: [] };
  }

  const blocks = [`<b>${escapeHtml(title)}</b>`];

  if (articles.length > 0) {
    blocks.push('<b>News Articles</b>', ...articles.map(formatArticle));
  }

  if (opportunities.length > 0) {
    blocks.push(
      '<b>Contract Opportunities (SAM.gov)</b>',
      ...opportunities.map(formatOpportunity),
    );
  }

  return { title, messages: chunkBlocks(blocks) };
}

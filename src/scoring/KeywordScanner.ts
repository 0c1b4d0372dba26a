import {
  KeywordScanResult,
  KeywordTierTable,
  MatchLocation,
  MatchRecord,
  TierWeight,
} from '../models';

export const DEFAULT_TITLE_MULTIPLIER = 2;
export const DEFAULT_NORMALIZATION_DIVISOR = 6;
export const MAX_KEYWORD_SCORE = 10;

export interface KeywordScanOptions {
  titleMultiplier: number;
  normalizationDivisor: number;
}

interface CompiledKeyword {
  keyword: string;
  weight: TierWeight;
  pattern: RegExp;
}

// Compiled patterns per table; tables are immutable so the cache never goes stale
const compiledTables = new WeakMap<KeywordTierTable, CompiledKeyword[]>();

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const compile = (tiers: KeywordTierTable): CompiledKeyword[] => {
  const cached = compiledTables.get(tiers);
  if (cached) return cached;

  const compiled = Array.from(tiers.entries()).map(([keyword, weight]) => ({
    keyword,
    weight,
    // Word characters include any Unicode letter or digit, so "naval"
    // does not match inside "Navalé". No g flag: test() keeps no lastIndex.
    pattern: new RegExp(
      `(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}_])`,
      'iu',
    ),
  }));
  compiledTables.set(tiers, compiled);
  return compiled;
};

/**
 * Weighted whole-word keyword scan over an item's title and body.
 *
 * A keyword found in the title scores `weight × titleMultiplier` and is not
 * looked up in the body. Otherwise a body match scores `weight`. The raw sum
 * is normalized to 0-10 (`raw / divisor × 10`, capped) and rounded to one
 * decimal. Matches are listed in tier-table order.
 */
export function scanKeywords(
  title: string,
  body: string,
  tiers: KeywordTierTable,
  options: Partial<KeywordScanOptions> = {},
): KeywordScanResult {
  const titleMultiplier = options.titleMultiplier ?? DEFAULT_TITLE_MULTIPLIER;
  const divisor =
    options.normalizationDivisor ?? DEFAULT_NORMALIZATION_DIVISOR;

  const matches: MatchRecord[] = [];
  let rawPoints = 0;

  for (const { keyword, weight, pattern } of compile(tiers)) {
    let location: MatchLocation;
    if (pattern.test(title)) {
      rawPoints += weight * titleMultiplier;
      location = 'title';
    } else if (body && pattern.test(body)) {
      rawPoints += weight;
      location = 'body';
    } else {
      continue;
    }
    const match: MatchRecord = { keyword, weight, location };
    matches.push(Object.freeze(match));
  }

  const normalized = Math.min(
    MAX_KEYWORD_SCORE,
    (rawPoints / divisor) * MAX_KEYWORD_SCORE,
  );

  return Object.freeze({
    keywordScore: Math.round(normalized * 10) / 10,
    matches: Object.freeze(matches),
  });
}

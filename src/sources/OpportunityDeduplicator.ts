import { RawOpportunity } from '../models';

/**
 * Merges ordered search result sets into one list that is unique by notice
 * id. The first occurrence wins and later duplicates are dropped as-is, with
 * no field merging. Ids are compared exactly as given. Listings with a blank
 * notice id cannot be told apart, so each of them is kept.
 */
export function dedupeOpportunities<T extends Pick<RawOpportunity, 'noticeId'>>(
  resultSets: ReadonlyArray<ReadonlyArray<T>>,
): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];

  for (const resultSet of resultSets) {
    for (const opportunity of resultSet) {
      const { noticeId } = opportunity;
      if (noticeId.trim()) {
        if (seen.has(noticeId)) continue;
        seen.add(noticeId);
      }
      unique.push(opportunity);
    }
  }

  return unique;
}

/**
 * Keyword tier table loading and validation
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import bundledTiers from '../../config/keyword-tiers.json';
import { KeywordTierTable, TierWeight } from '../models';
import { ConfigError, errorMessage, formatZodError } from '../utils/errors';

const keywordSchema = z
  .string()
  .min(1, { message: 'Keyword cannot be empty' })
  .refine((keyword) => keyword.trim() === keyword, {
    message: 'Keyword cannot have leading or trailing whitespace',
  });

const weightSchema = z.union([z.literal(1), z.literal(2), z.literal(3)], {
  errorMap: () => ({ message: 'Weight must be 1, 2 or 3' }),
});

export const keywordTierSchema = z.record(keywordSchema, weightSchema);

/**
 * Validates raw tier data and returns an immutable table.
 * Keys must be unique ignoring case, since matching ignores case.
 */
export function createTierTable(input: unknown): KeywordTierTable {
  const result = keywordTierSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid keyword tiers: ${formatZodError(result.error)}`,
      result.error.errors,
    );
  }

  const seen = new Map<string, string>();
  const table = new Map<string, TierWeight>();

  for (const [keyword, weight] of Object.entries(result.data)) {
    const folded = keyword.toLowerCase();
    const previous = seen.get(folded);
    if (previous !== undefined) {
      throw new ConfigError(
        `Invalid keyword tiers: "${keyword}" duplicates "${previous}"`,
      );
    }
    seen.set(folded, keyword);
    table.set(keyword, weight);
  }

  if (table.size === 0) {
    throw new ConfigError('Invalid keyword tiers: table is empty');
  }

  return table;
}

/**
 * Loads the tier table from a JSON file, or the bundled table when no path
 * is given.
 */
export async function loadKeywordTiers(
  filePath?: string,
): Promise<KeywordTierTable> {
  if (!filePath) {
    return createTierTable(bundledTiers);
  }

  const resolved = path.resolve(filePath);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read keyword tiers from ${resolved}: ${errorMessage(error)}`,
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Keyword tiers file ${resolved} is not valid JSON: ${errorMessage(error)}`,
    );
  }

  return createTierTable(data);
}

export function tierTableToRecord(
  tiers: KeywordTierTable,
): Record<string, number> {
  return Object.fromEntries(tiers);
}

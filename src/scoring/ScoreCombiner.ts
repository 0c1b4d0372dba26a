import { ContractViolationError } from '../utils/errors';

export const LLM_WEIGHT = 0.6;
export const KEYWORD_WEIGHT = 0.4;
export const MAX_COMPOSITE_SCORE = 10;

const assertInRange = (name: string, value: number, integer: boolean) => {
  if (!Number.isFinite(value) || value < 0 || value > MAX_COMPOSITE_SCORE) {
    throw new ContractViolationError(
      `${name} must be within 0-${MAX_COMPOSITE_SCORE}, got ${value}`,
    );
  }
  if (integer && !Number.isInteger(value)) {
    throw new ContractViolationError(`${name} must be an integer, got ${value}`);
  }
};

/**
 * Blends the analyzer score (60%) with the keyword score (40%) into a 0-10
 * integer. A keyword score of 10 alone yields 4, so a strong keyword hit
 * stays visible at the default threshold even when the analyzer returns 0.
 */
export function combineScores(llmScore: number, keywordScore: number): number {
  assertInRange('llmScore', llmScore, true);
  assertInRange('keywordScore', keywordScore, false);

  return Math.min(
    MAX_COMPOSITE_SCORE,
    Math.round(llmScore * LLM_WEIGHT + keywordScore * KEYWORD_WEIGHT),
  );
}

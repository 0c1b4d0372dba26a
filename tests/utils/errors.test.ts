import { z } from 'zod';
import {
  AnalyzerError,
  ConfigError,
  ContractViolationError,
  SourceFetchError,
  errorMessage,
  formatZodError,
  isOperationalError,
} from '../../src/utils/errors';

describe('errors', () => {
  describe('isOperationalError', () => {
    it('accepts runtime conditions', () => {
      expect(isOperationalError(new ConfigError('bad env'))).toBe(true);
      expect(isOperationalError(new AnalyzerError('timeout'))).toBe(true);
      expect(isOperationalError(new SourceFetchError('Feed', 'HTTP 500'))).toBe(true);
    });

    it('rejects contract violations and foreign errors', () => {
      expect(isOperationalError(new ContractViolationError('llmScore 11'))).toBe(false);
      expect(isOperationalError(new Error('boom'))).toBe(false);
      expect(isOperationalError('boom')).toBe(false);
    });
  });

  it('prefixes source errors with the source name', () => {
    const error = new SourceFetchError('Defense Tech Keywords', 'HTTP 429');

    expect(error.message).toBe('Defense Tech Keywords: HTTP 429');
    expect(error.code).toBe('SOURCE_FETCH_ERROR');
  });

  it('formats zod issues with their paths', () => {
    const result = z.object({ limit: z.number() }).safeParse({ limit: 'ten' });
    if (result.success) throw new Error('expected a parse failure');

    expect(formatZodError(result.error)).toBe(
      'limit: Expected number, received string',
    );
  });

  it('reads messages from errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage(42)).toBe('42');
  });
});

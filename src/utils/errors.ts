/**
 * Application error hierarchy
 */

import { ZodError } from 'zod';

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public isOperational = true,
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    public details?: unknown,
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * The analyzer could not produce a usable assessment for one item.
 */
export class AnalyzerError extends AppError {
  constructor(message: string) {
    super(message, 'ANALYZER_ERROR');
    this.name = 'AnalyzerError';
  }
}

/**
 * One feed or one opportunity search could not be fetched or parsed.
 */
export class SourceFetchError extends AppError {
  constructor(
    public source: string,
    message: string,
  ) {
    super(`${source}: ${message}`, 'SOURCE_FETCH_ERROR');
    this.name = 'SourceFetchError';
  }
}

export class DeliveryError extends AppError {
  constructor(message: string) {
    super(message, 'DELIVERY_ERROR');
    this.name = 'DeliveryError';
  }
}

/**
 * A caller handed a core function a value outside its documented range.
 * Not operational: this is a bug, not a runtime condition.
 */
export class ContractViolationError extends AppError {
  constructor(message: string) {
    super(message, 'CONTRACT_VIOLATION', false);
    this.name = 'ContractViolationError';
  }
}

/**
 * True for expected runtime conditions (bad config, an unreachable
 * service). Anything else is a bug and is logged with its stack.
 */
export const isOperationalError = (error: unknown): error is AppError =>
  error instanceof AppError && error.isOperational;

export const formatZodError = (error: ZodError): string =>
  error.errors
    .map((err) => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join(', ');

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Models index - exports all model types
 */

export * from './Keyword';
export * from './Item';
export * from './Opportunity';
export * from './RunRecord';

/**
 * Outcome of a call to an external collaborator that may fail without
 * aborting the run.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

import type { ZodIssue } from 'zod';

export type RecommenderErrorCode = 'CITIZEN_NOT_FOUND' | 'INVALID_INPUT';

export class RecommenderError extends Error {
  constructor(
    readonly code: RecommenderErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends RecommenderError {
  constructor(
    readonly entity: 'citizen',
    readonly id: string
  ) {
    super('CITIZEN_NOT_FOUND', `${entity} ${id} not found`);
  }
}

export class InvalidInputError extends RecommenderError {
  constructor(
    message: string,
    readonly issues: ZodIssue[] = []
  ) {
    super('INVALID_INPUT', message);
  }
}

export const isRecommenderError = (value: unknown): value is RecommenderError => value instanceof RecommenderError;

/** Start-up record for a reference id that could not be resolved; logged once and skipped. */
export interface LoadIntegrityWarning {
  table: 'districts' | 'clusters' | 'similarity' | 'citizens' | 'provisions' | 'minor_eligibility' | 'services';
  reference: string;
  reason: string;
}

/**
 * Data-layer errors.
 *
 * Engines throw these; the dispatch layer turns them into explicit negative
 * results. Anything else reaching the dispatch layer is a bug.
 */

import type { EntityType } from '../types';

export type RealtyErrorCode = 'NOT_FOUND' | 'INVALID_CRITERIA' | 'LOAD_FAILURE';

export abstract class RealtyError extends Error {
  abstract readonly code: RealtyErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Structured detail for callers; serialized by the dispatch layer. */
  abstract get details(): Record<string, unknown>;
}

export class NotFoundError extends RealtyError {
  readonly code = 'NOT_FOUND';

  constructor(
    readonly entityType: EntityType,
    readonly key: string
  ) {
    super(`No ${entityType} found for "${key}"`);
  }

  get details(): Record<string, unknown> {
    return { entityType: this.entityType, key: this.key };
  }
}

export class InvalidCriteriaError extends RealtyError {
  readonly code = 'INVALID_CRITERIA';

  constructor(readonly problems: string[]) {
    super(`Invalid criteria: ${problems.join('; ')}`);
  }

  get details(): Record<string, unknown> {
    return { problems: this.problems };
  }
}

export interface LoadDiagnostic {
  category: string;
  severity: 'warning' | 'error';
  message: string;
  /** Position of the offending record inside its category, when there is one. */
  recordIndex?: number;
}

export class LoadFailureError extends RealtyError {
  readonly code = 'LOAD_FAILURE';

  constructor(
    message: string,
    readonly diagnostics: LoadDiagnostic[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  get details(): Record<string, unknown> {
    return { diagnostics: this.diagnostics };
  }
}

export function isRealtyError(error: unknown): error is RealtyError {
  return error instanceof RealtyError;
}

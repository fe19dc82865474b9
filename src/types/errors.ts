/**
 * Healing Error Taxonomy
 *
 * Error classes with machine-readable codes for the public surface, and the
 * tagged Outcome type the resolver branches on internally. A recoverable
 * outcome means "try the next stage"; a fatal one ends the resolution.
 */

import type { ResolverState } from './healing.js';

export type HealingErrorCode =
  | 'ELEMENT_NOT_FOUND'           // single-element query matched nothing
  | 'NO_CANDIDATES_FOUND'         // nothing to heal toward
  | 'HEALING_VERIFICATION_FAILED' // synthesized locator did not re-resolve
  | 'GOLDEN_CAPTURE_FAILED'       // first-sight capture found no element
  | 'DRIVER_ERROR'                // the page driver threw
  | 'RANKER_ERROR'                // fitting or querying the learned ranker threw
  | 'PERSISTENCE_ERROR';          // writing session state failed

/**
 * Context about the error
 */
export interface HealingErrorContext {
  locator?: string;
  goldenId?: string;
  pageKey?: string;
  tag?: string;
  state?: ResolverState;
  attemptedLocators?: string[];
}

export class HealingError extends Error {
  constructor(
    public readonly code: HealingErrorCode,
    message: string,
    public readonly context: HealingErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HealingError';
  }
}

export class ElementNotFoundError extends HealingError {
  constructor(locator: string, context: HealingErrorContext = {}) {
    super('ELEMENT_NOT_FOUND', `No element matches locator: ${locator}`, { ...context, locator });
    this.name = 'ElementNotFoundError';
  }
}

export class NoCandidatesFoundError extends HealingError {
  constructor(message: string, context: HealingErrorContext = {}) {
    super('NO_CANDIDATES_FOUND', message, context);
    this.name = 'NoCandidatesFoundError';
  }
}

export class HealingVerificationFailedError extends HealingError {
  constructor(message: string, context: HealingErrorContext = {}) {
    super('HEALING_VERIFICATION_FAILED', message, context);
    this.name = 'HealingVerificationFailedError';
  }
}

export class GoldenCaptureFailedError extends HealingError {
  constructor(locator: string, context: HealingErrorContext = {}) {
    super('GOLDEN_CAPTURE_FAILED', `Could not capture golden reference, no element matches: ${locator}`, {
      ...context,
      locator,
    });
    this.name = 'GoldenCaptureFailedError';
  }
}

export class DriverError extends HealingError {
  constructor(message: string, cause: unknown, context: HealingErrorContext = {}) {
    super('DRIVER_ERROR', message, context, { cause });
    this.name = 'DriverError';
  }
}

export class RankerError extends HealingError {
  constructor(message: string, cause: unknown, context: HealingErrorContext = {}) {
    super('RANKER_ERROR', message, context, { cause });
    this.name = 'RankerError';
  }
}

export class PersistenceError extends HealingError {
  constructor(message: string, cause: unknown, context: HealingErrorContext = {}) {
    super('PERSISTENCE_ERROR', message, context, { cause });
    this.name = 'PersistenceError';
  }
}

// ============================================
// TAGGED OUTCOME
// ============================================

export type Outcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'recoverable'; reason: string }
  | { status: 'fatal'; error: HealingError };

export function ok<T>(value: T): Outcome<T> {
  return { status: 'ok', value };
}

export function recoverable<T>(reason: string): Outcome<T> {
  return { status: 'recoverable', reason };
}

export function fatal<T>(error: HealingError): Outcome<T> {
  return { status: 'fatal', error };
}

export function isHealingError(error: unknown): error is HealingError {
  return error instanceof HealingError;
}

/**
 * Extraction Errors
 *
 * Framework and semantic misses are not errors: they are `undetermined`
 * results that drive tier fallback. Only malformed input and the
 * exhaustion of every tier surface to the caller.
 */

import type { ExtractionState, ExtractionTier } from '../types/extraction.js';
import { malformedInputMessage, noContentFoundMessage } from '../utils/error-messages.js';

export type ExtractionErrorCode = 'MALFORMED_INPUT' | 'NO_CONTENT_FOUND';

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'ExtractionError';
  }
}

/**
 * Empty or non-document input. Raised before any tier runs.
 */
export class MalformedInputError extends ExtractionError {
  readonly reason: string;

  constructor(reason: string) {
    super('MALFORMED_INPUT', malformedInputMessage(reason));
    this.reason = reason;
    this.name = 'MalformedInputError';
  }
}

export interface NoContentFoundDetails {
  sourceUrl?: string;
  warnings: string[];
  tiersAttempted: ExtractionTier[];
  trace: ExtractionState[];
}

/**
 * Every discovery tier was exhausted without a candidate root.
 */
export class NoContentFoundError extends ExtractionError {
  /** Nothing is pruned when no root was found */
  readonly removedSubtrees = 0;
  readonly warnings: string[];
  readonly tiersAttempted: ExtractionTier[];
  readonly trace: ExtractionState[];

  constructor(details: NoContentFoundDetails) {
    super('NO_CONTENT_FOUND', noContentFoundMessage(details.sourceUrl));
    this.warnings = details.warnings;
    this.tiersAttempted = details.tiersAttempted;
    this.trace = details.trace;
    this.name = 'NoContentFoundError';
  }
}

export function isExtractionError(error: unknown): error is ExtractionError {
  return error instanceof ExtractionError;
}

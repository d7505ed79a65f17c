/**
 * Standardized error types for kbrank.
 *
 * All errors extend from KbrankError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Failure policy
 *
 * The retrieval pipeline absorbs most of these and turns them into degraded
 * results. Only `NoResultsError`, `ValidationError` and `CancelledError`
 * reach the caller of `answerContext`.
 *
 * ```typescript
 * import { RetrievalError } from './errors.js';
 *
 * try {
 *   await index.search(kbId, embedding, 10);
 * } catch (err) {
 *   throw new RetrievalError(`Vector search failed for ${kbId}`, 'VECTOR_SEARCH_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all kbrank errors.
 */
export class KbrankError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof KbrankError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the knowledge-base store.
 *
 * Common codes:
 * - `DB_QUERY_FAILED`: Query execution failed
 * - `KB_EXISTS`: Knowledge base already registered
 * - `KB_NOT_FOUND`: Knowledge base not registered
 * - `DOCUMENT_INVALID`: Document rejected at indexing time
 */
export class StorageError extends KbrankError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-knowledge-base retrieval failure. Non-fatal: the knowledge base is
 * omitted from the merged context.
 *
 * Common codes:
 * - `INDEX_NOT_FOUND`: Knowledge base has no index
 * - `EMBEDDING_FAILED`: Query embedding failed
 * - `VECTOR_SEARCH_FAILED` / `KEYWORD_SEARCH_FAILED`: Index query failed
 * - `CONNECTION_FAILED`: Index unreachable
 * - `AUTH_FAILED`: Upstream rejected credentials
 * - `MALFORMED_QUERY`: Query could not be expressed against the index
 */
export class RetrievalError extends KbrankError {
  /** Knowledge base the failure belongs to, when known */
  readonly kbId?: string;

  constructor(message: string, code: string, cause?: unknown, kbId?: string) {
    super(message, code, cause);
    this.kbId = kbId;
  }
}

/**
 * Reranker failure. Non-fatal: the fused order is used instead.
 *
 * Common codes:
 * - `RERANK_FAILED`: Upstream call failed
 * - `RERANK_BAD_RESPONSE`: Response did not cover every candidate exactly once
 * - `AUTH_FAILED`: Upstream rejected credentials
 */
export class RerankError extends KbrankError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Omission recorded for a knowledge base that produced no usable result.
 */
export interface KbOmission {
  kbId: string;
  code: string;
  reason: string;
}

/**
 * Every selected knowledge base failed or returned zero candidates.
 */
export class NoResultsError extends KbrankError {
  readonly omissions: KbOmission[];

  constructor(message: string, omissions: KbOmission[] = [], cause?: unknown) {
    super(message, 'NO_RESULTS', cause);
    this.omissions = omissions;
  }
}

/**
 * A call or stage exceeded its time allowance.
 *
 * Common codes:
 * - `TIMEOUT`: Per-call timeout elapsed
 * - `DEADLINE_EXCEEDED`: The request's end-to-end deadline elapsed
 */
export class TimeoutError extends KbrankError {
  readonly timeoutMs: number;

  constructor(message: string, code: 'TIMEOUT' | 'DEADLINE_EXCEEDED', timeoutMs: number) {
    super(message, code);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The caller cancelled the request.
 */
export class CancelledError extends KbrankError {
  constructor(message: string = 'Request cancelled', cause?: unknown) {
    super(message, 'REQUEST_CANCELLED', cause);
  }
}

/**
 * Invalid request parameters.
 *
 * Common codes:
 * - `INVALID_QUERY`
 * - `INVALID_KB_SELECTION`
 * - `INVALID_TOP_K`
 */
export class ValidationError extends KbrankError {
  constructor(message: string, code: string) {
    super(message, code);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_VALUE`: Field value is invalid
 */
export class ConfigError extends KbrankError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a kbrank error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof KbrankError && error.code === code;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isRerankError(error: unknown): error is RerankError {
  return error instanceof RerankError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a KbrankError.
 *
 * If the error is already a KbrankError, returns it unchanged.
 * Otherwise wraps it in a new KbrankError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): KbrankError {
  if (error instanceof KbrankError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new KbrankError(errorMessage, 'UNKNOWN', error);
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Code of a kbrank error, or 'UNKNOWN' for anything else.
 */
export function errorCode(error: unknown): string {
  return error instanceof KbrankError ? error.code : 'UNKNOWN';
}

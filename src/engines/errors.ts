/* eslint-disable max-classes-per-file */

import { SourceId } from '../models/tabular-source';

export interface ErrorDetails {
  sourceId?: SourceId;
  operation?: string;
  originalError?: unknown;
  originalStack?: string;
}

export type TabularSourceErrorCode = 'SOURCE_UNAVAILABLE' | 'INVALID_SORT' | 'SOURCE_TIMEOUT';

export class TabularSourceError extends Error {
  public readonly code: TabularSourceErrorCode;
  public readonly details?: ErrorDetails;
  /**
   * Whether repeating the same request may succeed. The engine never
   * retries on its own; this is a hint for the retry affordance.
   */
  public readonly recoverable: boolean;

  constructor(
    message: string,
    code: TabularSourceErrorCode,
    details?: ErrorDetails,
    recoverable: boolean = false,
  ) {
    super(message);
    this.name = 'TabularSourceError';
    this.code = code;
    this.details = details;
    this.recoverable = recoverable;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    // If we have an original error, append its stack trace to ours
    if (details?.originalError instanceof Error && details.originalError.stack) {
      this.stack = `${this.stack}\nCaused by:\n${details.originalError.stack}`;
    } else if (details?.originalStack) {
      this.stack = `${this.stack}\nCaused by:\n${details.originalStack}`;
    }
  }
}

/**
 * The source is closed, was never opened or can't be reached.
 */
export class SourceUnavailableError extends TabularSourceError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, 'SOURCE_UNAVAILABLE', details, false);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * The requested sort column is out of schema bounds or its type can't be ordered.
 */
export class InvalidSortError extends TabularSourceError {
  public readonly columnIndex: number;
  public readonly reason: string;

  constructor(columnIndex: number, reason: string, details?: ErrorDetails) {
    super(`Cannot sort by column ${columnIndex}: ${reason}`, 'INVALID_SORT', details, false);
    this.name = 'InvalidSortError';
    this.columnIndex = columnIndex;
    this.reason = reason;
  }
}

export class SourceTimeoutError extends TabularSourceError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, details?: ErrorDetails) {
    super(
      `${details?.operation ?? 'Operation'} timed out after ${timeoutMs}ms`,
      'SOURCE_TIMEOUT',
      details,
      true,
    );
    this.name = 'SourceTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A background task that was cancelled before it produced a result.
 */
export class CancelledOperation extends Error {
  private readonly reason: string;

  constructor(reason: string) {
    super(`Operation cancelled: ${reason}`);
    this.name = 'CancelledOperation';
    this.reason = reason;
  }

  /**
   * User friendly message with the reason for the cancellation.
   */
  public get cancellationReason(): string {
    return this.reason;
  }
}

/**
 * Wraps anything an adapter threw into the engine taxonomy. Errors that
 * already belong to it pass through untouched.
 */
export function toTabularSourceError(
  error: unknown,
  details: Omit<ErrorDetails, 'originalError'>,
): TabularSourceError {
  if (error instanceof TabularSourceError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new SourceUnavailableError(
    `${details.operation ?? 'Source operation'} failed: ${message}`,
    { ...details, originalError: error },
  );
}

/**
 * Plain form of an error thrown inside a worker thread, as posted back to
 * the pool.
 */
export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: TabularSourceErrorCode;
  columnIndex?: number;
  reason?: string;
  timeoutMs?: number;
}

export function serializeError(error: unknown): SerializedError {
  if (!(error instanceof Error)) {
    return { name: 'Error', message: String(error) };
  }

  const serialized: SerializedError = { name: error.name, message: error.message, stack: error.stack };

  if (error instanceof InvalidSortError) {
    return { ...serialized, code: error.code, columnIndex: error.columnIndex, reason: error.reason };
  }
  if (error instanceof SourceTimeoutError) {
    return { ...serialized, code: error.code, timeoutMs: error.timeoutMs };
  }
  if (error instanceof TabularSourceError) {
    return { ...serialized, code: error.code };
  }

  return serialized;
}

/**
 * Rebuilds a worker error on the calling thread. Engine taxonomy errors
 * come back as their own class, anything else as a plain `Error`.
 */
export function deserializeError(
  serialized: SerializedError,
  details: Omit<ErrorDetails, 'originalError' | 'originalStack'> = {},
): Error {
  const withStack = { ...details, originalStack: serialized.stack };

  switch (serialized.code) {
    case 'INVALID_SORT':
      return new InvalidSortError(
        serialized.columnIndex ?? -1,
        serialized.reason ?? serialized.message,
        withStack,
      );
    case 'SOURCE_TIMEOUT':
      return new SourceTimeoutError(serialized.timeoutMs ?? 0, withStack);
    case 'SOURCE_UNAVAILABLE':
      return new SourceUnavailableError(serialized.message, withStack);
    case undefined: {
      const error = new Error(serialized.message);
      error.name = serialized.name;
      if (serialized.stack) {
        error.stack = serialized.stack;
      }
      return error;
    }
    default: {
      const _: never = serialized.code;
      return _;
    }
  }
}

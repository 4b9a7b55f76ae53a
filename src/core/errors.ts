/**
 * Error Taxonomy
 *
 * Categorized errors for proper handling:
 * - Retryable: transient source or reasoning failures, retried with backoff
 * - NonRetryable: argument mistakes, missing references and undecodable output,
 *   reported back into the conversation or surfaced to the caller
 */

// =============================================================================
// BASE ERRORS
// =============================================================================

export interface ErrorJSON {
  name: string;
  code: string;
  message: string;
  retryable: boolean;
  details?: Record<string, unknown>;
}

export abstract class AnalystAgentError extends Error {
  abstract readonly retryable: boolean;
  abstract readonly code: string;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): ErrorJSON {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// =============================================================================
// RETRYABLE ERRORS - System should retry automatically
// =============================================================================

export abstract class RetryableError extends AnalystAgentError {
  readonly retryable = true;

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    details?: Record<string, unknown>
  ) {
    super(message, details);
  }
}

export class SourceUnavailableError extends RetryableError {
  readonly code = 'SOURCE_UNAVAILABLE';

  constructor(source: string, reason: string, statusCode?: number) {
    super(`${source} unavailable: ${reason}`, undefined, { source, reason, statusCode });
  }
}

export class TimeoutError extends RetryableError {
  readonly code = 'TIMEOUT';

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, undefined, { operation, timeoutMs });
  }
}

export class RateLimitError extends RetryableError {
  readonly code = 'RATE_LIMITED';

  constructor(source: string, retryAfterMs?: number) {
    super(
      retryAfterMs !== undefined
        ? `${source} rate limited, retry after ${retryAfterMs}ms`
        : `${source} rate limited`,
      retryAfterMs,
      { source }
    );
  }
}

// =============================================================================
// NON-RETRYABLE ERRORS
// =============================================================================

export abstract class NonRetryableError extends AnalystAgentError {
  readonly retryable = false;
}

export type ResourceType = 'dataset' | 'tool' | 'session' | 'result' | 'artifact' | 'item';

export class NotFoundError extends NonRetryableError {
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly resource: ResourceType,
    public readonly identifier: string
  ) {
    super(`${resource} not found: ${identifier}`, { resource, identifier });
  }
}

export class QueryError extends NonRetryableError {
  readonly code = 'QUERY_ERROR';

  constructor(message: string, public readonly clause: string) {
    super(`${message} (in: ${clause})`, { clause });
  }
}

export class RenderError extends NonRetryableError {
  readonly code = 'RENDER_ERROR';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
  }
}

export class ParseError extends NonRetryableError {
  readonly code = 'PARSE_ERROR';

  constructor(fileName: string, reason: string) {
    super(`Cannot parse ${fileName}: ${reason}`, { fileName, reason });
  }
}

export class MalformedResponseError extends NonRetryableError {
  readonly code = 'MALFORMED_RESPONSE';

  constructor(public readonly reason: string, details?: Record<string, unknown>) {
    super(`Malformed reasoning response: ${reason}`, { reason, ...details });
  }
}

export class InvalidInputError extends NonRetryableError {
  readonly code = 'INVALID_INPUT';

  constructor(message: string, public readonly validationErrors?: string[]) {
    super(message, { validationErrors });
  }
}

export class SessionBusyError extends NonRetryableError {
  readonly code = 'SESSION_BUSY';

  constructor(sessionId: string) {
    super(`Session ${sessionId} is already processing a message`, { sessionId });
  }
}

export class SessionCancelledError extends NonRetryableError {
  readonly code = 'SESSION_CANCELLED';

  constructor(sessionId: string) {
    super(`Session ${sessionId} was cancelled`, { sessionId });
  }
}

export class TurnBudgetExceededError extends NonRetryableError {
  readonly code = 'TURN_BUDGET_EXCEEDED';

  constructor(public readonly budget: number) {
    super(`Turn budget of ${budget} exhausted`, { budget });
  }
}

class UnknownError extends NonRetryableError {
  readonly code = 'UNKNOWN_ERROR';
}

// =============================================================================
// ERROR UTILITIES
// =============================================================================

export function isRetryable(error: unknown): error is RetryableError {
  return error instanceof RetryableError;
}

export function isNonRetryable(error: unknown): error is NonRetryableError {
  return error instanceof NonRetryableError;
}

export interface RetryDelayOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
}

/**
 * Exponential backoff delay for the given 1-based attempt.
 */
export function getRetryDelay(
  error: RetryableError,
  attempt: number,
  options: RetryDelayOptions = {}
): number {
  const baseDelay = error.retryAfterMs ?? options.baseDelayMs ?? 1000;
  const maxDelay = options.maxDelayMs ?? 60000;
  const exponentialDelay = baseDelay * Math.pow(2, attempt - 1);
  const jitter = options.jitter === false ? 0 : Math.random() * 0.3 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, maxDelay);
}

export function wrapError(error: unknown, context?: string): AnalystAgentError {
  if (error instanceof AnalystAgentError) {
    return error;
  }

  if (error instanceof Error) {
    if (error.message.includes('ECONNREFUSED') || error.message.includes('ENOTFOUND') || error.message.includes('ECONNRESET')) {
      return new SourceUnavailableError(context ?? 'network', error.message);
    }

    return new UnknownError(`${context ? context + ': ' : ''}${error.message}`, { originalError: error.name });
  }

  return new UnknownError(`Unknown error: ${String(error)}`);
}

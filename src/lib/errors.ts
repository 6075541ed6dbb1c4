/**
 * Error taxonomy for a digest run.
 *
 * ConfigError and LlmAuthError abort the whole run. Everything else is
 * scoped to one paper at one stage and ends up in the run's failure list.
 */

export class ConfigError extends Error {
  override name = 'ConfigError';
}

export class LlmAuthError extends Error {
  override name = 'LlmAuthError';

  constructor(message: string, readonly status: number) {
    super(message);
  }
}

export interface LlmRequestErrorInit {
  retryable: boolean;
  status?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

export class LlmRequestError extends Error {
  override name = 'LlmRequestError';
  readonly retryable: boolean;
  readonly status: number | undefined;
  readonly retryAfterMs: number | undefined;

  constructor(message: string, init: LlmRequestErrorInit) {
    super(message, init.cause === undefined ? undefined : { cause: init.cause });
    this.retryable = init.retryable;
    this.status = init.status;
    this.retryAfterMs = init.retryAfterMs;
  }
}

export class ScoreParseError extends Error {
  override name = 'ScoreParseError';

  constructor(readonly response: string) {
    super(`Relevance score is not one of 0, 1, 2: ${JSON.stringify(response)}`);
  }
}

export class EmptyCompletionError extends Error {
  override name = 'EmptyCompletionError';
}

export class RetryExhaustedError extends Error {
  override name = 'RetryExhaustedError';

  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`, { cause: lastError });
  }
}

export class WebhookError extends Error {
  override name = 'WebhookError';

  constructor(message: string, readonly status?: number) {
    super(message);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Errors that must stop the run instead of being recorded against one paper. */
export function isFatal(e: unknown): boolean {
  return e instanceof ConfigError || e instanceof LlmAuthError;
}

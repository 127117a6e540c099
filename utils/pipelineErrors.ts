// utils/pipelineErrors.ts
import AppError from './AppError';

export type ErrorKind =
  | 'insufficient_content'
  | 'response_parsing'
  | 'quota_exceeded'
  | 'auth_failure'
  | 'model_unavailable'
  | 'timeout'
  | 'provider_error'
  | 'persistence'
  | 'delivery_failure'
  | 'invalid_transition';

/**
 * Every failure the newsletter pipeline can report.
 * `retryable` drives the attempt loop: false stops it immediately.
 */
export class PipelineError extends AppError {
  public readonly errorKind: ErrorKind;
  public readonly retryable: boolean;

  constructor(message: string, errorKind: ErrorKind, retryable: boolean, statusCode: number) {
    super(message, statusCode, errorKind.toUpperCase());
    this.errorKind = errorKind;
    this.retryable = retryable;
  }
}

export class InsufficientContentError extends PipelineError {
  public readonly messageCount: number;

  constructor(messageCount: number, required: number) {
    super(
      `Only ${messageCount} qualifying messages found, at least ${required} are needed`,
      'insufficient_content',
      false,
      422
    );
    this.messageCount = messageCount;
  }
}

// Recovered inside the stage that raised it; never reaches the attempt loop.
export class ResponseParsingError extends PipelineError {
  constructor(message: string) {
    super(message, 'response_parsing', false, 502);
  }
}

// --- PROVIDER ERRORS ---

export class ProviderError extends PipelineError {
  public readonly provider: string;

  constructor(provider: string, message: string, errorKind: ErrorKind, retryable: boolean, statusCode: number) {
    super(`[${provider}] ${message}`, errorKind, retryable, statusCode);
    this.provider = provider;
  }
}

export class QuotaExceededError extends ProviderError {
  constructor(provider: string, message = 'Rate limit or quota exceeded') {
    super(provider, message, 'quota_exceeded', true, 429);
  }
}

export class AuthFailureError extends ProviderError {
  constructor(provider: string, message = 'Authentication failed') {
    super(provider, message, 'auth_failure', false, 502);
  }
}

export class ModelUnavailableError extends ProviderError {
  constructor(provider: string, message = 'Requested model is not available') {
    super(provider, message, 'model_unavailable', false, 503);
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(provider: string, message = 'Request timed out') {
    super(provider, message, 'timeout', true, 504);
  }
}

export class GenericProviderError extends ProviderError {
  constructor(provider: string, message: string) {
    super(provider, message, 'provider_error', true, 502);
  }
}

// --- STORAGE / LIFECYCLE ---

export class PersistenceError extends PipelineError {
  constructor(message: string) {
    super(message, 'persistence', false, 500);
  }
}

export class DeliveryError extends PipelineError {
  constructor(message: string) {
    super(message, 'delivery_failure', false, 502);
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: string, action: string) {
    super(`Cannot ${action} a newsletter in status "${from}"`, 'invalid_transition', false, 409);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Normalizes anything thrown by a stage. Unknown errors count as
 * transient provider failures.
 */
export const toPipelineError = (error: unknown, provider = 'pipeline'): PipelineError => {
  if (error instanceof PipelineError) return error;
  return new GenericProviderError(provider, describeError(error));
};

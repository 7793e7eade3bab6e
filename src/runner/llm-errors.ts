import { EngineError } from './errors.ts';

/**
 * Standardized error for generative-text provider failures.
 */
export class ProviderError extends EngineError {
  readonly kind = 'provider' as const;
  public readonly retryAfterMs?: number;

  constructor(
    public readonly provider: string,
    public readonly statusCode: number,
    message: string,
    public readonly retryable = false,
    retryAfterMs?: number
  ) {
    super(`[${provider}] API error (${statusCode}): ${message}`);
    this.name = 'ProviderError';
    this.retryAfterMs = retryAfterMs;
  }

  /**
   * 408, 409, 429 and 5xx are worth another attempt.
   */
  static isRetryableStatus(statusCode: number): boolean {
    return statusCode === 408 || statusCode === 409 || statusCode === 429 || statusCode >= 500;
  }

  /**
   * Parse a Retry-After header value given in seconds.
   */
  static parseRetryAfter(value: string | undefined | null): number | undefined {
    if (!value) return undefined;
    const seconds = Number.parseInt(value, 10);
    return Number.isNaN(seconds) ? undefined : seconds * 1000;
  }
}

/**
 * Centralized constants for timeouts, limits, and defaults.
 */

/** Timeout values in milliseconds */
export const TIMEOUTS = {
  /** Default base delay for retry backoff */
  DEFAULT_RETRY_BASE_DELAY_MS: 1000,
} as const;

/** Limit values for various operations */
export const LIMITS = {
  /** Maximum string length for CLI input values */
  MAX_INPUT_STRING_LENGTH: 100_000,
  /** Maximum depth for balanced brace matching in JSON parser */
  MAX_JSON_BRACE_DEPTH: 100,
  /** Maximum string length to attempt JSON extraction from */
  MAX_JSON_PARSE_LENGTH: 1_000_000,
  /** Standard length for error message truncation in logs */
  ERROR_MESSAGE_TRUNCATE_LENGTH: 500,
  /** Upper bound on validation retries per generative call */
  MAX_VALIDATION_RETRIES: 10,
  /** Nesting depth for collection/conditional sub-pipelines */
  MAX_NESTING_DEPTH: 16,
} as const;

/** Defaults that apply when neither the step nor the config says otherwise */
export const DEFAULTS = {
  TEMPERATURE: 0.7,
  MAX_RETRIES_PER_ITEM: 2,
  VALIDATION_MAX_RETRIES: 3,
  JSON_WRAPPER_INSTRUCTION: 'Please format your response as valid JSON.',
  CONTINUATION_PROMPT:
    'Please continue writing from where you left off. Keep your continuation brief and conclude naturally when you have completed your thought. Do not repeat previous content.',
  AGGREGATE_SEPARATOR: ', ',
} as const;

export function truncate(text: string, max: number = LIMITS.ERROR_MESSAGE_TRUNCATE_LENGTH): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

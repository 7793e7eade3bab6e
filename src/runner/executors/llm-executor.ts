import type { AiCallStep, ValidationConfig } from '../../parser/schema.ts';
import { DEFAULTS, truncate } from '../../utils/constants.ts';
import { extractJson, extractWithPattern } from '../../utils/json-parser.ts';
import { CancelledError, ValidationError, recordSpend } from '../errors.ts';
import type { LLMMessage, ProviderResponse, ProviderUsage } from '../llm-adapter.ts';
import { ProviderError } from '../llm-errors.ts';
import type { OutputValidator, ValidationOutcome } from '../output-validator.ts';
import { withRetry } from '../retry.ts';
import { TimeoutError, withTimeout } from '../timeout.ts';
import type { ExecutionContext } from '../workflow-state.ts';
import {
  type ExecutionEnv,
  type StructuredResult,
  type TextResult,
  type Usage,
  addUsage,
  emptyUsage,
  indent,
} from './types.ts';

interface Generation {
  text: string;
  finishReason: ProviderResponse['finish_reason'];
}

function toUsage(usage: ProviderUsage): Usage {
  return {
    prompt_tokens: usage.prompt_tokens,
    completion_tokens: usage.completion_tokens,
    total_tokens: usage.prompt_tokens + usage.completion_tokens,
    cost_estimate: usage.cost_estimate,
  };
}

/**
 * Validate the text as-is, then whatever `extract_json_pattern` pulls out of it.
 */
function checkOutput(
  text: string,
  validator: OutputValidator,
  extractPattern?: string
): ValidationOutcome {
  const outcome = validator.validate(text);
  if (outcome.valid || extractPattern === undefined) return outcome;

  const extracted = extractWithPattern(text, extractPattern);
  if (extracted === undefined) return outcome;
  const retried = validator.validate(extracted);
  return retried.valid ? retried : outcome;
}

/** Fenced block or balanced braces, else the raw text */
function bestEffortValue(text: string): unknown {
  try {
    return extractJson(text);
  } catch {
    return text;
  }
}

/**
 * Runs one `ai_call` step. Holds the call counters for a single execution,
 * so a fresh instance is created per step.
 */
class GenerativeCall {
  private usage = emptyUsage();
  private calls = 0;

  constructor(
    private readonly step: AiCallStep,
    private readonly env: ExecutionEnv
  ) {}

  private get providerName(): string {
    return this.step.provider ?? this.env.config.default_provider;
  }

  /**
   * One provider round-trip with timeout and transient-error retries.
   * Each attempt gets its own abort controller so a timed-out call is torn down.
   */
  private async invokeOnce(messages: LLMMessage[]): Promise<ProviderResponse> {
    const { step, env } = this;
    const timeoutMs = step.timeout ?? env.config.timeout_per_step * 1000;
    const retry = env.config.provider_retry;

    const attempt = async (): Promise<ProviderResponse> => {
      const controller = new AbortController();
      const onAbort = () => controller.abort();
      env.signal.addEventListener('abort', onAbort, { once: true });
      try {
        const response = await withTimeout(
          env.provider.invoke(messages, {
            model: step.model,
            provider: step.provider,
            temperature: step.temperature,
            max_tokens: step.max_tokens,
            signal: controller.signal,
            extra: step.ai_params,
          }),
          timeoutMs,
          `Provider call for step ${step.id}`
        );
        this.calls++;
        this.usage = addUsage(this.usage, toUsage(response.usage));
        return response;
      } catch (error) {
        if (error instanceof TimeoutError) controller.abort();
        throw error;
      } finally {
        env.signal.removeEventListener('abort', onAbort);
      }
    };

    try {
      return await withRetry(
        attempt,
        retry,
        (n, error) => {
          env.logger.log(
            `${indent(env)}  ↻ Retry ${n}/${retry.count} for step ${step.id}: ${truncate(error.message)}`
          );
        },
        {
          signal: env.signal,
          shouldRetry: (error) =>
            error instanceof TimeoutError || (error instanceof ProviderError && error.retryable),
          retryAfterMs: (error) => (error instanceof ProviderError ? error.retryAfterMs : undefined),
        }
      );
    } catch (error) {
      if (env.signal.aborted) throw new CancelledError();
      if (error instanceof ProviderError || error instanceof CancelledError) throw error;
      if (error instanceof TimeoutError) {
        throw new ProviderError(this.providerName, 408, error.message, true);
      }
      throw new ProviderError(
        this.providerName,
        0,
        error instanceof Error ? error.message : String(error)
      );
    }
  }

  /**
   * Call the provider and keep asking it to continue while it reports a
   * length cut-off and the continuation budget lasts.
   */
  async generate(prompt: string): Promise<Generation> {
    const { step, env } = this;
    const budget = step.max_auto_retry_attempts ?? env.config.max_auto_retry_attempts;

    let response = await this.invokeOnce([{ role: 'user', content: prompt }]);
    let text = response.text;
    let continuations = 0;

    while (response.finish_reason === 'length' && continuations < budget) {
      continuations++;
      env.logger.log(
        `${indent(env)}  ↪ Response truncated, requesting continuation ${continuations}/${budget}`
      );
      response = await this.invokeOnce([
        { role: 'user', content: prompt },
        { role: 'assistant', content: text },
        { role: 'user', content: DEFAULTS.CONTINUATION_PROMPT },
      ]);
      text += response.text;
    }

    if (response.finish_reason === 'length') {
      env.logger.warn(
        `${indent(env)}  ⚠️  Step ${step.id}: response still truncated after ${continuations} continuation(s)`
      );
    } else if (response.finish_reason === 'content_filter') {
      env.logger.warn(`${indent(env)}  ⚠️  Step ${step.id}: response stopped by content filter`);
    }

    return { text, finishReason: response.finish_reason };
  }

  async validated(prompt: string, validation: ValidationConfig): Promise<StructuredResult> {
    const { step, env } = this;
    const validator = env.validators.forConfig(validation);
    const basePrompt = validation.force_json_output
      ? `${prompt}\n\n${validation.json_wrapper_instruction}`
      : prompt;
    const maxAttempts = validation.max_retries + 1;

    let currentPrompt = basePrompt;
    let lastText = '';
    let errors: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const { text } = await this.generate(currentPrompt);
      lastText = text;

      const outcome = checkOutput(text, validator, validation.extract_json_pattern);
      if (outcome.valid) {
        return this.result({
          kind: 'structured',
          output: outcome.value,
          validation: { valid: true, attempts: attempt, errors: [] },
        });
      }

      errors = outcome.errors;
      if (attempt < maxAttempts) {
        env.logger.log(
          `${indent(env)}  ↻ Validation failed for step ${step.id} (attempt ${attempt}/${maxAttempts}): ${truncate(errors.join('; '))}`
        );
        const suffix = validator.retrySuffix(errors);
        currentPrompt = validation.retry_prompt
          ? `${basePrompt}\n\n${validation.retry_prompt}\n\n${suffix}`
          : `${basePrompt}\n\n${suffix}`;
      }
    }

    if (validation.allow_partial_success) {
      env.logger.warn(
        `${indent(env)}  ⚠️  Step ${step.id}: returning unvalidated output after ${maxAttempts} attempt(s)`
      );
      return this.result({
        kind: 'structured',
        output: bestEffortValue(lastText),
        validation: { valid: false, attempts: maxAttempts, errors },
      });
    }

    throw new ValidationError(
      `Output failed validation after ${maxAttempts} attempt(s): ${truncate(errors.join('; '))}`,
      lastText,
      errors
    );
  }

  result<T extends TextResult | StructuredResult>(result: T): T {
    return { ...result, usage: this.usage, provider_calls: this.calls };
  }

  /** Calls that completed before `error` still count towards the run's usage */
  charge(error: unknown): void {
    if (this.calls > 0) {
      recordSpend(error, { usage: this.usage, provider_calls: this.calls });
    }
  }
}

/**
 * Execute an `ai_call` step
 */
export async function executeLlmStep(
  step: AiCallStep,
  context: ExecutionContext,
  env: ExecutionEnv
): Promise<TextResult | StructuredResult> {
  const prompt = env.evaluator.render(step.prompt, context);
  const call = new GenerativeCall(step, env);

  try {
    if (step.validation) {
      return await call.validated(prompt, step.validation);
    }
    const { text } = await call.generate(prompt);
    return call.result({ kind: 'text', output: text });
  } catch (error) {
    call.charge(error);
    throw error;
  }
}

import { describe, expect, it } from 'vitest';
import type { Config } from '../../parser/config-schema.ts';
import { DEFAULTS } from '../../utils/constants.ts';
import { MockProvider } from '../__test__/mock-provider.ts';
import { createTestEnv, parseStep } from '../__test__/test-env.ts';
import { CancelledError, ValidationError } from '../errors.ts';
import { ProviderError } from '../llm-errors.ts';
import { JsonSchemaValidator } from '../output-validator.ts';
import { executeStep } from '../step-executor.ts';
import { createContext } from '../workflow-state.ts';

function setup(raw: Record<string, unknown>, provider: MockProvider, config?: Partial<Config>) {
  const testEnv = createTestEnv({ provider, config });
  const step = parseStep({ id: 'ask', type: 'ai_call', prompt: 'Hello', ...raw });
  return { ...testEnv, run: () => executeStep(step, createContext({ name: 'Ada' }), testEnv.env) };
}

describe('executeLlmStep', () => {
  it('renders the prompt and reports usage', async () => {
    const provider = new MockProvider();
    const { run } = setup({ prompt: 'Hi ${{ input.name }}', model: 'gpt-4o' }, provider);

    const result = await run();

    expect(result).toEqual({
      kind: 'text',
      output: 'mock response',
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15, cost_estimate: 0.001 },
      provider_calls: 1,
    });
    expect(provider.prompt(0)).toBe('Hi Ada');
    expect(provider.calls[0].params).toMatchObject({
      model: 'gpt-4o',
      temperature: DEFAULTS.TEMPERATURE,
      extra: {},
    });
  });

  describe('auto-continuation', () => {
    it('concatenates continuations while the response is cut off', async () => {
      const provider = MockProvider.scripted(
        { text: 'Hel', finish_reason: 'length' },
        { text: 'lo', finish_reason: 'length' },
        { text: '!' }
      );
      const { run, logger } = setup({}, provider);

      const result = await run();

      expect(result.output).toBe('Hello!');
      expect(result.provider_calls).toBe(3);
      expect(result.usage).toMatchObject({ prompt_tokens: 30, completion_tokens: 15, total_tokens: 45 });
      expect(result.usage?.cost_estimate).toBeCloseTo(0.003);
      expect(provider.calls[2].messages).toEqual([
        { role: 'user', content: 'Hello' },
        { role: 'assistant', content: 'Hello' },
        { role: 'user', content: DEFAULTS.CONTINUATION_PROMPT },
      ]);
      expect(logger.messages('log')).toContain('  ↪ Response truncated, requesting continuation 1/10');
    });

    it('stops at the step budget and warns', async () => {
      const provider = new MockProvider(() => ({ text: 'x', finish_reason: 'length' }));
      const { run, logger } = setup({ max_auto_retry_attempts: 1 }, provider);

      const result = await run();

      expect(result.output).toBe('xx');
      expect(provider.calls).toHaveLength(2);
      expect(logger.messages('warn')).toEqual([
        '  ⚠️  Step ask: response still truncated after 1 continuation(s)',
      ]);
    });

    it('falls back to the configured budget', async () => {
      const provider = new MockProvider(() => ({ text: 'x', finish_reason: 'length' }));
      const { run } = setup({}, provider, { max_auto_retry_attempts: 0 });

      await run();

      expect(provider.calls).toHaveLength(1);
    });

    it('warns when the content filter stops a response', async () => {
      const provider = MockProvider.scripted({ text: 'partial', finish_reason: 'content_filter' });
      const { run, logger } = setup({}, provider);

      expect((await run()).output).toBe('partial');
      expect(logger.messages('warn')).toEqual(['  ⚠️  Step ask: response stopped by content filter']);
    });

    it('stops continuing on any other finish reason while budget remains', async () => {
      const provider = MockProvider.scripted({ text: 'done?', finish_reason: 'other' }, 'never asked');
      const { run, logger } = setup({ max_auto_retry_attempts: 3 }, provider);

      const result = await run();

      expect(result).toMatchObject({ output: 'done?', provider_calls: 1 });
      expect(provider.calls).toHaveLength(1);
      expect(logger.messages('warn')).toEqual([]);
    });
  });

  describe('validation', () => {
    const schema = { type: 'object', required: ['name'] };

    it('retries with the failure appended until the output validates', async () => {
      const provider = MockProvider.scripted('not json', '{"name":"Ada"}');
      const { run, logger } = setup({ validation: { schema } }, provider);

      const result = await run();

      expect(result).toMatchObject({
        kind: 'structured',
        output: { name: 'Ada' },
        validation: { valid: true, attempts: 2, errors: [] },
        provider_calls: 2,
      });
      expect(provider.prompt(1)?.startsWith('Hello\n\nPrevious response failed validation: Invalid JSON')).toBe(
        true
      );
      expect(logger.messages('log').some((line) => line.startsWith('  ↻ Validation failed for step ask (attempt 1/4)'))).toBe(
        true
      );
    });

    it('fails after the last attempt', async () => {
      const provider = MockProvider.scripted('{"age":3}');
      const { run } = setup({ validation: { schema, max_retries: 0 } }, provider);

      const error = await run().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        message: "Output failed validation after 1 attempt(s): (root): must have required property 'name'",
        output: '{"age":3}',
      });
      expect(provider.calls).toHaveLength(1);
    });

    it('places a custom retry prompt before the failure details', async () => {
      const provider = MockProvider.scripted('nope', '{}');
      const { run } = setup({ validation: { validator: 'json', retry_prompt: 'Fix it' } }, provider);

      await run();

      const validator = new JsonSchemaValidator();
      const outcome = validator.validate('nope');
      const errors = outcome.valid ? [] : outcome.errors;
      expect(provider.prompt(1)).toBe(`Hello\n\nFix it\n\n${validator.retrySuffix(errors)}`);
    });

    it('asks for JSON when force_json_output is set', async () => {
      const provider = MockProvider.scripted('[1]');
      const { run } = setup({ validation: { validator: 'json', force_json_output: true } }, provider);

      expect((await run()).output).toEqual([1]);
      expect(provider.prompt(0)).toBe(`Hello\n\n${DEFAULTS.JSON_WRAPPER_INSTRUCTION}`);
    });

    it('validates what extract_json_pattern captures', async () => {
      const provider = MockProvider.scripted('Sure:\n```json\n{"a":1}\n```');
      const { run } = setup(
        { validation: { validator: 'json', extract_json_pattern: '```json\\s*(.*?)```' } },
        provider
      );

      expect((await run()).output).toEqual({ a: 1 });
      expect(provider.calls).toHaveLength(1);
    });

    it('returns the best-effort value with allow_partial_success', async () => {
      const provider = MockProvider.scripted('bad', 'Here: {"a": 1} done');
      const { run, logger } = setup(
        { validation: { schema, max_retries: 1, allow_partial_success: true } },
        provider
      );

      const result = await run();

      expect(result).toMatchObject({
        kind: 'structured',
        output: { a: 1 },
        validation: { valid: false, attempts: 2 },
      });
      expect(logger.messages('warn')).toEqual([
        '  ⚠️  Step ask: returning unvalidated output after 2 attempt(s)',
      ]);
    });
  });

  describe('provider failures', () => {
    const retryTwice = { provider_retry: { count: 2, backoff: 'exponential' as const, baseDelay: 0 } };

    it('retries transient errors and counts only the successful call', async () => {
      const provider = MockProvider.scripted(
        { error: new ProviderError('openai', 503, 'busy', true) },
        'ok'
      );
      const { run, logger } = setup({}, provider, retryTwice);

      const result = await run();

      expect(result).toMatchObject({ output: 'ok', provider_calls: 1 });
      expect(provider.calls).toHaveLength(2);
      expect(logger.messages('log')).toContain(
        '  ↻ Retry 1/2 for step ask: [openai] API error (503): busy'
      );
    });

    it('does not retry a non-retryable error', async () => {
      const provider = MockProvider.scripted({ error: new ProviderError('openai', 401, 'bad key') });
      const { run } = setup({}, provider, retryTwice);

      await expect(run()).rejects.toMatchObject({ statusCode: 401, retryable: false });
      expect(provider.calls).toHaveLength(1);
    });

    it('wraps unexpected errors as provider errors', async () => {
      const provider = MockProvider.scripted({ error: new Error('boom') });
      const { run } = setup({}, provider);

      const error = await run().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ message: '[openai] API error (0): boom' });
    });

    it('turns a timeout into a retryable 408', async () => {
      const provider = MockProvider.scripted({ text: 'late', delayMs: 1000 });
      const { run } = setup({ timeout: 20 }, provider);

      await expect(run()).rejects.toMatchObject({ statusCode: 408, retryable: true });
      expect(provider.calls[0].params.signal?.aborted).toBe(true);
    });

    it('cancels an in-flight call when the run is aborted', async () => {
      const provider = MockProvider.scripted({ text: 'late', delayMs: 1000 });
      const { run, controller } = setup({}, provider);

      const pending = run();
      setTimeout(() => controller.abort(), 10);

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
  });
});

import { createAnthropic } from '@ai-sdk/anthropic';
import { createOpenAI } from '@ai-sdk/openai';
import { APICallError, type LanguageModel, type ModelMessage, generateText } from 'ai';
import { z } from 'zod';
import type { Config, ProviderConfig } from '../parser/config-schema.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { CancelledError } from './errors.ts';
import { ProviderError } from './llm-errors.ts';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'other';

export interface ProviderUsage {
  prompt_tokens: number;
  completion_tokens: number;
  cost_estimate: number;
}

export interface ProviderResponse {
  text: string;
  finish_reason: FinishReason;
  usage: ProviderUsage;
}

export interface InvokeParams {
  model?: string;
  /** Provider name from the step; used when the model name does not decide it */
  provider?: string;
  temperature?: number;
  max_tokens?: number;
  signal?: AbortSignal;
  /** Step `ai_params`, passed through */
  extra?: Record<string, unknown>;
}

/**
 * The only surface the engine calls to reach a generative-text backend.
 */
export interface Provider {
  invoke(messages: LLMMessage[], params: InvokeParams): Promise<ProviderResponse>;
}

// --- AI SDK implementation ---

export interface GenerateRequest {
  model: LanguageModel;
  messages: ModelMessage[];
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  topK?: number;
  presencePenalty?: number;
  frequencyPenalty?: number;
  stopSequences?: string[];
  seed?: number;
  abortSignal?: AbortSignal;
  maxRetries: number;
}

export interface GenerateResult {
  text: string;
  finishReason: string;
  usage: { inputTokens?: number; outputTokens?: number };
}

export type GenerateFn = (request: GenerateRequest) => Promise<GenerateResult>;

const defaultGenerate: GenerateFn = (request) => generateText(request);

/** `ai_params` keys the AI SDK understands, in workflow spelling */
const AiParamsSchema = z
  .object({
    top_p: z.number().optional(),
    top_k: z.number().optional(),
    presence_penalty: z.number().optional(),
    frequency_penalty: z.number().optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    seed: z.number().int().optional(),
  })
  .passthrough();

export function mapFinishReason(reason: string): FinishReason {
  switch (reason) {
    case 'stop':
    case 'length':
      return reason;
    case 'content-filter':
      return 'content_filter';
    default:
      return 'other';
  }
}

export function estimateCost(
  usage: { prompt_tokens: number; completion_tokens: number },
  pricing?: ProviderConfig['pricing']
): number {
  if (!pricing) return 0;
  return (
    (usage.prompt_tokens * pricing.input_per_million +
      usage.completion_tokens * pricing.output_per_million) /
    1_000_000
  );
}

function toModelMessage(message: LLMMessage): ModelMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export interface ResolvedModel {
  providerName: string;
  providerConfig: ProviderConfig;
  modelId: string;
}

/**
 * Provider backed by the AI SDK. OpenAI and Anthropic provider types are
 * built from config; the API key is read from `api_key_env`.
 */
export class AiSdkProvider implements Provider {
  private readonly models = new Map<string, (modelId: string) => LanguageModel>();

  constructor(
    private readonly config: Config,
    private readonly generate: GenerateFn = defaultGenerate
  ) {}

  /**
   * Resolution order: `provider:` prefix, `model_mappings`, the step's
   * provider, then `default_provider`.
   */
  resolve(model: string | undefined, provider: string | undefined): ResolvedModel {
    const stepProvider = provider ? this.config.providers[provider] : undefined;
    const modelName = model ?? stepProvider?.default_model ?? this.config.default_model;
    const providerName = ConfigLoader.getProviderForModel(
      modelName,
      this.config,
      provider ?? this.config.default_provider
    );

    const providerConfig = this.config.providers[providerName];
    if (!providerConfig) {
      throw new ProviderError(
        providerName,
        0,
        `Provider configuration not found for: ${providerName}. Define it under "providers" in your configuration.`
      );
    }

    let modelId = modelName;
    const prefix = `${providerName}:`;
    if (modelName.startsWith(prefix)) {
      modelId = modelName.slice(prefix.length);
    }
    return { providerName, providerConfig, modelId };
  }

  private languageModel(resolved: ResolvedModel): LanguageModel {
    let factory = this.models.get(resolved.providerName);
    if (!factory) {
      const { providerConfig } = resolved;
      const options = {
        apiKey: providerConfig.api_key_env
          ? ConfigLoader.getSecret(providerConfig.api_key_env)
          : undefined,
        baseURL: providerConfig.base_url,
      };
      factory =
        providerConfig.type === 'anthropic' ? createAnthropic(options) : createOpenAI(options);
      this.models.set(resolved.providerName, factory);
    }
    return factory(resolved.modelId);
  }

  async invoke(messages: LLMMessage[], params: InvokeParams): Promise<ProviderResponse> {
    const resolved = this.resolve(params.model, params.provider);
    const extra = AiParamsSchema.parse(params.extra ?? {});
    const stop = typeof extra.stop === 'string' ? [extra.stop] : extra.stop;

    try {
      const result = await this.generate({
        model: this.languageModel(resolved),
        messages: messages.map(toModelMessage),
        temperature: params.temperature,
        maxOutputTokens: params.max_tokens,
        topP: extra.top_p,
        topK: extra.top_k,
        presencePenalty: extra.presence_penalty,
        frequencyPenalty: extra.frequency_penalty,
        stopSequences: stop,
        seed: extra.seed,
        abortSignal: params.signal,
        // Retries are handled by the executor so they can be logged and bounded by config
        maxRetries: 0,
      });

      const usage = {
        prompt_tokens: result.usage.inputTokens ?? 0,
        completion_tokens: result.usage.outputTokens ?? 0,
      };
      return {
        text: result.text,
        finish_reason: mapFinishReason(result.finishReason),
        usage: { ...usage, cost_estimate: estimateCost(usage, resolved.providerConfig.pricing) },
      };
    } catch (error) {
      throw AiSdkProvider.toProviderError(resolved.providerName, error, params.signal);
    }
  }

  static toProviderError(provider: string, error: unknown, signal?: AbortSignal): Error {
    if (signal?.aborted) return new CancelledError();
    if (error instanceof ProviderError || error instanceof CancelledError) return error;
    if (APICallError.isInstance(error)) {
      const status = error.statusCode ?? 0;
      return new ProviderError(
        provider,
        status,
        error.message,
        error.isRetryable || ProviderError.isRetryableStatus(status),
        ProviderError.parseRetryAfter(error.responseHeaders?.['retry-after'])
      );
    }
    return new ProviderError(provider, 0, error instanceof Error ? error.message : String(error));
  }
}

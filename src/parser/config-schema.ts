import { z } from 'zod';

const ProviderTypeSchema = z.enum(['openai', 'anthropic']);

const ProviderConfigSchema = z.object({
  type: ProviderTypeSchema.default('openai'),
  base_url: z.string().optional(),
  api_key_env: z.string().optional(),
  default_model: z.string().optional(),
  /** USD per million tokens; used for cost_estimate */
  pricing: z
    .object({
      input_per_million: z.number().nonnegative().default(0),
      output_per_million: z.number().nonnegative().default(0),
    })
    .optional(),
});

const RetryPolicySchema = z.object({
  count: z.number().int().min(0).default(3),
  backoff: z.enum(['linear', 'exponential']).default('exponential'),
  baseDelay: z.number().int().min(0).default(1000),
});

export const ConfigSchema = z.object({
  default_provider: z.string().default('openai'),
  default_model: z.string().default('gpt-4o-mini'),
  providers: z.record(ProviderConfigSchema).default({
    openai: {
      type: 'openai',
      api_key_env: 'OPENAI_API_KEY',
      default_model: 'gpt-4o-mini',
    },
    anthropic: {
      type: 'anthropic',
      api_key_env: 'ANTHROPIC_API_KEY',
      default_model: 'claude-3-5-haiku-latest',
    },
  }),
  model_mappings: z.record(z.string()).default({
    'claude-*': 'anthropic',
    'gpt-*': 'openai',
  }),
  /** Seconds allowed for a single provider call */
  timeout_per_step: z.number().positive().default(60),
  max_parallel_ai_calls: z.number().int().positive().default(3),
  max_auto_retry_attempts: z.number().int().min(0).default(10),
  provider_retry: RetryPolicySchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

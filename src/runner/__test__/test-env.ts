/**
 * Builds an ExecutionEnv wired to in-process stand-ins: a MockProvider,
 * a MemoryLogger and an event list. Provider retries are off and instant.
 */
import { DefaultTemplateEvaluator } from '../../expression/template-evaluator.ts';
import { type Config, ConfigSchema } from '../../parser/config-schema.ts';
import { type Step, StepSchema } from '../../parser/schema.ts';
import { MemoryLogger } from '../../utils/logger.ts';
import type { WorkflowEventPayload } from '../events.ts';
import type { ExecutionEnv } from '../executors/types.ts';
import { ValidatorRegistry } from '../output-validator.ts';
import { executeSequence } from '../sequence-executor.ts';
import { UsageTracker } from '../workflow-summary.ts';
import { MockProvider } from './mock-provider.ts';

export interface TestEnv {
  env: ExecutionEnv;
  provider: MockProvider;
  logger: MemoryLogger;
  events: WorkflowEventPayload[];
  controller: AbortController;
}

export interface TestEnvOptions {
  provider?: MockProvider;
  config?: Partial<Config>;
  validators?: ValidatorRegistry;
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return ConfigSchema.parse({
    provider_retry: { count: 0, baseDelay: 0 },
    ...overrides,
  });
}

export function createTestEnv(options: TestEnvOptions = {}): TestEnv {
  const provider = options.provider ?? new MockProvider();
  const logger = new MemoryLogger();
  const events: WorkflowEventPayload[] = [];
  const controller = new AbortController();

  const env: ExecutionEnv = {
    config: testConfig(options.config),
    provider,
    evaluator: new DefaultTemplateEvaluator(),
    validators: options.validators ?? ValidatorRegistry.withDefaults(),
    logger,
    signal: controller.signal,
    depth: 0,
    usage: new UsageTracker(),
    emit: (event) => events.push(event),
    executeSequence,
  };

  return { env, provider, logger, events, controller };
}

/** Parse a raw step the way the workflow loader does, defaults included */
export function parseStep(raw: Record<string, unknown>): Step {
  return StepSchema.parse(raw);
}

export function parseSteps(raw: Record<string, unknown>[]): Step[] {
  return raw.map(parseStep);
}

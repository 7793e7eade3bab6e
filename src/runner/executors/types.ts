import type { TemplateEvaluator } from '../../expression/template-evaluator.ts';
import type { Config } from '../../parser/config-schema.ts';
import type { Step } from '../../parser/schema.ts';
import type { Logger } from '../../utils/logger.ts';
import type { ItemError } from '../errors.ts';
import type { WorkflowEventPayload } from '../events.ts';
import type { Provider } from '../llm-adapter.ts';
import type { ValidatorRegistry } from '../output-validator.ts';
import type { UsageTracker } from '../workflow-summary.ts';
import type { ExecutionContext } from '../workflow-state.ts';

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  cost_estimate: number;
}

export interface ValidationInfo {
  valid: boolean;
  attempts: number;
  errors: string[];
}

export interface ProcessingStats {
  processing_time_ms: number;
  succeeded: number;
  failed: number;
  /** Extra attempts made under `on_item_failure: retry` */
  retried: number;
  /** failed / input_count, 0 for empty input */
  error_rate: number;
}

interface ResultMeta {
  usage?: Usage;
  provider_calls?: number;
}

export type TextResult = ResultMeta & { kind: 'text'; output: string };

export type StructuredResult = ResultMeta & {
  kind: 'structured';
  output: unknown;
  validation?: ValidationInfo;
};

export type CollectionResult = ResultMeta & {
  kind: 'collection';
  output: unknown;
  operation: 'map' | 'filter' | 'reduce' | 'pipeline';
  input_count: number;
  output_count: number;
  errors: ItemError[];
  processing_stats: ProcessingStats;
};

export type ConditionalResult = ResultMeta & {
  kind: 'conditional';
  output: unknown;
  condition_result: boolean | null;
  executed_branch: string | null;
  evaluation_error: string | null;
};

export type ErrorResult = ResultMeta & { kind: 'error'; output: null; error: string };

export type StepResult =
  | TextResult
  | StructuredResult
  | CollectionResult
  | ConditionalResult
  | ErrorResult;

export interface SequenceOutcome {
  /** `skipped_remaining` when an `on_error: skip_remaining` step ended the sequence early */
  status: 'completed' | 'skipped_remaining';
  /** Output of the last step that ran, or null */
  lastOutput: unknown;
  lastStepId?: string;
  usage: Usage;
  provider_calls: number;
}

export type SequenceFn = (
  steps: Step[],
  context: ExecutionContext,
  env: ExecutionEnv
) => Promise<SequenceOutcome>;

/**
 * Everything an executor needs besides its step and context. Nested
 * sequences get a copy with `depth` (and for collections `signal`) replaced.
 */
export interface ExecutionEnv {
  config: Config;
  provider: Provider;
  evaluator: TemplateEvaluator;
  validators: ValidatorRegistry;
  logger: Logger;
  signal: AbortSignal;
  depth: number;
  /** Per-step provider usage for the run summary */
  usage: UsageTracker;
  emit: (event: WorkflowEventPayload) => void;
  /** Injected to avoid an import cycle between the sequence and its executors */
  executeSequence: SequenceFn;
}

export function emptyUsage(): Usage {
  return { prompt_tokens: 0, completion_tokens: 0, total_tokens: 0, cost_estimate: 0 };
}

export function addUsage(a: Usage, b: Usage | undefined): Usage {
  if (!b) return a;
  return {
    prompt_tokens: a.prompt_tokens + b.prompt_tokens,
    completion_tokens: a.completion_tokens + b.completion_tokens,
    total_tokens: a.total_tokens + b.total_tokens,
    cost_estimate: a.cost_estimate + b.cost_estimate,
  };
}

/** Leading spaces for log lines of nested sequences */
export function indent(env: Pick<ExecutionEnv, 'depth'>): string {
  return '  '.repeat(env.depth);
}

import { StepStatus, type StepStatusType } from '../types/status.ts';
import type { ItemError } from './errors.ts';
import type { ProcessingStats, StepResult, Usage, ValidationInfo } from './executors/types.ts';

/**
 * What templates see as `steps.<id>`. A type alias rather than an interface
 * so it satisfies the evaluator's indexable view.
 */
export type StepContext = {
  output: unknown;
  status: StepStatusType;
  error?: string;
  usage?: Usage;
  provider_calls?: number;
  validation?: ValidationInfo;
  operation?: string;
  input_count?: number;
  output_count?: number;
  errors?: ItemError[];
  processing_stats?: ProcessingStats;
  condition_result?: boolean | null;
  executed_branch?: string | null;
  evaluation_error?: string | null;
};

export interface ExecutionContext {
  input: Readonly<Record<string, unknown>>;
  steps: Record<string, StepContext>;
  /** Loop variables; only set inside collections */
  scope: Record<string, unknown>;
}

export function createContext(input: Record<string, unknown>): ExecutionContext {
  return { input: Object.freeze({ ...input }), steps: {}, scope: {} };
}

/**
 * Copy-on-extend: the child gets its own `steps` and `scope` records, so
 * parallel element pipelines never write to a shared object.
 */
export function extendContext(
  context: ExecutionContext,
  scope: Record<string, unknown>
): ExecutionContext {
  return {
    input: context.input,
    steps: { ...context.steps },
    scope: { ...context.scope, ...scope },
  };
}

export function toStepContext(result: StepResult): StepContext {
  const base = { usage: result.usage, provider_calls: result.provider_calls };
  switch (result.kind) {
    case 'text':
      return { ...base, output: result.output, status: StepStatus.SUCCESS };
    case 'structured':
      return {
        ...base,
        output: result.output,
        status: StepStatus.SUCCESS,
        validation: result.validation,
      };
    case 'collection':
      return {
        ...base,
        output: result.output,
        status: StepStatus.SUCCESS,
        operation: result.operation,
        input_count: result.input_count,
        output_count: result.output_count,
        errors: result.errors,
        processing_stats: result.processing_stats,
      };
    case 'conditional':
      return {
        ...base,
        output: result.output,
        status: result.executed_branch === null ? StepStatus.SKIPPED : StepStatus.SUCCESS,
        condition_result: result.condition_result,
        executed_branch: result.executed_branch,
        evaluation_error: result.evaluation_error,
      };
    case 'error':
      return { ...base, output: null, status: StepStatus.FAILED, error: result.error };
  }
}
